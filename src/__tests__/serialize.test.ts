import { describe, expect, it } from 'vitest';
import { resolveWordResponse, serializeWord } from '../server/serialize.js';
import { memoryDictionary } from './helpers.js';

describe('serializeWord', () => {
  it('renders units by name', async () => {
    const { dictionary } = memoryDictionary('ONE HH W AH N\nONE(2) W AH N\n', '<sil> SIL\n');
    await dictionary.allocate();
    const one = dictionary.getWord('one');
    expect(one && serializeWord(one)).toEqual({
      spelling: 'one',
      filler: false,
      pronunciations: [
        { units: ['HH', 'W', 'AH', 'N'], probability: 1 },
        { units: ['W', 'AH', 'N'], probability: 1 },
      ],
    });
  });
});

describe('resolveWordResponse', () => {
  it('answers 200 with the word', async () => {
    const { dictionary } = memoryDictionary('OH OW\n', '<sil> SIL\n');
    await dictionary.allocate();
    expect(resolveWordResponse(dictionary, 'OH')).toEqual({
      status: 200,
      body: { ok: true, word: { spelling: 'oh', filler: false, pronunciations: [{ units: ['OW'], probability: 1 }] } },
    });
  });

  it('answers 404 for a missing word', async () => {
    const { dictionary } = memoryDictionary('OH OW\n', '<sil> SIL\n');
    await dictionary.allocate();
    expect(resolveWordResponse(dictionary, 'ZZZ')).toEqual({
      status: 404,
      body: { ok: false, error: 'Word not found: zzz' },
    });
  });
});
