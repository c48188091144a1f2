import { Readable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { DictionaryTokenizer } from '../dictionary/tokenizer.js';
import { textStream } from './helpers.js';

async function collect(input: Readable): Promise<string[][]> {
  const tokenizer = new DictionaryTokenizer(input);
  const lines: string[][] = [];
  for await (const tokens of tokenizer.lines()) lines.push(tokens);
  return lines;
}

describe('DictionaryTokenizer', () => {
  it('splits lines on runs of spaces and tabs', async () => {
    const lines = await collect(textStream('ONE \t HH W  AH N\nTWO\tT UW\n'));
    expect(lines).toEqual([
      ['ONE', 'HH', 'W', 'AH', 'N'],
      ['TWO', 'T', 'UW'],
    ]);
  });

  it('handles CRLF and skips blank lines', async () => {
    const lines = await collect(textStream('OH OW\r\n\r\n   \nSIX S IH K S\r\n'));
    expect(lines).toEqual([
      ['OH', 'OW'],
      ['SIX', 'S', 'IH', 'K', 'S'],
    ]);
  });

  it('ends entries at a lone carriage return', async () => {
    const lines = await collect(textStream('ONE W AH N\rTWO T UW\r'));
    expect(lines).toEqual([
      ['ONE', 'W', 'AH', 'N'],
      ['TWO', 'T', 'UW'],
    ]);
  });

  it('reads a CRLF split across chunks as one line break', async () => {
    const lines = await collect(textStream('OH OW\r', '\nSIX S IH K S\r', '\n'));
    expect(lines).toEqual([
      ['OH', 'OW'],
      ['SIX', 'S', 'IH', 'K', 'S'],
    ]);
  });

  it('splits only on ASCII whitespace', async () => {
    const lines = await collect(textStream('NEW\u00a0YORK N UW\u3000Y\n'));
    expect(lines).toEqual([['NEW\u00a0YORK', 'N', 'UW\u3000Y']]);
  });

  it('joins tokens split across chunks', async () => {
    const lines = await collect(textStream('ONE HH W', ' AH N\nTW', 'O T UW'));
    expect(lines).toEqual([
      ['ONE', 'HH', 'W', 'AH', 'N'],
      ['TWO', 'T', 'UW'],
    ]);
  });

  it('decodes byte chunks', async () => {
    const lines = await collect(Readable.from([Buffer.from('EIGHT EY'), Buffer.from(' T\n')]));
    expect(lines).toEqual([['EIGHT', 'EY', 'T']]);
  });

  it('returns a lone spelling as a one-token line', async () => {
    const lines = await collect(textStream('HMM\n'));
    expect(lines).toEqual([['HMM']]);
  });

  it('close() destroys the stream', () => {
    const input = textStream('ONE W AH N\n');
    const tokenizer = new DictionaryTokenizer(input);
    tokenizer.close();
    tokenizer.close();
    expect(input.destroyed).toBe(true);
  });
});
