import type { Readable } from 'node:stream';
import type { Unit, UnitManager } from '../acoustic/unitManager.js';
import { DictionaryTokenizer } from './tokenizer.js';
import { normalizeSpelling } from './spelling.js';

export interface ParseOptions {
  isFillerDict: boolean;
  addSilEndingPronunciation: boolean;
  unitManager: UnitManager;
}

/**
 * Read a dictionary stream into spelling → unit sequences.
 *
 * Each line is `SPELLING[(n)] PHONE...`. Lines sharing a normalized
 * spelling append to the same list in file order. Non-filler lines get a
 * second, SIL-terminated sequence when `addSilEndingPronunciation` is set.
 * The stream is closed on every exit path.
 */
export async function parseDictionary(input: Readable, options: ParseOptions): Promise<Map<string, Unit[][]>> {
  const { isFillerDict, addSilEndingPronunciation, unitManager } = options;
  const pronunciationList = new Map<string, Unit[][]>();
  const tokenizer = new DictionaryTokenizer(input);

  try {
    for await (const [rawSpelling, ...phones] of tokenizer.lines()) {
      const spelling = normalizeSpelling(rawSpelling);
      const units = phones.map(phone => unitManager.getUnit(phone, isFillerDict));

      let sequences = pronunciationList.get(spelling);
      if (!sequences) {
        sequences = [];
        pronunciationList.set(spelling, sequences);
      }
      sequences.push(units);
      if (!isFillerDict && addSilEndingPronunciation) {
        sequences.push([...units, unitManager.silence]);
      }
    }
  } finally {
    tokenizer.close();
  }

  return pronunciationList;
}
