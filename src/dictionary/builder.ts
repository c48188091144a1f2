import type { Unit } from '../acoustic/unitManager.js';
import { Pronunciation, Word } from './word.js';

/**
 * Turn parsed spelling → unit-sequence lists into finished Words. Each
 * Pronunciation is bound to its Word once the Word exists.
 */
export function createWords(pronunciationList: Map<string, Unit[][]>, isFillerDict: boolean): Map<string, Word> {
  const result = new Map<string, Word>();
  for (const [spelling, sequences] of pronunciationList) {
    const pronunciations = sequences.map(units => new Pronunciation(units, 1.0));
    const word = new Word(spelling, pronunciations, isFillerDict);
    for (const p of word.pronunciations) {
      p.setWord(word);
    }
    result.set(spelling, word);
  }
  return result;
}
