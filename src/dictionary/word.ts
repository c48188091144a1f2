import type { Unit } from '../acoustic/unitManager.js';
import { DictionaryError } from '../errors.js';

export const SENTENCE_START_SPELLING = '<s>';
export const SENTENCE_END_SPELLING = '</s>';
export const SILENCE_SPELLING = '<sil>';

/** Placeholder for word classes; this dictionary never produces any. */
export interface WordClassification {
  readonly name: string;
}

export class Pronunciation {
  readonly units: readonly Unit[];
  readonly probability: number;
  private owner: Word | null = null;

  constructor(units: readonly Unit[], probability = 1.0) {
    this.units = Object.freeze([...units]);
    this.probability = probability;
  }

  /** Bind the owning word. Allowed exactly once, after the word is built. */
  setWord(word: Word): void {
    if (this.owner) {
      throw new DictionaryError('WORD_ALREADY_BOUND', `pronunciation already belongs to "${this.owner.spelling}"`);
    }
    this.owner = word;
  }

  get word(): Word | null {
    return this.owner;
  }

  toString(): string {
    return `${this.owner?.spelling ?? '?'}(${this.units.join(' ')})`;
  }
}

export class Word {
  readonly spelling: string;
  readonly pronunciations: readonly Pronunciation[];
  readonly isFiller: boolean;

  constructor(spelling: string, pronunciations: readonly Pronunciation[], isFiller: boolean) {
    this.spelling = spelling;
    this.pronunciations = Object.freeze([...pronunciations]);
    this.isFiller = isFiller;
  }

  isSentenceStartWord(): boolean {
    return this.spelling === SENTENCE_START_SPELLING;
  }

  isSentenceEndWord(): boolean {
    return this.spelling === SENTENCE_END_SPELLING;
  }

  isSilence(): boolean {
    return this.spelling === SILENCE_SPELLING;
  }

  /** Highest-probability pronunciation; earliest wins a tie. */
  getMostLikelyPronunciation(): Pronunciation | null {
    let best: Pronunciation | null = null;
    for (const p of this.pronunciations) {
      if (!best || p.probability > best.probability) best = p;
    }
    return best;
  }

  toString(): string {
    return this.spelling;
  }
}
