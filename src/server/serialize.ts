import type { FullDictionary } from '../dictionary/FullDictionary.js';
import type { Pronunciation, Word } from '../dictionary/word.js';

export interface PronunciationJson {
  units: string[];
  probability: number;
}

export interface WordJson {
  spelling: string;
  filler: boolean;
  pronunciations: PronunciationJson[];
}

export function serializePronunciation(p: Pronunciation): PronunciationJson {
  return { units: p.units.map(u => u.name), probability: p.probability };
}

export function serializeWord(word: Word): WordJson {
  return {
    spelling: word.spelling,
    filler: word.isFiller,
    pronunciations: word.pronunciations.map(serializePronunciation),
  };
}

export interface WordResponse {
  status: number;
  body: { ok: true; word: WordJson } | { ok: false; error: string };
}

/** Resolve through getWord so replacement and missing-word policy apply. */
export function resolveWordResponse(dictionary: FullDictionary, spelling: string): WordResponse {
  const word = dictionary.getWord(spelling);
  if (!word) {
    return { status: 404, body: { ok: false, error: `Word not found: ${spelling.toLowerCase()}` } };
  }
  return { status: 200, body: { ok: true, word: serializeWord(word) } };
}
