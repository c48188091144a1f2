/** Public API: pronunciation dictionary loading and lookup. */

export { FullDictionary } from './dictionary/FullDictionary.js';
export type { FullDictionaryOptions } from './dictionary/FullDictionary.js';
export {
  Word,
  Pronunciation,
  SENTENCE_START_SPELLING,
  SENTENCE_END_SPELLING,
  SILENCE_SPELLING,
} from './dictionary/word.js';
export type { WordClassification } from './dictionary/word.js';
export { parseDictionary } from './dictionary/parser.js';
export type { ParseOptions } from './dictionary/parser.js';
export { createWords } from './dictionary/builder.js';
export { DictionaryTokenizer } from './dictionary/tokenizer.js';
export { removeParensFromWord, normalizeSpelling } from './dictionary/spelling.js';
export { resolveLocation, openFileStream } from './dictionary/source.js';
export type { StreamOpener } from './dictionary/source.js';
export { Unit, UnitManager, EMPTY_CONTEXT, SILENCE_NAME } from './acoustic/unitManager.js';
export type { Context } from './acoustic/unitManager.js';
export { DictionaryConfigSchema } from './config/schema.js';
export type { DictionaryConfig } from './config/schema.js';
export { loadDictionaryConfig, toDictionaryOptions, configPathFromEnv } from './config/loader.js';
export type { LoadedDictionaryConfig } from './config/loader.js';
export { DictionaryError } from './errors.js';
export type { DictionaryErrorCode } from './errors.js';
export { createConsoleLogger, silentLogger } from './log.js';
export type { DictionaryLogger, ConsoleLoggerOptions } from './log.js';
