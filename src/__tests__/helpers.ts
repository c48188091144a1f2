import { Readable } from 'node:stream';
import { UnitManager } from '../acoustic/unitManager.js';
import { FullDictionary, type FullDictionaryOptions } from '../dictionary/FullDictionary.js';
import type { DictionaryLogger } from '../log.js';

export const WORD_URL = new URL('memory://test/words.dict');
export const FILLER_URL = new URL('memory://test/filler.dict');

export function textStream(...chunks: string[]): Readable {
  return Readable.from(chunks);
}

export interface RecordingLogger extends DictionaryLogger {
  lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; msg: string }>;
}

export function recordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  return {
    lines,
    debug: (msg) => { lines.push({ level: 'debug', msg }); },
    info: (msg) => { lines.push({ level: 'info', msg }); },
    warn: (msg) => { lines.push({ level: 'warn', msg }); },
    error: (msg) => { lines.push({ level: 'error', msg }); },
  };
}

export interface MemoryDictionary {
  dictionary: FullDictionary;
  unitManager: UnitManager;
  logger: RecordingLogger;
  opened: string[];
}

/** A FullDictionary whose two sources are in-memory strings. */
export function memoryDictionary(
  words: string,
  fillers: string,
  overrides: Partial<FullDictionaryOptions> = {},
): MemoryDictionary {
  const unitManager = overrides.unitManager ?? new UnitManager();
  const logger = recordingLogger();
  const opened: string[] = [];
  const sources = new Map([[WORD_URL.href, words], [FILLER_URL.href, fillers]]);

  const dictionary = new FullDictionary({
    wordDictionaryFile: WORD_URL,
    fillerDictionaryFile: FILLER_URL,
    addSilEndingPronunciation: false,
    wordReplacement: null,
    allowMissingWords: false,
    createMissingWords: false,
    logger,
    ...overrides,
    unitManager,
    openStream: overrides.openStream ?? (async (location) => {
      opened.push(location.href);
      return textStream(sources.get(location.href) ?? '');
    }),
  });

  return { dictionary, unitManager, logger, opened };
}
