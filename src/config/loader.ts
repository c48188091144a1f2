import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { UnitManager } from '../acoustic/unitManager.js';
import type { FullDictionaryOptions } from '../dictionary/FullDictionary.js';
import { resolveLocation } from '../dictionary/source.js';
import type { DictionaryLogger } from '../log.js';
import { DictionaryConfigSchema, type DictionaryConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'data/dictionary.config.json';

export interface LoadedDictionaryConfig {
  configPath: string;
  config: DictionaryConfig;
  wordDictionaryFile: URL;
  fillerDictionaryFile: URL;
  addendaUrlList: URL[];
}

/** Read and validate a config file; locations resolve against its directory. */
export async function loadDictionaryConfig(configPath: string): Promise<LoadedDictionaryConfig> {
  const fullPath = resolve(configPath);
  const baseDir = dirname(fullPath);
  const raw: unknown = JSON.parse(await readFile(fullPath, 'utf-8'));
  const config = DictionaryConfigSchema.parse(raw);

  return {
    configPath: fullPath,
    config,
    wordDictionaryFile: resolveLocation(config.dictionary, baseDir),
    fillerDictionaryFile: resolveLocation(config.fillerPath, baseDir),
    addendaUrlList: config.addenda.map(a => resolveLocation(a, baseDir)),
  };
}

export function toDictionaryOptions(
  loaded: LoadedDictionaryConfig,
  unitManager: UnitManager,
  logger?: DictionaryLogger,
): FullDictionaryOptions {
  const { config } = loaded;
  return {
    wordDictionaryFile: loaded.wordDictionaryFile,
    fillerDictionaryFile: loaded.fillerDictionaryFile,
    addendaUrlList: loaded.addendaUrlList,
    addSilEndingPronunciation: config.addSilEndingPronunciation,
    wordReplacement: config.wordReplacement,
    allowMissingWords: config.allowMissingWords,
    createMissingWords: config.createMissingWords,
    unitManager,
    logger,
  };
}

/** Config path from DICTIONARY_CONFIG, else the bundled default. */
export function configPathFromEnv(): string {
  return process.env.DICTIONARY_CONFIG || DEFAULT_CONFIG_PATH;
}
