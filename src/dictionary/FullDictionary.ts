/**
 * FullDictionary — reads a whole word dictionary and filler dictionary
 * into memory at allocate() time and answers lookups from them.
 *
 * File format, one entry per line:
 *
 *   ONE        HH W AH N
 *   ONE(2)     W AH N
 *   ZERO       Z IH R OW
 *
 * "(n)" suffixes are stripped, so both ONE lines become pronunciations of
 * the word "one".
 */

import type { Readable } from 'node:stream';
import type { UnitManager } from '../acoustic/unitManager.js';
import { DictionaryError } from '../errors.js';
import { createConsoleLogger, type DictionaryLogger } from '../log.js';
import { createWords } from './builder.js';
import { parseDictionary } from './parser.js';
import { openFileStream, type StreamOpener } from './source.js';
import {
  SENTENCE_END_SPELLING,
  SENTENCE_START_SPELLING,
  SILENCE_SPELLING,
  Word,
  type WordClassification,
} from './word.js';

export interface FullDictionaryOptions {
  wordDictionaryFile: URL;
  fillerDictionaryFile: URL;
  /** Accepted for configuration compatibility; never read. */
  addendaUrlList?: URL[];
  addSilEndingPronunciation: boolean;
  wordReplacement: string | null;
  allowMissingWords: boolean;
  createMissingWords: boolean;
  unitManager: UnitManager;
  logger?: DictionaryLogger;
  openStream?: StreamOpener;
}

type DictionaryState =
  | { status: 'unloaded' }
  | {
      status: 'loaded';
      wordDictionary: Map<string, Word>;
      fillerDictionary: Map<string, Word>;
      loadTimeMs: number;
    };

type LoadedState = Extract<DictionaryState, { status: 'loaded' }>;

export class FullDictionary {
  private readonly wordDictionaryFile: URL;
  private readonly fillerDictionaryFile: URL;
  private readonly addendaUrlList: readonly URL[];
  private readonly addSilEndingPronunciation: boolean;
  private readonly wordReplacement: string | null;
  private readonly allowMissingWords: boolean;
  private readonly createMissingWords: boolean;
  private readonly unitManager: UnitManager;
  private readonly logger: DictionaryLogger;
  private readonly openStream: StreamOpener;

  private state: DictionaryState = { status: 'unloaded' };
  private pendingLoad: Promise<void> | null = null;
  /** Bumped by deallocate(); a load only publishes if its generation is current. */
  private generation = 0;

  constructor(options: FullDictionaryOptions) {
    this.wordDictionaryFile = options.wordDictionaryFile;
    this.fillerDictionaryFile = options.fillerDictionaryFile;
    this.addendaUrlList = Object.freeze([...(options.addendaUrlList ?? [])]);
    this.addSilEndingPronunciation = options.addSilEndingPronunciation;
    this.wordReplacement = options.wordReplacement;
    this.allowMissingWords = options.allowMissingWords;
    this.createMissingWords = options.createMissingWords;
    this.unitManager = options.unitManager;
    this.logger = options.logger ?? createConsoleLogger();
    this.openStream = options.openStream ?? openFileStream;
  }

  // ── Lifecycle ───────────────────────────────────────────────────

  /** Load both dictionaries. No-op when already loaded. */
  allocate(): Promise<void> {
    if (this.state.status === 'loaded') return Promise.resolve();
    if (!this.pendingLoad) {
      const pending: Promise<void> = this.load(this.generation).finally(() => {
        if (this.pendingLoad === pending) this.pendingLoad = null;
      });
      this.pendingLoad = pending;
    }
    return this.pendingLoad;
  }

  /** Drop both maps. A load still in flight is discarded when it finishes. */
  deallocate(): void {
    this.generation++;
    this.pendingLoad = null;
    this.state = { status: 'unloaded' };
  }

  isAllocated(): boolean {
    return this.state.status === 'loaded';
  }

  private async load(generation: number): Promise<void> {
    const startMs = performance.now();

    this.logger.info(`Loading dictionary from: ${this.wordDictionaryFile.href}`);
    const wordDictionary = await this.loadDictionary(await this.openStream(this.wordDictionaryFile), false);

    this.logger.info(`Loading filler dictionary from: ${this.fillerDictionaryFile.href}`);
    const fillerDictionary = await this.loadDictionary(await this.openStream(this.fillerDictionaryFile), true);

    const loadTimeMs = performance.now() - startMs;
    if (generation !== this.generation) {
      this.logger.info('Dictionary load discarded; deallocated while loading');
      return;
    }
    this.state = { status: 'loaded', wordDictionary, fillerDictionary, loadTimeMs };

    this.logger.info(`Loaded ${wordDictionary.size} words, ${fillerDictionary.size} fillers in ${loadTimeMs.toFixed(1)}ms`);
    this.logger.debug(`\n${this.dumpToString()}`);
  }

  /** Parse one stream and build its spelling → Word map. */
  protected async loadDictionary(input: Readable, isFillerDict: boolean): Promise<Map<string, Word>> {
    const pronunciationList = await parseDictionary(input, {
      isFillerDict,
      addSilEndingPronunciation: this.addSilEndingPronunciation,
      unitManager: this.unitManager,
    });
    return createWords(pronunciationList, isFillerDict);
  }

  private loaded(): LoadedState {
    if (this.state.status !== 'loaded') {
      throw new DictionaryError('NOT_ALLOCATED', 'dictionary is not allocated; call allocate() first');
    }
    return this.state;
  }

  // ── Lookup ──────────────────────────────────────────────────────

  /**
   * Resolve a spelling. On a miss: use the replacement word if one is
   * configured; otherwise, with missing words allowed, optionally record an
   * empty Word for later lookups. The call that records it still returns null.
   */
  getWord(text: string): Word | null {
    const spelling = text.toLowerCase();
    const { wordDictionary } = this.loaded();

    const word = this.lookupWord(spelling);
    if (word) return word;

    this.logger.warn(`Missing word: ${spelling}`);
    if (this.wordReplacement !== null) {
      this.logger.warn(`Replacing ${spelling} with ${this.wordReplacement}`);
      const replacement = this.lookupWord(this.wordReplacement);
      if (!replacement) {
        this.logger.error(`Replacement word ${this.wordReplacement} not found!`);
      }
      return replacement;
    }

    if (this.allowMissingWords && this.createMissingWords) {
      wordDictionary.set(spelling, new Word(spelling, [], false));
    }
    return null;
  }

  /** Word map first, then the filler map. */
  lookupWord(spelling: string): Word | null {
    const { wordDictionary, fillerDictionary } = this.loaded();
    const key = spelling.toLowerCase();
    return wordDictionary.get(key) ?? fillerDictionary.get(key) ?? null;
  }

  getSentenceStartWord(): Word | null {
    return this.getWord(SENTENCE_START_SPELLING);
  }

  getSentenceEndWord(): Word | null {
    return this.getWord(SENTENCE_END_SPELLING);
  }

  getSilenceWord(): Word | null {
    return this.getWord(SILENCE_SPELLING);
  }

  getFillerWords(): Word[] {
    return [...this.loaded().fillerDictionary.values()];
  }

  /** Word classes are not modeled by this dictionary. */
  getPossibleWordClassifications(): WordClassification[] | null {
    this.loaded();
    return null;
  }

  // ── Accessors ───────────────────────────────────────────────────

  getWordDictionaryFile(): URL {
    return this.wordDictionaryFile;
  }

  getFillerDictionaryFile(): URL {
    return this.fillerDictionaryFile;
  }

  getAddendaUrlList(): readonly URL[] {
    return this.addendaUrlList;
  }

  getWordCount(): number {
    return this.loaded().wordDictionary.size;
  }

  getFillerCount(): number {
    return this.loaded().fillerDictionary.size;
  }

  getLoadTimeMs(): number {
    return this.loaded().loadTimeMs;
  }

  // ── Diagnostics ─────────────────────────────────────────────────

  /** Every word and filler, sorted by spelling, with its pronunciations. */
  dumpToString(): string {
    const { wordDictionary, fillerDictionary } = this.loaded();
    const spellings = [...new Set([...wordDictionary.keys(), ...fillerDictionary.keys()])].sort();

    let result = '';
    for (const spelling of spellings) {
      const word = this.lookupWord(spelling);
      if (!word) continue;
      result += `${word}\n`;
      for (const pronunciation of word.pronunciations) {
        result += `   ${pronunciation}\n`;
      }
    }
    return result;
  }

  toString(): string {
    const numWords = this.state.status === 'loaded' ? this.state.wordDictionary.size : 0;
    return `FullDictionary numWords=${numWords} dictLocation=${this.wordDictionaryFile.href}`;
  }
}
