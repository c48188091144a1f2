export type DictionaryErrorCode =
  | 'NOT_ALLOCATED'
  | 'UNSUPPORTED_LOCATION'
  | 'WORD_ALREADY_BOUND';

export class DictionaryError extends Error {
  readonly code: DictionaryErrorCode;

  constructor(code: DictionaryErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'DictionaryError';
    this.code = code;
  }
}
