import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';

const LINE_BREAK = /\r\n|\r|\n/;
// ASCII control characters and space; other Unicode spaces stay inside tokens.
const TOKEN_SEPARATOR = /[\x00-\x20]+/;

function splitTokens(line: string): string[] {
  return line.split(TOKEN_SEPARATOR).filter(t => t.length > 0);
}

/**
 * Line-oriented whitespace tokenizer over a byte or string stream.
 * Yields the tokens of each non-blank line. `\n`, `\r\n` and a lone `\r`
 * each end a line; a `\r\n` split across chunks reads as an extra blank line.
 */
export class DictionaryTokenizer {
  constructor(private readonly input: Readable) {}

  async *lines(): AsyncGenerator<string[]> {
    const decoder = new StringDecoder('utf8');
    let pending = '';

    for await (const chunk of this.input) {
      pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
      const parts = pending.split(LINE_BREAK);
      pending = parts.pop() ?? '';
      for (const line of parts) {
        const tokens = splitTokens(line);
        if (tokens.length > 0) yield tokens;
      }
    }

    pending += decoder.end();
    const tokens = splitTokens(pending);
    if (tokens.length > 0) yield tokens;
  }

  /** Release the underlying stream. Safe to call more than once. */
  close(): void {
    if (!this.input.destroyed) this.input.destroy();
  }
}
