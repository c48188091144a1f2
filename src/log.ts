/** Console logging with a component prefix. `error` is the severe level. */

export interface DictionaryLogger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface ConsoleLoggerOptions {
  /** Send info and debug lines to stderr, keeping stdout for command output. */
  stderr?: boolean;
}

export function createConsoleLogger(tag = 'dictionary', options: ConsoleLoggerOptions = {}): DictionaryLogger {
  const prefix = `[${tag}]`;
  const out = options.stderr ? console.error : console.log;
  const debugOut = options.stderr ? console.error : console.debug;
  return {
    debug: (msg) => {
      if (process.env.DICTIONARY_DEBUG) debugOut(`${prefix} ${msg}`);
    },
    info: (msg) => out(`${prefix} ${msg}`),
    warn: (msg) => console.warn(`${prefix} ${msg}`),
    error: (msg) => console.error(`${prefix} ${msg}`),
  };
}

export const silentLogger: DictionaryLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
