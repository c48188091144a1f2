import { createReadStream } from 'node:fs';
import { resolve } from 'node:path';
import type { Readable } from 'node:stream';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { DictionaryError } from '../errors.js';

export type StreamOpener = (location: URL) => Promise<Readable>;

/** Absolute URLs pass through; anything else is a path under `baseDir`. */
export function resolveLocation(pathOrUrl: string, baseDir: string): URL {
  // Two or more scheme chars so "C:\..." stays a path.
  if (/^[a-z][a-z0-9+.-]+:/i.test(pathOrUrl)) {
    return new URL(pathOrUrl);
  }
  return pathToFileURL(resolve(baseDir, pathOrUrl));
}

/** Open a `file:` URL, resolving once the file is actually open. */
export function openFileStream(location: URL): Promise<Readable> {
  if (location.protocol !== 'file:') {
    return Promise.reject(
      new DictionaryError('UNSUPPORTED_LOCATION', `cannot open ${location.href}; only file: locations are supported`),
    );
  }
  return new Promise((resolveStream, reject) => {
    const stream = createReadStream(fileURLToPath(location));
    const onError = (err: Error) => reject(err);
    stream.once('error', onError);
    stream.once('open', () => {
      stream.off('error', onError);
      resolveStream(stream);
    });
  });
}
