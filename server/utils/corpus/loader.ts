/**
 * Corpus Loader
 *
 * Reads every matching file in a directory as one document. Ids are assigned
 * 1..n in file-name order, so they are stable for an unchanged directory but
 * shift when files are added or renamed.
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { withSource } from '../../logger';
import { metrics } from '../../metrics';
import { DocumentReadError, toError } from '../../types/errors';
import type { CorpusDocument } from '../similarity/pipeline';
import { basicNormalize } from './normalizer';

const log = withSource('corpus-loader');

/** skip: log and continue with the rest; abort: throw on the first bad file */
export type LoadErrorPolicy = 'skip' | 'abort';

export interface LoadCorpusOptions {
  /** File extension to include (default: .txt) */
  extension?: string;
  onError?: LoadErrorPolicy;
  /** Apply basicNormalize to file contents (default: true) */
  normalize?: boolean;
}

export interface LoadFailure {
  file: string;
  message: string;
}

export interface LoadedCorpus {
  documents: CorpusDocument[];
  failures: LoadFailure[];
}

export async function loadCorpus(
  directory: string,
  options: LoadCorpusOptions = {}
): Promise<LoadedCorpus> {
  const { extension = '.txt', onError = 'skip', normalize = true } = options;

  let fileNames: string[];
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    fileNames = entries
      .filter(entry => entry.isFile() && entry.name.endsWith(extension))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new DocumentReadError(`Cannot list corpus directory: ${toError(error).message}`, {
      directory,
    });
  }

  const documents: CorpusDocument[] = [];
  const failures: LoadFailure[] = [];

  for (const name of fileNames) {
    const filePath = path.join(directory, name);
    try {
      // fatal: invalid byte sequences throw instead of decoding to U+FFFD
      const raw = new TextDecoder('utf-8', { fatal: true }).decode(await readFile(filePath));
      documents.push({
        id: documents.length + 1,
        name,
        text: normalize ? basicNormalize(raw) : raw,
      });
    } catch (error) {
      const message = toError(error).message;
      metrics.recordLoadFailure(onError);

      if (onError === 'abort') {
        throw new DocumentReadError(`Cannot read document ${name}: ${message}`, {
          directory,
          file: name,
        });
      }

      log.warn({ file: name, directory, err: error }, 'Skipping unreadable document');
      failures.push({ file: name, message });
    }
  }

  log.info(
    { directory, loaded: documents.length, failed: failures.length },
    'Loaded corpus'
  );

  return { documents, failures };
}
