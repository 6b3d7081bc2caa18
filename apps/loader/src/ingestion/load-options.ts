import { isAbsolute, resolve } from 'node:path';
import { DEFAULT_DATA_FILE } from './ingestion.constants';

export type LoadOptions = {
  file: string;
  clear: boolean;
};

export const USAGE = `Usage: folio-load [--file <path>] [--clear]

  --file <path>  workbook to load (default: ${DEFAULT_DATA_FILE})
  --clear        delete all stored data before loading`;

export class UsageError extends Error {
  readonly name = 'UsageError';
}

/** Relative paths resolve against `cwd`. */
export function parseLoadOptions(argv: string[], cwd = process.cwd()): LoadOptions {
  let file = DEFAULT_DATA_FILE;
  let clear = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--clear') {
      clear = true;
    } else if (arg === '--file') {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new UsageError('--file needs a path');
      }
      file = next;
      i++;
    } else if (arg.startsWith('--file=')) {
      file = arg.slice('--file='.length);
      if (!file) throw new UsageError('--file needs a path');
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return { file: isAbsolute(file) ? file : resolve(cwd, file), clear };
}
