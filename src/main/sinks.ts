/**
 * Output sinks: where rendered text ends up.
 */
import path from 'node:path';

import type { TreeSink } from '../file-ops/output-assembler';

import { writeExport } from './export-writer';

export type WriteResult =
  | { ok: true; path: string; bytes: number }
  | { ok: false; path: string; error: unknown };

export interface FileSink {
  write: (destination: string, text: string) => Promise<WriteResult>;
}

export const consoleSink: TreeSink = {
  print: (text) => {
    console.log(text);
  },
};

export function createFileSink(options: { overwrite?: boolean } = {}): FileSink {
  return {
    write: async (destination, text) => {
      const absolute = path.resolve(destination);
      try {
        const { bytes } = await writeExport(absolute, text, options.overwrite ?? true);
        return { ok: true, path: absolute, bytes };
      } catch (error) {
        return { ok: false, path: absolute, error };
      }
    },
  };
}

export const fileSink: FileSink = createFileSink();
