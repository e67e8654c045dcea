import fs from 'node:fs';
import path from 'node:path';

import { hasErrorCode } from '../utils/error-utils';

/**
 * Writes rendered tree text to a file on disk.
 * - Ensures parent directory exists
 * - Honors overwrite flag
 * - Always writes UTF-8 text
 */
export async function writeExport(absoluteOutputPath: string, content: string, overwrite = true): Promise<{ bytes: number }> {
  await fs.promises.mkdir(path.dirname(absoluteOutputPath), { recursive: true });

  if (!overwrite) {
    try {
      const st = await fs.promises.stat(absoluteOutputPath);
      if (st.isFile()) {
        throw Object.assign(new Error('File exists; set overwrite=true to replace'), { code: 'EEXIST' });
      }
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) throw error;
    }
  }

  const bytes = Buffer.byteLength(content, 'utf8');
  await fs.promises.writeFile(absoluteOutputPath, content, 'utf8');
  return { bytes };
}
