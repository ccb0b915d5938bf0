import fs from 'node:fs/promises';
import path from 'node:path';
import { logFilePath } from '../../logger.js';

/** Copies the log file to `dest`. Returns the absolute destination. */
export async function runLogsExport(root: string, dest: string): Promise<string> {
  const source = logFilePath(root);
  try {
    await fs.access(source);
  } catch {
    throw new Error(`No log file at ${source}`);
  }
  const target = path.resolve(dest);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.copyFile(source, target);
  return target;
}
