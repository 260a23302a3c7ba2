import { readFile } from 'node:fs/promises';
import type { HostStatSource } from '../types/telemetry.js';

/** Reads /proc and /sys text files; a missing file resolves to null. */
export class ProcfsHostStatSource implements HostStatSource {
  async readText(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, 'utf8');
    } catch (error) {
      const fsError = error as NodeJS.ErrnoException;
      if (fsError.code === 'ENOENT' || fsError.code === 'ENOTDIR') {
        return null;
      }
      throw error;
    }
  }
}
