/**
 * File access needed by import expansion: existence check and whole-file read.
 */

import { existsSync, readFileSync } from 'node:fs';

export interface FileSystem {
  exists(path: string): boolean;
  /** Entire file as UTF-8 text. May throw when the file cannot be read. */
  readFile(path: string): string;
}

export const nodeFileSystem: FileSystem = {
  exists: (path) => existsSync(path),
  readFile: (path) => readFileSync(path, 'utf8'),
};
