import { Cursor } from '../cursor.js';
import type { FileSystem } from '../files.js';
import { nodeFileSystem } from '../files.js';
import { VariableTable } from '../variables.js';

export function cursor(text: string, maxInputLength = 10_000): Cursor {
  return new Cursor(text, {
    variables: new VariableTable({}),
    fileSystem: nodeFileSystem,
    importedFiles: new Set(),
    maxInputLength,
  });
}

/** Files keyed by absolute path. */
export function memoryFileSystem(files: Record<string, string>): FileSystem {
  return {
    exists: (path) => Object.hasOwn(files, path),
    readFile: (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    },
  };
}

/** Runs `fn` and returns what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected an error to be thrown');
}
