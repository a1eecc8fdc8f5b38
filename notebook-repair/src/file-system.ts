import { copyFile, readFile, stat, writeFile } from 'node:fs/promises';

/**
 * The file operations a repair run performs. Each call opens and closes its
 * own handle.
 */
export interface NotebookFileSystem {
  stat(path: string): Promise<{ size: number }>;
  readFile(path: string): Promise<Buffer>;
  writeFile(path: string, content: string): Promise<void>;
  copyFile(source: string, destination: string, mode?: number): Promise<void>;
}

export const nodeFileSystem: NotebookFileSystem = {
  stat: path => stat(path),
  readFile: path => readFile(path),
  writeFile: (path, content) => writeFile(path, content, 'utf8'),
  copyFile: (source, destination, mode) => copyFile(source, destination, mode)
};
