export interface FileStat {
  isFile(): boolean;
}

export interface DirEntry {
  readonly name: string;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

/**
 * File access used by the registry. The default reads the local disk;
 * tests and embedders can supply their own.
 */
export interface FileReader {
  readFile(path: string): Promise<Buffer>;
  stat(path: string): Promise<FileStat>;
  readDir(path: string): Promise<readonly DirEntry[]>;
}
