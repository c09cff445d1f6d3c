import { promises as fs } from 'fs';
import { DirEntry, FileReader, FileStat } from '../interfaces/file-reader.interface.js';

export class FsFileReader implements FileReader {
  readFile(path: string): Promise<Buffer> {
    return fs.readFile(path);
  }

  stat(path: string): Promise<FileStat> {
    return fs.stat(path);
  }

  readDir(path: string): Promise<readonly DirEntry[]> {
    return fs.readdir(path, { withFileTypes: true });
  }
}
