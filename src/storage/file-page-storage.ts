/**
 * File-based storage implementation
 */

import * as fs from 'fs';
import { IoError } from '../errors';
import { PageStorage } from './page-storage';

/**
 * Single flat file opened for read and write through a file descriptor
 */
class FilePageStorage extends PageStorage {
  readonly created: boolean;
  readonly description: string;
  private fd: number | null;

  private constructor(
    private readonly filePath: string,
    fd: number,
    created: boolean
  ) {
    super();
    this.fd = fd;
    this.created = created;
    this.description = filePath;
  }

  /**
   * Open `filePath` for read+write, creating it when absent. The directory must exist.
   */
  static openOrCreate(filePath: string): FilePageStorage {
    if (fs.existsSync(filePath)) {
      return FilePageStorage.open(filePath);
    }
    try {
      return new FilePageStorage(filePath, fs.openSync(filePath, 'w+'), true);
    } catch (error) {
      throw IoError.wrap('create', filePath, error);
    }
  }

  /**
   * Open an existing file for read+write
   */
  static open(filePath: string): FilePageStorage {
    let fd: number;
    try {
      fd = fs.openSync(filePath, 'r+');
    } catch (error) {
      throw IoError.wrap('open', filePath, error);
    }
    try {
      // An empty file carries no layout yet
      return new FilePageStorage(filePath, fd, fs.fstatSync(fd).size === 0);
    } catch (error) {
      fs.closeSync(fd);
      throw IoError.wrap('stat', filePath, error);
    }
  }

  size(): number {
    try {
      return fs.fstatSync(this._fd()).size;
    } catch (error) {
      throw IoError.wrap('stat', this.filePath, error);
    }
  }

  read(target: Buffer, position: number, length: number): number {
    const fd = this._fd();
    let total = 0;
    // readSync may return less than asked before end of file
    while (total < length) {
      const bytesRead = fs.readSync(fd, target, total, length - total, position + total);
      if (bytesRead === 0) break;
      total += bytesRead;
    }
    return total;
  }

  write(data: Buffer, position: number): number {
    const fd = this._fd();
    let total = 0;
    while (total < data.length) {
      const written = fs.writeSync(fd, data, total, data.length - total, position + total);
      if (written === 0) break;
      total += written;
    }
    return total;
  }

  sync(): void {
    try {
      fs.fsyncSync(this._fd());
    } catch (error) {
      throw IoError.wrap('sync', this.filePath, error);
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (error) {
      throw IoError.wrap('close', this.filePath, error);
    }
  }

  private _fd(): number {
    if (this.fd === null) {
      throw new IoError('open', this.filePath, 'file handle already released');
    }
    return this.fd;
  }
}

export { FilePageStorage };
