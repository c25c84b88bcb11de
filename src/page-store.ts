/**
 * @fileoverview Page store - the swap file layout
 * @description Lays pages out on a PageStorage medium:
 *
 * +----------------------------+
 * | "VM" signature (2B)        |  <- offset 0
 * +----------------------------+
 * | page 0 presence bitmap 16B |  <- offset 2
 * | page 0 data region R bytes |
 * +----------------------------+
 * | page 1 presence bitmap 16B |  <- offset 2 + (16 + R)
 * | page 1 data region R bytes |
 * +----------------------------+
 * | ...                        |
 *
 * R is 512 for integers and ceil(128 * length / 512) * 512 for fixed text.
 * Regions are always read and written whole.
 */

import {
  BITMAP_SIZE_BYTES,
  CELLS_PER_PAGE,
  FILE_HEADER_SIZE,
  FILE_SIGNATURE
} from './constants';
import { InvalidFileFormatError, IoError, type IoOperation } from './errors';
import { type PageStorage } from './storage/page-storage';
import { type CellCodec, type PageContent } from './types/common';
import { logger } from './utils/logger';

class PageStore<T> {
  /** Size of one page slot (bitmap + data region) */
  readonly slotSize: number;

  private constructor(
    private readonly storage: PageStorage,
    readonly numPages: number,
    private readonly codec: CellCodec<T>
  ) {
    this.slotSize = BITMAP_SIZE_BYTES + codec.dataRegionSize;
  }

  /**
   * Expected file size for a layout
   */
  static fileSizeFor(numPages: number, dataRegionSize: number): number {
    return FILE_HEADER_SIZE + numPages * (BITMAP_SIZE_BYTES + dataRegionSize);
  }

  /**
   * Lay out a new store: signature, then one zero-filled slot per page
   */
  static create<T>(storage: PageStorage, numPages: number, codec: CellCodec<T>): PageStore<T> {
    const store = new PageStore(storage, numPages, codec);
    store._writeExact('header write', FILE_SIGNATURE, 0);

    const zeroSlot = Buffer.alloc(store.slotSize);
    for (let page = 0; page < numPages; page++) {
      store._writeExact('data write', zeroSlot, store.pageOffset(page));
    }
    store._sync();

    logger.debug(`Created ${storage.description}: ${numPages} pages of ${store.slotSize} bytes`);
    return store;
  }

  /**
   * Open an existing store, validating it against the declared layout.
   *
   * A file longer than declared is accepted as long as it is made of whole page
   * slots (an array reopened with a smaller size).
   */
  static open<T>(storage: PageStorage, numPages: number, codec: CellCodec<T>): PageStore<T> {
    const store = new PageStore(storage, numPages, codec);
    const target = storage.description;

    const signature = Buffer.alloc(FILE_HEADER_SIZE);
    const bytesRead = store._read('header read', signature, 0, FILE_HEADER_SIZE);
    if (bytesRead !== FILE_HEADER_SIZE || !signature.equals(FILE_SIGNATURE)) {
      throw new InvalidFileFormatError(target, 'missing "VM" signature');
    }

    const actualSize = store._size();
    const expectedSize = PageStore.fileSizeFor(numPages, codec.dataRegionSize);
    if (actualSize < expectedSize) {
      throw new InvalidFileFormatError(
        target,
        `file is ${actualSize} bytes, layout needs ${expectedSize} (${numPages} pages of ${store.slotSize} bytes)`
      );
    }
    if ((actualSize - FILE_HEADER_SIZE) % store.slotSize !== 0) {
      throw new InvalidFileFormatError(
        target,
        `page area of ${actualSize - FILE_HEADER_SIZE} bytes is not a whole number of ${store.slotSize}-byte slots`
      );
    }

    logger.debug(`Opened ${target}: ${numPages} pages of ${store.slotSize} bytes`);
    return store;
  }

  /**
   * Byte offset of a page's slot
   */
  pageOffset(pageNumber: number): number {
    return FILE_HEADER_SIZE + pageNumber * this.slotSize;
  }

  /**
   * Read and decode one page. Nothing is returned unless both regions were read whole.
   */
  readPage(pageNumber: number): PageContent<T> {
    this._checkPageNumber(pageNumber);
    const offset = this.pageOffset(pageNumber);

    const bitmap = Buffer.alloc(BITMAP_SIZE_BYTES);
    this._readExact('bitmap read', bitmap, offset);
    const data = Buffer.alloc(this.codec.dataRegionSize);
    this._readExact('data read', data, offset + BITMAP_SIZE_BYTES);

    const presence = new Array<boolean>(CELLS_PER_PAGE);
    const cells = new Array<T>(CELLS_PER_PAGE);
    for (let i = 0; i < CELLS_PER_PAGE; i++) {
      presence[i] = ((bitmap[i >> 3] >> (i & 7)) & 1) === 1;
      cells[i] = this.codec.decode(data, i * this.codec.width);
    }
    return { presence, cells };
  }

  /**
   * Encode and write one page, then force it to durable storage
   */
  writePage(pageNumber: number, presence: readonly boolean[], cells: readonly T[]): void {
    this._checkPageNumber(pageNumber);
    const offset = this.pageOffset(pageNumber);

    const bitmap = Buffer.alloc(BITMAP_SIZE_BYTES);
    const data = Buffer.alloc(this.codec.dataRegionSize);
    for (let i = 0; i < CELLS_PER_PAGE; i++) {
      if (presence[i]) {
        bitmap[i >> 3] |= 1 << (i & 7);
      }
      this.codec.encode(cells[i], data, i * this.codec.width);
    }

    this._writeExact('bitmap write', bitmap, offset);
    this._writeExact('data write', data, offset + BITMAP_SIZE_BYTES);
    this._sync();
  }

  /**
   * Current size of the backing medium
   */
  fileSize(): number {
    return this._size();
  }

  close(): void {
    try {
      this.storage.close();
    } catch (error) {
      throw this._wrap('close', error);
    }
  }

  private _checkPageNumber(pageNumber: number): void {
    if (!Number.isInteger(pageNumber) || pageNumber < 0 || pageNumber >= this.numPages) {
      throw new RangeError(`Page ${pageNumber} outside [0, ${this.numPages})`);
    }
  }

  private _readExact(operation: IoOperation, target: Buffer, position: number): void {
    const bytesRead = this._read(operation, target, position, target.length);
    if (bytesRead !== target.length) {
      throw new IoError(operation, this.storage.description, 'short read', target.length, bytesRead);
    }
  }

  private _read(operation: IoOperation, target: Buffer, position: number, length: number): number {
    try {
      return this.storage.read(target, position, length);
    } catch (error) {
      throw this._wrap(operation, error);
    }
  }

  private _writeExact(operation: IoOperation, data: Buffer, position: number): void {
    let written: number;
    try {
      written = this.storage.write(data, position);
    } catch (error) {
      throw this._wrap(operation, error);
    }
    if (written !== data.length) {
      throw new IoError(operation, this.storage.description, 'short write', data.length, written);
    }
  }

  private _sync(): void {
    try {
      this.storage.sync();
    } catch (error) {
      throw this._wrap('sync', error);
    }
  }

  private _size(): number {
    try {
      return this.storage.size();
    } catch (error) {
      throw this._wrap('stat', error);
    }
  }

  private _wrap(operation: IoOperation, error: unknown): IoError {
    return error instanceof IoError ? error : IoError.wrap(operation, this.storage.description, error);
  }
}

export { PageStore };
