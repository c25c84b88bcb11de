/**
 * @fileoverview Paged virtual array
 * @description An array of fixed-size elements larger than memory, backed by a single
 * swap file. Only `bufferPages` pages of 128 elements are held in memory at a time.
 *
 * @example
 * import { IntVirtualArray } from 'paged-virtual-array';
 *
 * const array = new IntVirtualArray('swapfile.dat', 5000);
 * array.write(4999, 42);
 * array.read(4999); // 42
 * array.read(1);    // 0, never written
 * array.close();
 */

import { CELLS_PER_PAGE, DEFAULT_BUFFER_PAGES, pagesForSize } from './constants';
import { FixedTextCodec } from './codecs/fixed-text-codec';
import { intCodec } from './codecs/int-codec';
import {
  ArrayClosedError,
  BadCreationParametersError,
  IndexOutOfRangeError,
  NotImplementedError
} from './errors';
import { PageBuffer } from './page-buffer';
import { PageStore } from './page-store';
import { FilePageStorage } from './storage/file-page-storage';
import { PageStorage } from './storage/page-storage';
import {
  type CellCodec,
  type ElementType,
  type VirtualArrayStats
} from './types/common';
import { logger } from './utils/logger';

/**
 * Options shared by every variant
 */
interface VirtualArrayOptions {
  /** Page slots kept in memory (default 3) */
  bufferPages?: number;
}

/**
 * Where the array lives: a file path, or an already opened storage medium
 */
type ArrayTarget = string | PageStorage;

/**
 * Array over one element type. The variant is fixed at construction.
 */
abstract class VirtualArray<T> {
  readonly length: number;
  readonly numPages: number;
  private readonly store: PageStore<T>;
  private readonly buffer: PageBuffer<T>;
  private readonly description: string;
  private closed: boolean = false;

  protected constructor(
    target: ArrayTarget,
    arraySize: number,
    private readonly codec: CellCodec<T>,
    options: VirtualArrayOptions = {}
  ) {
    if (!Number.isSafeInteger(arraySize) || arraySize < 1) {
      throw new BadCreationParametersError(`array size must be a positive integer, got ${arraySize}`);
    }
    const bufferPages = options.bufferPages ?? DEFAULT_BUFFER_PAGES;
    if (!Number.isSafeInteger(bufferPages) || bufferPages < 1) {
      throw new BadCreationParametersError(`buffer must hold at least one page, got ${bufferPages}`);
    }

    this.length = arraySize;
    this.numPages = pagesForSize(arraySize);

    const storage = target instanceof PageStorage ? target : FilePageStorage.openOrCreate(target);
    this.description = storage.description;
    try {
      this.store = storage.created
        ? PageStore.create(storage, this.numPages, codec)
        : PageStore.open(storage, this.numPages, codec);
    } catch (error) {
      // Release the handle; the layout error is what the caller needs to see
      try {
        storage.close();
      } catch (closeError) {
        logger.warn(`Failed to release ${storage.description}:`, closeError);
      }
      throw error;
    }
    this.buffer = new PageBuffer<T>(this.store, codec.defaultValue, bufferPages);
  }

  /**
   * Element type of this array
   */
  abstract get elementType(): ElementType;

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Read one element; never-written elements read as the type default
   */
  read(index: number): T {
    this._checkOpen();
    this._checkIndex(index);
    const page = this.buffer.locateOrAdmit(Math.floor(index / CELLS_PER_PAGE));
    return page.get(index % CELLS_PER_PAGE);
  }

  /**
   * Write one element. Text longer than the cell is truncated.
   */
  write(index: number, value: T): void {
    this._checkOpen();
    this._checkIndex(index);
    const normalized = this.codec.normalize(value);
    const page = this.buffer.locateOrAdmit(Math.floor(index / CELLS_PER_PAGE));
    page.set(index % CELLS_PER_PAGE, normalized, this.buffer.tick());
  }

  /**
   * The value as write() stores it and a later read() returns it
   */
  normalize(value: T): T {
    return this.codec.normalize(value);
  }

  /**
   * Write every dirty buffered page to the file
   */
  flush(): void {
    this._checkOpen();
    this.buffer.flush();
  }

  /**
   * Flush and release the file. Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) return;
    this.buffer.flush();
    this.closed = true;
    this.store.close();
    logger.debug(`Closed ${this.description}`);
  }

  getStats(): VirtualArrayStats {
    this._checkOpen();
    return {
      ...this.buffer.getStats(),
      arraySize: this.length,
      numPages: this.numPages,
      fileSize: this.store.fileSize()
    };
  }

  /**
   * Page numbers currently held in memory
   */
  residentPages(): number[] {
    return this.buffer.residentPages();
  }

  private _checkOpen(): void {
    if (this.closed) {
      throw new ArrayClosedError(this.description);
    }
  }

  private _checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexOutOfRangeError(index, this.length);
    }
  }
}

/**
 * Array of signed 32-bit integers
 */
class IntVirtualArray extends VirtualArray<number> {
  constructor(target: ArrayTarget, arraySize: number, options?: VirtualArrayOptions) {
    super(target, arraySize, intCodec, options);
  }

  get elementType(): ElementType {
    return { kind: 'int' };
  }
}

/**
 * Array of text cells of a fixed length
 */
class FixedTextVirtualArray extends VirtualArray<string> {
  readonly fixedLength: number;

  constructor(target: ArrayTarget, arraySize: number, fixedLength: number, options?: VirtualArrayOptions) {
    super(target, arraySize, new FixedTextCodec(fixedLength), options);
    this.fixedLength = fixedLength;
  }

  get elementType(): ElementType {
    return { kind: 'char', length: this.fixedLength };
  }
}

/**
 * Create or open an array, choosing the variant from the element type
 */
function openVirtualArray(
  target: ArrayTarget,
  elementType: { kind: 'int' },
  arraySize: number,
  options?: VirtualArrayOptions
): IntVirtualArray;
function openVirtualArray(
  target: ArrayTarget,
  elementType: { kind: 'char'; length: number },
  arraySize: number,
  options?: VirtualArrayOptions
): FixedTextVirtualArray;
function openVirtualArray(
  target: ArrayTarget,
  elementType: ElementType,
  arraySize: number,
  options?: VirtualArrayOptions
): IntVirtualArray | FixedTextVirtualArray;
function openVirtualArray(
  target: ArrayTarget,
  elementType: ElementType,
  arraySize: number,
  options?: VirtualArrayOptions
): IntVirtualArray | FixedTextVirtualArray {
  switch (elementType.kind) {
    case 'int':
      return new IntVirtualArray(target, arraySize, options);
    case 'char':
      return new FixedTextVirtualArray(target, arraySize, elementType.length, options);
    case 'varchar':
      // Needs a second file of string offsets; no layout is defined for it yet
      throw new NotImplementedError(`varchar(${elementType.maxLength}) elements`);
  }
}

export {
  VirtualArray,
  IntVirtualArray,
  FixedTextVirtualArray,
  openVirtualArray,
  type VirtualArrayOptions,
  type ArrayTarget
};
