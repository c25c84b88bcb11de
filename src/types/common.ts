/**
 * @fileoverview Common types shared across the virtual array
 * @description Element types, the cell codec contract and statistics shapes
 */

// =================== ELEMENT TYPES ===================

/**
 * Kinds of element an array can hold
 */
export type ElementKind = 'int' | 'char' | 'varchar';

/**
 * Element type chosen at creation time
 */
export type ElementType =
  | { kind: 'int' }
  | { kind: 'char'; length: number }
  | { kind: 'varchar'; maxLength: number };

// =================== CELL CODEC ===================

/**
 * Converts one element to and from its fixed-width slot in a page's data region
 */
export interface CellCodec<T> {
  readonly kind: ElementKind;
  /** Slot width in bytes */
  readonly width: number;
  /** Size of a page's data region in bytes */
  readonly dataRegionSize: number;
  /** Value read from a cell that was never written */
  readonly defaultValue: T;

  /**
   * Bring a value into the representable domain, or throw InvalidValueError
   */
  normalize(value: T): T;
  encode(value: T, target: Buffer, offset: number): void;
  decode(source: Buffer, offset: number): T;
}

// =================== PAGE CONTENT ===================

/**
 * Decoded content of one page as stored on disk
 */
export interface PageContent<T> {
  presence: boolean[];
  cells: T[];
}

// =================== STATS ===================

/**
 * Page buffer counters
 */
export interface PageBufferStats {
  capacity: number;
  residentPages: number;
  dirtyPages: number;
  hits: number;
  misses: number;
  evictions: number;
  writeBacks: number;
}

/**
 * Virtual array statistics
 */
export interface VirtualArrayStats extends PageBufferStats {
  arraySize: number;
  numPages: number;
  fileSize: number;
}
