/**
 * Layout constants for the swap file
 */

/** Elements held by one page */
export const CELLS_PER_PAGE = 128;

/** Width of an integer cell in bytes */
export const INT_SIZE = 4;

/** Presence bitmap size in bytes (one bit per cell) */
export const BITMAP_SIZE_BYTES = Math.ceil(CELLS_PER_PAGE / 8);

/** Data regions are sized in multiples of this */
export const DATA_REGION_GRANULARITY = 512;

/** Default number of page slots kept in memory */
export const DEFAULT_BUFFER_PAGES = 3;

/** File signature: "VM" */
export const FILE_SIGNATURE = Buffer.from('VM', 'latin1');

/** Header size in bytes */
export const FILE_HEADER_SIZE = FILE_SIGNATURE.length;

/** Largest and smallest values an integer cell can hold */
export const INT32_MAX = 0x7fffffff;
export const INT32_MIN = -0x80000000;

/**
 * Round a raw data size up to the region granularity
 */
export function alignDataRegion(rawSize: number): number {
  return Math.ceil(rawSize / DATA_REGION_GRANULARITY) * DATA_REGION_GRANULARITY;
}

/**
 * Number of pages needed for an array of the given size
 */
export function pagesForSize(arraySize: number): number {
  return Math.ceil(arraySize / CELLS_PER_PAGE);
}
