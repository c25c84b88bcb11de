/**
 * Base storage interface - a byte-addressed medium the page store lays pages out on
 */
abstract class PageStorage {
  /**
   * Whether the medium was empty when it was opened (a new array must be laid out)
   */
  abstract readonly created: boolean;

  /**
   * Human-readable name used in errors and logs
   */
  abstract readonly description: string;

  /**
   * Current size in bytes
   */
  abstract size(): number;

  /**
   * Read up to `length` bytes at `position` into `target`
   * @returns Number of bytes actually read
   */
  abstract read(target: Buffer, position: number, length: number): number;

  /**
   * Write `data` at `position`
   * @returns Number of bytes actually written
   */
  abstract write(data: Buffer, position: number): number;

  /**
   * Force written bytes to durable storage
   */
  abstract sync(): void;

  /**
   * Release the medium
   */
  abstract close(): void;
}

export { PageStorage };
