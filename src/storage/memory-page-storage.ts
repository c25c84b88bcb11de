/**
 * In-memory storage implementation
 */

import { PageStorage } from './page-storage';

/**
 * In-memory storage for testing and scratch arrays.
 * Grows on write like a file; reads past the end come back short.
 */
class MemoryPageStorage extends PageStorage {
  readonly created: boolean;
  readonly description: string;
  private data: Buffer;
  private length: number;
  private closed: boolean = false;
  private syncCount: number = 0;

  constructor(initial?: Buffer, description: string = 'memory') {
    super();
    this.data = initial ? Buffer.from(initial) : Buffer.alloc(0);
    this.length = this.data.length;
    this.created = this.length === 0;
    this.description = description;
  }

  size(): number {
    return this.length;
  }

  read(target: Buffer, position: number, length: number): number {
    if (position >= this.length) return 0;
    const end = Math.min(position + length, this.length);
    return this.data.copy(target, 0, position, end);
  }

  write(data: Buffer, position: number): number {
    const end = position + data.length;
    if (end > this.data.length) {
      const grown = Buffer.alloc(Math.max(end, this.data.length * 2));
      this.data.copy(grown, 0, 0, this.length);
      this.data = grown;
    }
    data.copy(this.data, position);
    this.length = Math.max(this.length, end);
    return data.length;
  }

  sync(): void {
    this.syncCount++;
  }

  close(): void {
    this.closed = true;
  }

  /**
   * Copy of the stored bytes (useful for debugging/testing)
   */
  snapshot(): Buffer {
    return Buffer.from(this.data.subarray(0, this.length));
  }

  /**
   * Get storage statistics
   */
  getMemoryStats(): { totalBytes: number; syncCount: number; closed: boolean } {
    return {
      totalBytes: this.length,
      syncCount: this.syncCount,
      closed: this.closed
    };
  }
}

export { MemoryPageStorage };
