/**
 * Fixed-length text cells
 *
 * One byte per character (latin1). Longer strings are truncated without error;
 * shorter ones are padded with zero bytes, which decode strips again.
 */

import { CELLS_PER_PAGE, alignDataRegion } from '../constants';
import { BadCreationParametersError } from '../errors';
import { type CellCodec } from '../types/common';

class FixedTextCodec implements CellCodec<string> {
  readonly kind = 'char';
  readonly width: number;
  readonly dataRegionSize: number;
  readonly defaultValue = '';

  constructor(public readonly fixedLength: number) {
    if (!Number.isSafeInteger(fixedLength) || fixedLength < 1) {
      throw new BadCreationParametersError(`text length must be a positive integer, got ${fixedLength}`);
    }
    this.width = fixedLength;
    this.dataRegionSize = alignDataRegion(CELLS_PER_PAGE * fixedLength);
  }

  /**
   * The value exactly as a reload from disk would give it back: truncated,
   * one byte per character, trailing zero bytes dropped
   */
  normalize(value: string): string {
    const bytes = Buffer.from(this._truncate(value), 'latin1');
    return this._decodeRange(bytes, 0, bytes.length);
  }

  encode(value: string, target: Buffer, offset: number): void {
    target.fill(0, offset, offset + this.width);
    target.write(this._truncate(value), offset, this.width, 'latin1');
  }

  decode(source: Buffer, offset: number): string {
    return this._decodeRange(source, offset, offset + this.width);
  }

  private _truncate(value: string): string {
    return value.length > this.fixedLength ? value.slice(0, this.fixedLength) : value;
  }

  private _decodeRange(source: Buffer, start: number, end: number): string {
    while (end > start && source[end - 1] === 0) {
      end--;
    }
    return source.toString('latin1', start, end);
  }
}

export { FixedTextCodec };
