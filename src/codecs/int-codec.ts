/**
 * Signed 32-bit integer cells, little-endian
 */

import { CELLS_PER_PAGE, INT_SIZE, INT32_MAX, INT32_MIN, alignDataRegion } from '../constants';
import { InvalidValueError } from '../errors';
import { type CellCodec } from '../types/common';

class IntCodec implements CellCodec<number> {
  readonly kind = 'int';
  readonly width = INT_SIZE;
  readonly dataRegionSize = alignDataRegion(CELLS_PER_PAGE * INT_SIZE);
  readonly defaultValue = 0;

  normalize(value: number): number {
    if (!Number.isInteger(value)) {
      throw new InvalidValueError(value, 'not an integer');
    }
    if (value < INT32_MIN || value > INT32_MAX) {
      throw new InvalidValueError(value, `outside [${INT32_MIN}, ${INT32_MAX}]`);
    }
    // -0 would otherwise survive until the first reload
    return value === 0 ? 0 : value;
  }

  encode(value: number, target: Buffer, offset: number): void {
    target.writeInt32LE(value, offset);
  }

  decode(source: Buffer, offset: number): number {
    return source.readInt32LE(offset);
  }
}

/** Shared instance; the codec holds no state */
const intCodec = new IntCodec();

export { IntCodec, intCodec };
