/**
 * @fileoverview Fixed-capacity page buffer
 * @description Keeps up to `capacity` pages in memory. Lookup is a linear scan of
 * the slots; when all slots are valid the least recently touched one is evicted,
 * written back first if dirty. Touches are ordered by a logical clock.
 */

import { DEFAULT_BUFFER_PAGES } from './constants';
import { Page } from './page';
import { type PageStore } from './page-store';
import { type PageBufferStats } from './types/common';
import { logger } from './utils/logger';

class PageBuffer<T> {
  private readonly slots: Page<T>[] = [];
  private clock: number = 0;
  private hits: number = 0;
  private misses: number = 0;
  private evictions: number = 0;
  private writeBacks: number = 0;

  constructor(
    private readonly store: PageStore<T>,
    defaultValue: T,
    readonly capacity: number = DEFAULT_BUFFER_PAGES
  ) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    for (let i = 0; i < capacity; i++) {
      this.slots.push(new Page<T>(defaultValue));
    }
  }

  /**
   * Next logical timestamp
   */
  tick(): number {
    return ++this.clock;
  }

  /**
   * Return the slot holding `pageNumber`, loading it if needed
   */
  locateOrAdmit(pageNumber: number): Page<T> {
    const resident = this.slots.find(slot => slot.isValid && slot.pageNumber === pageNumber);
    if (resident) {
      resident.lastTouch = this.tick();
      this.hits++;
      return resident;
    }

    this.misses++;
    const target = this.slots.find(slot => !slot.isValid) ?? this._chooseVictim();
    const victim = target.isValid ? target.pageNumber : null;
    if (victim !== null && target.isDirty) {
      this._writeBack(target);
    }

    // Read before touching the slot so a failed load leaves it as it was
    const content = this.store.readPage(pageNumber);
    target.load(pageNumber, content, this.tick());
    if (victim !== null) {
      this.evictions++;
      logger.debug(`Evicted page ${victim}`);
    }
    logger.debug(`Loaded page ${pageNumber}`);
    return target;
  }

  /**
   * Write back every valid dirty slot
   */
  flush(): void {
    for (const slot of this.slots) {
      if (slot.isValid && slot.isDirty) {
        this._writeBack(slot);
      }
    }
  }

  /**
   * Page numbers currently resident, in slot order
   */
  residentPages(): number[] {
    return this.slots.filter(slot => slot.isValid).map(slot => slot.pageNumber);
  }

  /**
   * Whether `pageNumber` is resident and has unsaved changes
   */
  isDirty(pageNumber: number): boolean {
    return this.slots.some(slot => slot.isValid && slot.pageNumber === pageNumber && slot.isDirty);
  }

  getStats(): PageBufferStats {
    return {
      capacity: this.capacity,
      residentPages: this.slots.filter(slot => slot.isValid).length,
      dirtyPages: this.slots.filter(slot => slot.isValid && slot.isDirty).length,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      writeBacks: this.writeBacks
    };
  }

  /**
   * Least recently touched slot; the first one wins a tie
   */
  private _chooseVictim(): Page<T> {
    let victim = this.slots[0];
    for (const slot of this.slots) {
      if (slot.lastTouch < victim.lastTouch) {
        victim = slot;
      }
    }
    return victim;
  }

  private _writeBack(slot: Page<T>): void {
    this.store.writePage(slot.pageNumber, slot.presence, slot.cells);
    slot.isDirty = false;
    this.writeBacks++;
    logger.debug(`Wrote back page ${slot.pageNumber}`);
  }
}

export { PageBuffer };
