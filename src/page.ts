/**
 * One page slot of the buffer
 */

import { CELLS_PER_PAGE } from './constants';
import { type PageContent } from './types/common';

/**
 * A buffer slot holding the decoded cells of one page, its presence bits,
 * and the state the replacement policy needs
 */
class Page<T> {
  public pageNumber: number = -1;
  public cells: T[];
  public presence: boolean[];
  public isDirty: boolean = false; // Differs from the on-disk copy
  public isValid: boolean = false; // Holds a loaded page
  public lastTouch: number = 0;

  constructor(private readonly defaultValue: T) {
    this.cells = new Array<T>(CELLS_PER_PAGE).fill(defaultValue);
    this.presence = new Array<boolean>(CELLS_PER_PAGE).fill(false);
  }

  /**
   * Install freshly loaded content; the page becomes valid and clean
   */
  load(pageNumber: number, content: PageContent<T>, touch: number): void {
    this.pageNumber = pageNumber;
    this.cells = content.cells;
    this.presence = content.presence;
    this.isDirty = false;
    this.isValid = true;
    this.lastTouch = touch;
  }

  /**
   * Value of a cell, or the default when it was never written
   */
  get(offset: number): T {
    return this.presence[offset] ? this.cells[offset] : this.defaultValue;
  }

  set(offset: number, value: T, touch: number): void {
    this.cells[offset] = value;
    this.presence[offset] = true;
    this.isDirty = true;
    this.lastTouch = touch;
  }
}

export { Page };
