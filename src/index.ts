/**
 * @fileoverview Paged virtual array
 * @description Fixed-element-size arrays larger than memory, stored in a single swap
 * file and served through a small LRU page buffer.
 *
 * @example
 * import { openVirtualArray } from 'paged-virtual-array';
 *
 * const names = openVirtualArray('names.dat', { kind: 'char', length: 16 }, 10000);
 * names.write(17, 'a name longer than sixteen characters');
 * names.read(17); // 'a name longer th'
 * names.read(18); // ''
 * names.close();
 */

import { IntVirtualArray, FixedTextVirtualArray, VirtualArray, openVirtualArray } from './virtual-array';
import { PageBuffer } from './page-buffer';
import { PageStore } from './page-store';
import { Page } from './page';
import { PageStorage } from './storage/page-storage';
import { FilePageStorage } from './storage/file-page-storage';
import { MemoryPageStorage } from './storage/memory-page-storage';
import { IntCodec, intCodec } from './codecs/int-codec';
import { FixedTextCodec } from './codecs/fixed-text-codec';
import { ArraySession } from './cli/session';
import { parseCommand, parseElementType } from './cli/command-parser';
import { logger, createLogger, setDebug } from './utils/logger';

export {
  // Arrays
  VirtualArray,
  IntVirtualArray,
  FixedTextVirtualArray,
  openVirtualArray,

  // Paging engine
  PageBuffer,
  PageStore,
  Page,

  // Storage implementations
  PageStorage,
  FilePageStorage,
  MemoryPageStorage,

  // Cell codecs
  IntCodec,
  intCodec,
  FixedTextCodec,

  // Command layer
  ArraySession,
  parseCommand,
  parseElementType,

  // Logging
  logger,
  createLogger,
  setDebug
};

export type { VirtualArrayOptions, ArrayTarget } from './virtual-array';
export type { Command } from './cli/command-parser';
export type { SessionOptions } from './cli/session';
export type { Logger } from './utils/logger';
export type {
  ElementKind,
  ElementType,
  CellCodec,
  PageContent,
  PageBufferStats,
  VirtualArrayStats
} from './types/common';

export * from './errors';
export * from './constants';
