/**
 * Interactive session: runs parsed commands against at most one open array
 */

import { NoArrayOpenError, VirtualArrayError } from '../errors';
import { type ElementType } from '../types/common';
import { logger } from '../utils/logger';
import {
  FixedTextVirtualArray,
  IntVirtualArray,
  openVirtualArray,
  type VirtualArrayOptions
} from '../virtual-array';
import { parseCommand, parseIntValue, type Command } from './command-parser';

/**
 * Session options
 */
export interface SessionOptions extends VirtualArrayOptions {
  /** Receives every line of output */
  output: (line: string) => void;
}

type OpenArray = IntVirtualArray | FixedTextVirtualArray;

/**
 * Render an element type the way Create accepts it
 */
export function formatElementType(elementType: ElementType): string {
  switch (elementType.kind) {
    case 'int':
      return 'int';
    case 'char':
      return `char(${elementType.length})`;
    case 'varchar':
      return `varchar(${elementType.maxLength})`;
  }
}

function formatValue(value: number | string): string {
  return typeof value === 'number' ? String(value) : JSON.stringify(value);
}

export class ArraySession {
  private array: OpenArray | null = null;
  private path: string | null = null;

  constructor(private readonly options: SessionOptions) {}

  /**
   * Close whatever is open and create or open the array at `path`
   */
  open(path: string, elementType: ElementType, size: number): void {
    this.close();
    this.array = openVirtualArray(path, elementType, size, { bufferPages: this.options.bufferPages });
    this.path = path;
    this.options.output(`Array ready: ${path} (${formatElementType(elementType)} x ${size})`);
  }

  /**
   * Run one command line
   * @returns false once the session should end
   */
  execute(line: string): boolean {
    try {
      return this._run(parseCommand(line), line);
    } catch (error) {
      if (error instanceof VirtualArrayError) {
        logger.debug(`Command failed: ${line}`, error);
        this.options.output(`Error: ${error.message}`);
        return true;
      }
      throw error;
    }
  }

  /**
   * Close the open array, if any
   */
  close(): void {
    if (!this.array) return;
    const array = this.array;
    this.array = null;
    this.path = null;
    array.close();
  }

  /**
   * Path of the open array
   */
  getPath(): string | null {
    return this.path;
  }

  private _run(command: Command, line: string): boolean {
    const { output } = this.options;
    switch (command.type) {
      case 'empty':
        return true;

      case 'exit':
        this.close();
        return false;

      case 'create':
        this.open(command.path, command.elementType, command.size);
        return true;

      case 'input': {
        const array = this._requireArray();
        if (array instanceof IntVirtualArray) {
          const value = parseIntValue(command.value, line);
          array.write(command.index, value);
          output(`Written: [${command.index}] = ${formatValue(value)}`);
        } else {
          const stored = array.normalize(command.value);
          array.write(command.index, stored);
          output(`Written: [${command.index}] = ${formatValue(stored)}`);
        }
        return true;
      }

      case 'print': {
        const value = this._requireArray().read(command.index);
        output(`Element [${command.index}] = ${formatValue(value)}`);
        return true;
      }
    }
  }

  private _requireArray(): OpenArray {
    if (!this.array) {
      throw new NoArrayOpenError();
    }
    return this.array;
  }
}
