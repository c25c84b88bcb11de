/**
 * Parsing of interactive commands
 *
 *   Create <path> <type> <size>   type: int | char(N) | varchar(N)
 *   Input <index> <value>
 *   Print <index>
 *   Exit
 */

import { INT32_MAX, INT32_MIN } from '../constants';
import {
  BadCreationParametersError,
  CommandSyntaxError,
  UnsupportedElementKindError
} from '../errors';
import { type ElementType } from '../types/common';

/**
 * A parsed command line
 */
export type Command =
  | { type: 'create'; path: string; elementType: ElementType; size: number }
  | { type: 'input'; index: number; value: string }
  | { type: 'print'; index: number }
  | { type: 'exit' }
  | { type: 'empty' };

const DIGITS = /^\d+$/;
const SIGNED_DIGITS = /^[+-]?\d+$/;
const SIZED_TYPE = /^(char|varchar)\((\d+)\)$/i;

/**
 * Parse an element type such as `int`, `char(16)` or `varchar(255)`
 */
export function parseElementType(spec: string): ElementType {
  const trimmed = spec.trim();
  if (trimmed.toLowerCase() === 'int') {
    return { kind: 'int' };
  }
  const match = SIZED_TYPE.exec(trimmed);
  if (!match) {
    throw new UnsupportedElementKindError(trimmed);
  }
  const length = Number(match[2]);
  if (length < 1 || !Number.isSafeInteger(length)) {
    throw new BadCreationParametersError(`length in ${trimmed} must be a positive integer`);
  }
  return match[1].toLowerCase() === 'char'
    ? { kind: 'char', length }
    : { kind: 'varchar', maxLength: length };
}

/**
 * Parse an array size given at creation time
 */
export function parseArraySize(text: string): number {
  const size = DIGITS.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(size) || size < 1) {
    throw new BadCreationParametersError(`array size must be a positive integer, got "${text}"`);
  }
  return size;
}

/**
 * Parse a non-negative element index
 */
export function parseIndex(text: string, line: string): number {
  const index = DIGITS.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(index)) {
    throw new CommandSyntaxError(line, `Invalid index "${text}"`);
  }
  return index;
}

/**
 * Parse a signed 32-bit integer value
 */
export function parseIntValue(text: string, line: string): number {
  const value = SIGNED_DIGITS.test(text) ? Number(text) : NaN;
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new CommandSyntaxError(line, `Invalid integer value "${text}"`);
  }
  return value;
}

/**
 * Value text after the index: surrounding double quotes are removed so that
 * empty strings and edge spaces can be written
 */
function unquote(text: string): string {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"') ? text.slice(1, -1) : text;
}

/**
 * Parse one command line. Keywords are case-insensitive.
 */
export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { type: 'empty' };
  }
  const tokens = trimmed.split(/\s+/);
  const keyword = tokens[0].toLowerCase();

  switch (keyword) {
    case 'create':
      if (tokens.length !== 4) {
        throw new CommandSyntaxError(line, 'Usage: Create <path> <type> <size>');
      }
      return {
        type: 'create',
        path: tokens[1],
        elementType: parseElementType(tokens[2]),
        size: parseArraySize(tokens[3])
      };

    case 'input': {
      const match = /^\S+\s+(\S+)\s+(.*)$/.exec(trimmed);
      if (!match) {
        throw new CommandSyntaxError(line, 'Usage: Input <index> <value>');
      }
      return { type: 'input', index: parseIndex(match[1], line), value: unquote(match[2]) };
    }

    case 'print':
      if (tokens.length !== 2) {
        throw new CommandSyntaxError(line, 'Usage: Print <index>');
      }
      return { type: 'print', index: parseIndex(tokens[1], line) };

    case 'exit':
      return { type: 'exit' };

    default:
      throw new CommandSyntaxError(line, `Unknown command "${tokens[0]}"`);
  }
}
