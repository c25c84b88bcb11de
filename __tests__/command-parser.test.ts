/**
 * Command parsing tests
 */

import {
  parseArraySize,
  parseCommand,
  parseElementType,
  parseIntValue
} from '../src/cli/command-parser';
import {
  BadCreationParametersError,
  CommandSyntaxError,
  UnsupportedElementKindError
} from '../src/errors';

describe('parseElementType', () => {
  test('should parse the three element types', () => {
    expect(parseElementType('int')).toEqual({ kind: 'int' });
    expect(parseElementType('INT')).toEqual({ kind: 'int' });
    expect(parseElementType('char(16)')).toEqual({ kind: 'char', length: 16 });
    expect(parseElementType('varchar(255)')).toEqual({ kind: 'varchar', maxLength: 255 });
  });

  test('should reject unknown types', () => {
    expect(() => parseElementType('float')).toThrow(UnsupportedElementKindError);
    expect(() => parseElementType('char')).toThrow('Unsupported element type: char');
    expect(() => parseElementType('char(-1)')).toThrow(UnsupportedElementKindError);
  });

  test('should reject a zero length', () => {
    expect(() => parseElementType('char(0)')).toThrow(BadCreationParametersError);
  });
});

describe('parseArraySize', () => {
  test('should accept positive integers only', () => {
    expect(parseArraySize('5000')).toBe(5000);
    expect(() => parseArraySize('0')).toThrow(BadCreationParametersError);
    expect(() => parseArraySize('-5')).toThrow(BadCreationParametersError);
    expect(() => parseArraySize('1e3')).toThrow(BadCreationParametersError);
  });
});

describe('parseIntValue', () => {
  test('should accept signed 32-bit integers', () => {
    expect(parseIntValue('42', '')).toBe(42);
    expect(parseIntValue('-2147483648', '')).toBe(-2147483648);
    expect(parseIntValue('+7', '')).toBe(7);
  });

  test('should reject anything else', () => {
    expect(() => parseIntValue('2147483648', '')).toThrow('Invalid integer value "2147483648"');
    expect(() => parseIntValue('4.2', '')).toThrow(CommandSyntaxError);
    expect(() => parseIntValue('abc', '')).toThrow(CommandSyntaxError);
  });
});

describe('parseCommand', () => {
  test('should parse Create', () => {
    expect(parseCommand('Create data/names.dat char(8) 1000')).toEqual({
      type: 'create',
      path: 'data/names.dat',
      elementType: { kind: 'char', length: 8 },
      size: 1000
    });
  });

  test('should parse Input with the rest of the line as value', () => {
    expect(parseCommand('Input 12 34')).toEqual({ type: 'input', index: 12, value: '34' });
    expect(parseCommand('input  3   two words ')).toEqual({ type: 'input', index: 3, value: 'two words' });
    expect(parseCommand('Input 3 " padded "')).toEqual({ type: 'input', index: 3, value: ' padded ' });
    expect(parseCommand('Input 3 ""')).toEqual({ type: 'input', index: 3, value: '' });
  });

  test('should parse Print and Exit', () => {
    expect(parseCommand('Print 4999')).toEqual({ type: 'print', index: 4999 });
    expect(parseCommand('EXIT')).toEqual({ type: 'exit' });
  });

  test('should treat a blank line as empty', () => {
    expect(parseCommand('   ')).toEqual({ type: 'empty' });
  });

  test('should report malformed commands', () => {
    expect(() => parseCommand('Input 5')).toThrow('Usage: Input <index> <value>');
    expect(() => parseCommand('Print')).toThrow('Usage: Print <index>');
    expect(() => parseCommand('Print x')).toThrow('Invalid index "x"');
    expect(() => parseCommand('Print -1')).toThrow(CommandSyntaxError);
    expect(() => parseCommand('Create a.dat int')).toThrow('Usage: Create <path> <type> <size>');
    expect(() => parseCommand('Dump 1')).toThrow('Unknown command "Dump"');
  });
});
