/**
 * Virtual array errors
 */

/** Base error class for the virtual array */
export class VirtualArrayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VirtualArrayError';
  }
}

/** Storage operations that can fail */
export type IoOperation =
  | 'create'
  | 'open'
  | 'stat'
  | 'header write'
  | 'header read'
  | 'bitmap read'
  | 'data read'
  | 'bitmap write'
  | 'data write'
  | 'sync'
  | 'close';

/** Storage could not be created or opened, or a region was read or written short */
export class IoError extends VirtualArrayError {
  constructor(
    public readonly operation: IoOperation,
    public readonly target: string,
    detail: string,
    public readonly expectedBytes?: number,
    public readonly actualBytes?: number,
    public readonly originalError?: unknown
  ) {
    super(
      `I/O error (${operation}) on ${target}: ${detail}` +
        (expectedBytes !== undefined ? ` (expected ${expectedBytes} bytes, got ${actualBytes ?? 0})` : '')
    );
    this.name = 'IoError';
  }

  /**
   * Wrap an fs error thrown by the runtime
   */
  static wrap(operation: IoOperation, target: string, error: unknown): IoError {
    const detail = error instanceof Error ? error.message : String(error);
    return new IoError(operation, target, detail, undefined, undefined, error);
  }
}

/** Existing file does not match the declared layout */
export class InvalidFileFormatError extends VirtualArrayError {
  constructor(
    public readonly target: string,
    public readonly reason: string
  ) {
    super(`Invalid file format for ${target}: ${reason}`);
    this.name = 'InvalidFileFormatError';
  }
}

/** Index outside [0, arraySize) */
export class IndexOutOfRangeError extends VirtualArrayError {
  constructor(
    public readonly index: number,
    public readonly arraySize: number
  ) {
    super(`Index ${index} is out of range for array of size ${arraySize}`);
    this.name = 'IndexOutOfRangeError';
  }
}

/** Value cannot be stored in a cell of this kind */
export class InvalidValueError extends VirtualArrayError {
  constructor(
    public readonly value: unknown,
    reason: string
  ) {
    super(`Invalid value ${JSON.stringify(value)}: ${reason}`);
    this.name = 'InvalidValueError';
  }
}

/** Operation attempted after close() */
export class ArrayClosedError extends VirtualArrayError {
  constructor(public readonly target: string) {
    super(`Array backed by ${target} is closed`);
    this.name = 'ArrayClosedError';
  }
}

/** Declared element kind with no implementation */
export class NotImplementedError extends VirtualArrayError {
  constructor(public readonly feature: string) {
    super(`${feature} is not implemented`);
    this.name = 'NotImplementedError';
  }
}

/** Element type string could not be parsed */
export class UnsupportedElementKindError extends VirtualArrayError {
  constructor(public readonly spec: string) {
    super(`Unsupported element type: ${spec}`);
    this.name = 'UnsupportedElementKindError';
  }
}

/** Size or length given at creation time is not usable */
export class BadCreationParametersError extends VirtualArrayError {
  constructor(reason: string) {
    super(`Bad creation parameters: ${reason}`);
    this.name = 'BadCreationParametersError';
  }
}

/** Command line could not be parsed */
export class CommandSyntaxError extends VirtualArrayError {
  constructor(
    public readonly line: string,
    reason: string
  ) {
    super(reason);
    this.name = 'CommandSyntaxError';
  }
}

/** Command needs an open array and none is open */
export class NoArrayOpenError extends VirtualArrayError {
  constructor() {
    super('No array is open. Use Create <path> <type> <size>');
    this.name = 'NoArrayOpenError';
  }
}
