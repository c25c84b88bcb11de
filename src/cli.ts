#!/usr/bin/env node
// ============================================================================
// varray: interactive shell over a paged virtual array
// ============================================================================
// Usage:
//   varray [path] [type] [size]     defaults: swapfile.dat int 5000
// Commands:
//   Create <path> <type> <size>     type: int | char(N) | varchar(N)
//   Input <index> <value>
//   Print <index>
//   Exit
// Set VARRAY_DEBUG=1 for paging logs.
// ============================================================================

import * as readline from 'readline';
import { parseArraySize, parseElementType } from './cli/command-parser';
import { ArraySession } from './cli/session';
import { VirtualArrayError } from './errors';
import { logger, setDebug } from './utils/logger';

const DEFAULT_PATH = 'swapfile.dat';
const DEFAULT_TYPE = 'int';
const DEFAULT_SIZE = '5000';
const PROMPT = 'VM> ';

function main(argv: string[]): void {
  setDebug(Boolean(process.env.VARRAY_DEBUG));

  const [path = DEFAULT_PATH, type = DEFAULT_TYPE, size = DEFAULT_SIZE] = argv;
  const session = new ArraySession({ output: line => process.stdout.write(`${line}\n`) });

  try {
    session.open(path, parseElementType(type), parseArraySize(size));
  } catch (error) {
    if (!(error instanceof VirtualArrayError)) throw error;
    logger.error(error.message);
    process.exitCode = 1;
    return;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: PROMPT });
  rl.on('line', line => {
    if (session.execute(line)) {
      rl.prompt();
    } else {
      rl.close();
    }
  });
  // End of input and Exit both land here
  rl.on('close', () => {
    try {
      session.close();
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  });
  rl.prompt();
}

main(process.argv.slice(2));
