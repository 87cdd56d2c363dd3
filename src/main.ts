#!/usr/bin/env node
import { LC3Error } from './errors';
import { TerminalConsole, type Console } from './hardware/console';
import { LC3VirtualMachine } from './lc3-vm';

const USAGE = 'lc3 [image-file1] ...';

/**
 * Loads every image in `argv`, runs the machine and returns the exit code.
 * Without `terminal` the host console is opened, and closed again on return.
 */
export function main(argv: string[], terminal?: Console): number {
  if (argv.length < 1) {
    console.error(USAGE);
    return 2;
  }

  const host = terminal === undefined ? new TerminalConsole() : undefined;
  try {
    const vm = new LC3VirtualMachine({ console: terminal ?? host });
    for (const imagePath of argv) {
      const result = vm.loadImageFile(imagePath);
      if (!result.ok) {
        console.error(`failed to load image: ${imagePath}`);
        console.error(result.error.cause ?? result.error);
      }
    }

    vm.run();
    return 0;
  } catch (err) {
    // bad opcodes and input that ran out
    if (err instanceof LC3Error) {
      console.error(err.message);
      return 1;
    }
    throw err;
  } finally {
    host?.close();
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
