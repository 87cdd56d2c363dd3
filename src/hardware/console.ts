import { closeSync, constants, openSync, readSync } from 'fs';
import { keyIn } from 'readline-sync';
import { InputExhaustedError } from '../errors';

/**
 * Keyboard side of the console, as seen by the memory-mapped device and the
 * traps.
 */
export interface KeyboardSource {
  /**
   * Returns a pending character without waiting, or undefined when none is
   * ready.
   */
  poll(): number | undefined;
  /** Waits for one character. Nothing is echoed. */
  read(): number;
}

export interface ConsoleOutput {
  write(data: number[]): void;
}

export type Console = KeyboardSource & ConsoleOutput;

export interface TerminalConsoleOptions {
  /** character source, the process's stdin unless given */
  inputPath?: string;
  /**
   * Read blocking keys through readline-sync. Defaults to true only for the
   * process's own stdin when it is a terminal.
   */
  interactive?: boolean;
}

const STDIN_PATH = '/dev/stdin';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Console backed by the host. Keys are read from one byte source, opened
 * non-blocking so the keyboard status register can poll it.
 */
export class TerminalConsole implements Console {
  private readonly inputPath: string;
  private readonly interactive: boolean;
  private readonly pollFd: number;
  /* opened on the first blocking read that finds nothing pending */
  private waitFd: number | undefined;
  private readonly buf = Buffer.alloc(1);

  constructor(options: TerminalConsoleOptions = {}) {
    this.inputPath = options.inputPath ?? STDIN_PATH;
    this.interactive =
      options.interactive ??
      (options.inputPath === undefined && process.stdin.isTTY === true);
    this.pollFd = openSync(
      this.inputPath,
      constants.O_RDONLY | constants.O_NONBLOCK
    );
  }

  public poll(): number | undefined {
    const key = this.readFrom(this.pollFd);
    return key === null ? undefined : key;
  }

  public read(): number {
    if (this.interactive) {
      const input = keyIn('', { hideEchoBack: true, mask: '' });
      return input.length > 0 ? input.charCodeAt(0) : 0;
    }

    let key = this.readFrom(this.pollFd);
    if (key === undefined) {
      // only pipes and terminals report "nothing yet"; they have no offset,
      // so a second descriptor sees the same bytes
      this.waitFd ??= openSync(this.inputPath, 'r');
      key = this.readFrom(this.waitFd);
    }
    if (key === null || key === undefined) {
      throw new InputExhaustedError();
    }
    return key;
  }

  public write(data: number[]): void {
    process.stdout.write(Buffer.from(data));
  }

  public close(): void {
    closeSync(this.pollFd);
    if (this.waitFd !== undefined) {
      closeSync(this.waitFd);
      this.waitFd = undefined;
    }
  }

  /** A byte, undefined when none is pending yet, null at end of input. */
  private readFrom(fd: number): number | undefined | null {
    let bytesRead: number;
    try {
      bytesRead = readSync(fd, this.buf, 0, 1, null);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EAGAIN') {
        return undefined;
      }
      throw err;
    }
    return bytesRead === 1 ? this.buf[0] : null;
  }
}
