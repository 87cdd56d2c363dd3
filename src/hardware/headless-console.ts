import { InputExhaustedError } from '../errors';
import type { Console } from './console';

/**
 * Console without a terminal: keys come from a queue and everything written
 * is captured. Used by tests and by embedders that drive the machine
 * themselves.
 */
export class HeadlessConsole implements Console {
  private keyQueue: number[] = [];
  private output: number[] = [];

  constructor(input = '') {
    this.sendKeys(input);
  }

  public sendKeys(keys: string): void {
    for (const char of keys) {
      this.keyQueue.push(char.charCodeAt(0) & 0xff);
    }
  }

  public hasKey(): boolean {
    return this.keyQueue.length > 0;
  }

  public poll(): number | undefined {
    return this.keyQueue.shift();
  }

  public read(): number {
    const key = this.keyQueue.shift();
    if (key === undefined) {
      throw new InputExhaustedError();
    }
    return key;
  }

  public write(data: number[]): void {
    for (const byte of data) {
      this.output.push(byte & 0xff);
    }
  }

  /** Everything written so far, decoded one byte per character. */
  public getOutput(): string {
    return Buffer.from(this.output).toString('latin1');
  }

  public clearOutput(): void {
    this.output = [];
  }
}
