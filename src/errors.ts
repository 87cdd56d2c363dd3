import { toHex } from './utils/bits';

export class LC3Error extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised when the dispatch loop fetches RTI or the reserved opcode. */
export class InvalidOpcodeError extends LC3Error {
  constructor(
    public readonly opcode: number,
    public readonly instruction: number,
    public readonly address: number
  ) {
    super(
      `bad opcode ${opcode} (instruction ${toHex(instruction)} at ${toHex(
        address
      )})`
    );
  }
}

export class ImageLoadError extends LC3Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class InputExhaustedError extends LC3Error {
  constructor() {
    super('no keyboard input left to read');
  }
}
