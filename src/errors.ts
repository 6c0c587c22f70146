import { toHex } from './utils/format';

export class ImageLoadError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load image: ${path} (${reason})`, options);
    this.name = 'ImageLoadError';
  }
}

/** Raised when execution reaches RES, RTI or any opcode without a handler. */
export class IllegalOpcodeError extends Error {
  constructor(public readonly opcode: number, public readonly address: number) {
    super(`Illegal opcode ${toHex(opcode, 1)} at ${toHex(address)}`);
    this.name = 'IllegalOpcodeError';
  }
}
