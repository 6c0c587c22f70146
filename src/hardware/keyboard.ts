/** Returned by a read once the input source is exhausted */
export const END_OF_INPUT = 0xffff;

/**
 * Character source behind the GETC/IN traps and the keyboard registers.
 * `hasKey` must not block; `getChar` blocks until a character arrives.
 */
export interface KeyboardDevice {
  hasKey(): boolean;
  getChar(): number;
}

/** Scripted keyboard fed from a string or byte list. */
export class BufferedKeyboard implements KeyboardDevice {
  private readonly queue: number[] = [];

  constructor(input: string | number[] = []) {
    this.push(input);
  }

  public push(input: string | number[]): void {
    if (typeof input === 'string') {
      this.queue.push(...Buffer.from(input, 'latin1'));
    } else {
      this.queue.push(...input.map((byte) => byte & 0xff));
    }
  }

  public get remaining(): number {
    return this.queue.length;
  }

  public hasKey(): boolean {
    return this.queue.length > 0;
  }

  public getChar(): number {
    return this.queue.shift() ?? END_OF_INPUT;
  }
}
