import { isatty } from 'tty';
import { readSync } from 'fs';
import { keyIn } from 'readline-sync';
import { type DisplayDevice } from '../hardware/display';
import { END_OF_INPUT, type KeyboardDevice } from '../hardware/keyboard';

const STDIN_FD = 0;
const CTRL_C = 0x03;

export interface TerminalControls {
  isTTY: () => boolean;
  setRawMode: (mode: boolean) => void;
}

const stdinControls: TerminalControls = {
  isTTY: () => isatty(STDIN_FD),
  setRawMode: (mode) => {
    process.stdin.setRawMode(mode);
  },
};

/**
 * Raw-mode ownership for the controlling terminal. Once acquired, the
 * terminal is restored on `release` or on any process exit.
 */
export class TerminalSession {
  private active = false;
  private readonly restore = (): void => this.release();

  constructor(private readonly controls: TerminalControls = stdinControls) {}

  public get isTTY(): boolean {
    return this.controls.isTTY();
  }

  public acquire(): void {
    if (!this.isTTY) {
      return;
    }
    this.controls.setRawMode(true);
    if (!this.active) {
      process.on('exit', this.restore);
      this.active = true;
    }
  }

  public release(): void {
    if (!this.active) {
      return;
    }
    this.controls.setRawMode(false);
    process.removeListener('exit', this.restore);
    this.active = false;
  }

  /** Ctrl-C while in raw mode: restore the terminal and leave with -2. */
  public interrupt(): never {
    this.release();
    process.stdout.write('\n');
    process.exit(-2);
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** One byte through `read`, `null` if none is ready, `END_OF_INPUT` at end of stream. */
export function readByteFrom(read: (buf: Buffer) => number): number | null {
  const buf = Buffer.alloc(1);
  try {
    return read(buf) === 1 ? buf[0] : END_OF_INPUT;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EAGAIN') {
      return null;
    }
    throw err;
  }
}

function readStdinByte(): number | null {
  return readByteFrom((buf) => readSync(STDIN_FD, buf, 0, 1, null));
}

/** First UTF-8 byte of a key returned by `keyIn`. */
export function keyToByte(key: string): number {
  /* Enter comes back as an empty key */
  return key.length > 0 ? Buffer.from(key, 'utf8')[0] : 0x0a;
}

function readTerminalKey(): number {
  return keyToByte(keyIn('', { hideEchoBack: true, mask: '' }));
}

export class TerminalKeyboard implements KeyboardDevice {
  private readonly pending: number[] = [];
  private ended = false;

  constructor(
    private readonly session: TerminalSession,
    private readonly readByte: () => number | null = readStdinByte,
    private readonly readKey: () => number = readTerminalKey
  ) {}

  public hasKey(): boolean {
    if (this.pending.length === 0) {
      this.pollInterrupt();
    }
    return this.pending.length > 0;
  }

  /**
   * Reads whatever byte is waiting so that Ctrl-C is seen even while the
   * program never asks for input. Other keys stay queued for `getChar`.
   */
  public pollInterrupt(): void {
    if (!this.ended) {
      this.accept(this.readByte());
    }
  }

  public getChar(): number {
    while (this.pending.length === 0 && !this.ended) {
      if (this.session.isTTY) {
        const key = this.readKey();
        /* keyIn hands the terminal back in cooked mode */
        this.session.acquire();
        this.accept(key);
      } else {
        this.accept(this.readByte());
      }
    }
    return this.pending.shift() ?? END_OF_INPUT;
  }

  private accept(byte: number | null): void {
    if (byte === null) {
      return;
    }
    if (byte === END_OF_INPUT) {
      this.ended = true;
      return;
    }
    if (byte === CTRL_C) {
      this.session.interrupt();
    }
    this.pending.push(byte);
  }
}

/** Buffers trap output and hands it to stdout on flush. */
export class TerminalDisplay implements DisplayDevice {
  private buf: number[] = [];

  public write(data: number[]): void {
    for (const byte of data) {
      this.buf.push(byte & 0xff);
    }
  }

  public flush(): void {
    if (this.buf.length === 0) {
      return;
    }
    process.stdout.write(Buffer.from(this.buf));
    this.buf = [];
  }
}
