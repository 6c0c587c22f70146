import { MEMORY_SIZE } from '../constants/memory';
import { HALT_MESSAGE, IN_PROMPT, Trap } from '../constants/traps';
import { type DisplayDevice } from '../hardware/display';
import { END_OF_INPUT, type KeyboardDevice } from '../hardware/keyboard';
import { Register } from '../hardware/register';
import { type Cpu } from './instructions';

export interface TrapContext extends Cpu {
  readonly keyboard: KeyboardDevice;
  readonly display: DisplayDevice;
  halt(): void;
}

function putString(display: DisplayDevice, text: string): void {
  display.write([...Buffer.from(text, 'latin1')]);
}

/** Reads a zero-terminated string of words starting at `address`, without touching devices. */
function readWords(ctx: TrapContext, address: number): number[] {
  const words: number[] = [];
  for (let i = 0; i < MEMORY_SIZE; i++) {
    const word = ctx.memory.peek(address + i);
    if (word === 0) {
      break;
    }
    words.push(word);
  }
  return words;
}

/**
 * Runs the service routine selected by the low byte of `instr`. Vectors
 * outside the table are ignored.
 */
export function handleTrap(ctx: TrapContext, instr: number): void {
  const { registers, keyboard, display } = ctx;

  switch (instr & 0xff) {
    case Trap.TRAP_GETC: {
      /* read a single ASCII char */
      registers[Register.R_R0] = keyboard.getChar();
      break;
    }
    case Trap.TRAP_OUT: {
      display.write([registers[Register.R_R0] & 0xff]);
      display.flush();
      break;
    }
    case Trap.TRAP_PUTS: {
      /* one char per word */
      const words = readWords(ctx, registers[Register.R_R0]);
      display.write(words.map((word) => word & 0xff));
      display.flush();
      break;
    }
    case Trap.TRAP_IN: {
      putString(display, IN_PROMPT);
      display.flush();
      const c = keyboard.getChar();
      if (c !== END_OF_INPUT) {
        display.write([c & 0xff]);
      }
      display.flush();
      registers[Register.R_R0] = c;
      break;
    }
    case Trap.TRAP_PUTSP: {
      /* one char per byte (two bytes per word), low byte first */
      const buf: number[] = [];
      for (const word of readWords(ctx, registers[Register.R_R0])) {
        buf.push(word & 0xff);
        const char2 = word >> 8;
        if (char2) {
          buf.push(char2);
        }
      }
      display.write(buf);
      display.flush();
      break;
    }
    case Trap.TRAP_HALT: {
      putString(display, HALT_MESSAGE);
      display.flush();
      ctx.halt();
      break;
    }
  }
}
