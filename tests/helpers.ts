import { PC_START } from '../src/constants/memory';
import { BufferedDisplay } from '../src/hardware/display';
import { BufferedKeyboard } from '../src/hardware/keyboard';
import { VirtualMachine } from '../src/vm/machine';

export const asm = {
  addImm: (dr: number, sr1: number, imm5: number) => 0x1000 | (dr << 9) | (sr1 << 6) | 0x20 | (imm5 & 0x1f),
  addReg: (dr: number, sr1: number, sr2: number) => 0x1000 | (dr << 9) | (sr1 << 6) | sr2,
  andImm: (dr: number, sr1: number, imm5: number) => 0x5000 | (dr << 9) | (sr1 << 6) | 0x20 | (imm5 & 0x1f),
  andReg: (dr: number, sr1: number, sr2: number) => 0x5000 | (dr << 9) | (sr1 << 6) | sr2,
  not: (dr: number, sr: number) => 0x9000 | (dr << 9) | (sr << 6) | 0x3f,
  br: (nzp: number, offset9: number) => (nzp << 9) | (offset9 & 0x1ff),
  jmp: (base: number) => 0xc000 | (base << 6),
  ret: () => 0xc1c0,
  jsr: (offset11: number) => 0x4800 | (offset11 & 0x7ff),
  jsrr: (base: number) => 0x4000 | (base << 6),
  ld: (dr: number, offset9: number) => 0x2000 | (dr << 9) | (offset9 & 0x1ff),
  ldi: (dr: number, offset9: number) => 0xa000 | (dr << 9) | (offset9 & 0x1ff),
  ldr: (dr: number, base: number, offset6: number) => 0x6000 | (dr << 9) | (base << 6) | (offset6 & 0x3f),
  lea: (dr: number, offset9: number) => 0xe000 | (dr << 9) | (offset9 & 0x1ff),
  st: (sr: number, offset9: number) => 0x3000 | (sr << 9) | (offset9 & 0x1ff),
  sti: (sr: number, offset9: number) => 0xb000 | (sr << 9) | (offset9 & 0x1ff),
  str: (sr: number, base: number, offset6: number) => 0x7000 | (sr << 9) | (base << 6) | (offset6 & 0x3f),
  trap: (vector: number) => 0xf000 | (vector & 0xff),
};

/** Words for a zero-terminated string, one character per word. */
export function stringz(text: string): number[] {
  return [...text].map((c) => c.charCodeAt(0)).concat(0);
}

/** Builds an object image: big-endian origin followed by big-endian words. */
export function image(origin: number, words: number[]): Buffer {
  const buf = Buffer.alloc(2 + words.length * 2);
  buf.writeUInt16BE(origin, 0);
  words.forEach((word, i) => buf.writeUInt16BE(word, 2 + i * 2));
  return buf;
}

export function machineWith(program: number[], input: string | number[] = '') {
  const keyboard = new BufferedKeyboard(input);
  const display = new BufferedDisplay();
  const vm = new VirtualMachine({ keyboard, display });
  program.forEach((word, i) => vm.memory.write(PC_START + i, word));
  return { vm, keyboard, display };
}
