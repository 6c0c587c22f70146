import { Register } from '../hardware/register';
import { type Memory } from '../hardware/memory';
import { conditionFor, signExtend } from '../utils/bits';

/** The state an opcode handler reads and mutates. */
export interface Cpu {
  readonly registers: Uint16Array;
  readonly memory: Memory;
}

export function updateFlags(cpu: Cpu, r: number): void {
  cpu.registers[Register.R_COND] = conditionFor(cpu.registers[r]);
}

export function add(cpu: Cpu, instr: number): void {
  const { registers } = cpu;
  /* destination register (DR) */
  const r0 = (instr >> 9) & 0x7;
  /* first operand (SR1) */
  const r1 = (instr >> 6) & 0x7;
  /* whether we are in immediate mode */
  const immFlag = (instr >> 5) & 0x1;

  if (immFlag) {
    const imm5 = signExtend(instr & 0x1f, 5);
    registers[r0] = registers[r1] + imm5;
  } else {
    const r2 = instr & 0x7;
    registers[r0] = registers[r1] + registers[r2];
  }

  updateFlags(cpu, r0);
}

export function bitwiseAnd(cpu: Cpu, instr: number): void {
  const { registers } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const r1 = (instr >> 6) & 0x7;
  const immFlag = (instr >> 5) & 0x1;

  if (immFlag) {
    const imm5 = signExtend(instr & 0x1f, 5);
    registers[r0] = registers[r1] & imm5;
  } else {
    const r2 = instr & 0x7;
    registers[r0] = registers[r1] & registers[r2];
  }

  updateFlags(cpu, r0);
}

export function bitwiseNot(cpu: Cpu, instr: number): void {
  const { registers } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const r1 = (instr >> 6) & 0x7;

  registers[r0] = ~registers[r1];

  updateFlags(cpu, r0);
}

export function branch(cpu: Cpu, instr: number): void {
  const { registers } = cpu;
  const pcOffset = signExtend(instr & 0x1ff, 9);
  /* n, z and p line up with FL_NEG, FL_ZRO and FL_POS */
  const condFlag = (instr >> 9) & 0x7;
  if (condFlag & registers[Register.R_COND]) {
    registers[Register.R_PC] += pcOffset;
  }
}

export function jump(cpu: Cpu, instr: number): void {
  /* Also handles RET */
  const r1 = (instr >> 6) & 0x7;
  cpu.registers[Register.R_PC] = cpu.registers[r1];
}

export function jumpRegister(cpu: Cpu, instr: number): void {
  const { registers } = cpu;
  const longFlag = (instr >> 11) & 1;
  const returnAddress = registers[Register.R_PC];

  if (longFlag) {
    const longPCOffset = signExtend(instr & 0x7ff, 11);
    registers[Register.R_PC] += longPCOffset; /* JSR */
  } else {
    const r1 = (instr >> 6) & 0x7;
    registers[Register.R_PC] = registers[r1]; /* JSRR */
  }
  /* written last so that JSRR R7 still jumps through the old link */
  registers[Register.R_R7] = returnAddress;
}

export function load(cpu: Cpu, instr: number): void {
  const { registers, memory } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const pcOffset = signExtend(instr & 0x1ff, 9);
  registers[r0] = memory.read(registers[Register.R_PC] + pcOffset);

  updateFlags(cpu, r0);
}

export function loadIndirect(cpu: Cpu, instr: number): void {
  const { registers, memory } = cpu;
  /* destination register (DR) */
  const r0 = (instr >> 9) & 0x7;
  /* PCoffset 9*/
  const pcOffset = signExtend(instr & 0x1ff, 9);

  /* add pc_offset to the current PC, look at that memory location to get the final address */
  registers[r0] = memory.read(memory.read(registers[Register.R_PC] + pcOffset));

  updateFlags(cpu, r0);
}

export function loadRegister(cpu: Cpu, instr: number): void {
  const { registers, memory } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const r1 = (instr >> 6) & 0x7;
  const offset = signExtend(instr & 0x3f, 6);
  registers[r0] = memory.read(registers[r1] + offset);

  updateFlags(cpu, r0);
}

export function loadEffectiveAddress(cpu: Cpu, instr: number): void {
  const { registers } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const pcOffset = signExtend(instr & 0x1ff, 9);
  registers[r0] = registers[Register.R_PC] + pcOffset;

  updateFlags(cpu, r0);
}

export function store(cpu: Cpu, instr: number): void {
  const { registers, memory } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const pcOffset = signExtend(instr & 0x1ff, 9);
  memory.write(registers[Register.R_PC] + pcOffset, registers[r0]);
}

export function storeIndirect(cpu: Cpu, instr: number): void {
  const { registers, memory } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const pcOffset = signExtend(instr & 0x1ff, 9);
  memory.write(memory.read(registers[Register.R_PC] + pcOffset), registers[r0]);
}

export function storeRegister(cpu: Cpu, instr: number): void {
  const { registers, memory } = cpu;
  const r0 = (instr >> 9) & 0x7;
  const r1 = (instr >> 6) & 0x7;
  const offset = signExtend(instr & 0x3f, 6);
  memory.write(registers[r1] + offset, registers[r0]);
}
