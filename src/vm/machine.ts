import { PC_START } from '../constants/memory';
import { OpCode } from '../constants/opcodes';
import { IllegalOpcodeError } from '../errors';
import { BufferedDisplay, type DisplayDevice } from '../hardware/display';
import { BufferedKeyboard, type KeyboardDevice } from '../hardware/keyboard';
import { Memory } from '../hardware/memory';
import { ConditionFlag, Register, createRegisters } from '../hardware/register';
import { type LoadedImage, loadImage, readImageFile } from '../loader/image';
import {
  add,
  bitwiseAnd,
  bitwiseNot,
  branch,
  jump,
  jumpRegister,
  load,
  loadEffectiveAddress,
  loadIndirect,
  loadRegister,
  store,
  storeIndirect,
  storeRegister,
} from './instructions';
import { type TrapContext, handleTrap } from './traps';

export enum MachineState {
  RUNNING = 'running',
  HALTED = 'halted',
  ABORTED = 'aborted',
}

export interface VmOptions {
  /** PC after construction and `reset` */
  pcStart?: number;
  keyboard?: KeyboardDevice;
  display?: DisplayDevice;
}

export const DEFAULT_OPTIONS: Required<Pick<VmOptions, 'pcStart'>> = {
  pcStart: PC_START,
};

export class VirtualMachine implements TrapContext {
  public readonly registers = createRegisters();
  public readonly memory: Memory;
  public readonly keyboard: KeyboardDevice;
  public readonly display: DisplayDevice;

  private readonly pcStart: number;
  private current = MachineState.RUNNING;

  constructor(options: VmOptions = {}) {
    this.pcStart = options.pcStart ?? DEFAULT_OPTIONS.pcStart;
    this.keyboard = options.keyboard ?? new BufferedKeyboard();
    this.display = options.display ?? new BufferedDisplay();
    this.memory = new Memory(this.keyboard);
    this.resetRegisters();
  }

  public get state(): MachineState {
    return this.current;
  }

  public loadImage(image: Buffer): LoadedImage {
    return loadImage(this.memory, image);
  }

  public loadImageFile(imagePath: string): LoadedImage {
    return readImageFile(this.memory, imagePath);
  }

  public reset(): void {
    this.memory.clear();
    this.resetRegisters();
    this.current = MachineState.RUNNING;
  }

  public halt(): void {
    this.current = MachineState.HALTED;
  }

  /** Steps until HALT or a fatal opcode. */
  public run(): MachineState {
    while (this.current === MachineState.RUNNING) {
      this.step();
    }
    return this.current;
  }

  public step(): MachineState {
    if (this.current !== MachineState.RUNNING) {
      return this.current;
    }

    const address = this.registers[Register.R_PC];
    const instr = this.memory.read(address);
    this.registers[Register.R_PC]++;
    const op: OpCode = instr >> 12;

    switch (op) {
      case OpCode.OP_ADD: {
        add(this, instr);
        break;
      }
      case OpCode.OP_AND: {
        bitwiseAnd(this, instr);
        break;
      }
      case OpCode.OP_NOT: {
        bitwiseNot(this, instr);
        break;
      }
      case OpCode.OP_BR: {
        branch(this, instr);
        break;
      }
      case OpCode.OP_JMP: {
        jump(this, instr);
        break;
      }
      case OpCode.OP_JSR: {
        jumpRegister(this, instr);
        break;
      }
      case OpCode.OP_LD: {
        load(this, instr);
        break;
      }
      case OpCode.OP_LDI: {
        loadIndirect(this, instr);
        break;
      }
      case OpCode.OP_LDR: {
        loadRegister(this, instr);
        break;
      }
      case OpCode.OP_LEA: {
        loadEffectiveAddress(this, instr);
        break;
      }
      case OpCode.OP_ST: {
        store(this, instr);
        break;
      }
      case OpCode.OP_STI: {
        storeIndirect(this, instr);
        break;
      }
      case OpCode.OP_STR: {
        storeRegister(this, instr);
        break;
      }
      case OpCode.OP_TRAP: {
        handleTrap(this, instr);
        break;
      }
      case OpCode.OP_RES:
      case OpCode.OP_RTI:
      default: {
        this.abort(op, address);
      }
    }

    return this.current;
  }

  private abort(op: number, address: number): never {
    this.current = MachineState.ABORTED;
    throw new IllegalOpcodeError(op, address);
  }

  private resetRegisters(): void {
    this.registers.fill(0);
    this.registers[Register.R_PC] = this.pcStart;
    this.registers[Register.R_COND] = ConditionFlag.FL_ZRO;
  }
}
