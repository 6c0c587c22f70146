// Machine
export { VirtualMachine, MachineState, DEFAULT_OPTIONS } from './vm/machine';
export type { VmOptions } from './vm/machine';
export { handleTrap } from './vm/traps';
export type { TrapContext } from './vm/traps';
export type { Cpu } from './vm/instructions';

// Hardware
export { Memory } from './hardware/memory';
export { Register, ConditionFlag, createRegisters } from './hardware/register';
export { BufferedKeyboard, END_OF_INPUT } from './hardware/keyboard';
export type { KeyboardDevice } from './hardware/keyboard';
export { BufferedDisplay } from './hardware/display';
export type { DisplayDevice } from './hardware/display';

// Constants
export { OpCode } from './constants/opcodes';
export { Trap } from './constants/traps';
export { MemoryMappedRegister, MEMORY_SIZE, PC_START, KEYBOARD_READY } from './constants/memory';

// Loading and terminal boundary
export { loadImage, readImageFile } from './loader/image';
export type { LoadedImage } from './loader/image';
export { TerminalSession, TerminalKeyboard, TerminalDisplay } from './io/terminal';
export { ImageLoadError, IllegalOpcodeError } from './errors';

// Utilities
export { signExtend, conditionFor } from './utils/bits';
export { toHex } from './utils/format';
