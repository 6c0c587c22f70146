/** Number of addressable 16-bit words */
export const MEMORY_SIZE = 1 << 16;

/** Default program counter after the images are loaded */
export const PC_START = 0x3000;

/** Memory Mapped Registers */
export enum MemoryMappedRegister {
  MR_KBSR = 0xfe00 /* keyboard status */,
  MR_KBDR = 0xfe02 /* keyboard data */,
}

/** KBSR value while a character is latched in KBDR */
export const KEYBOARD_READY = 1 << 15;
