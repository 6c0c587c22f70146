import { KEYBOARD_READY, MEMORY_SIZE, MemoryMappedRegister } from '../constants/memory';
import { type KeyboardDevice } from './keyboard';

/**
 * Flat 64K-word address space. Addresses wrap at 16 bits.
 *
 * `read` is not side-effect free: reading KBSR polls the keyboard and latches
 * the next character into KBDR before the value is returned. Use `peek` where
 * a plain look at the stored word is wanted.
 */
export class Memory {
  private readonly cells = new Uint16Array(MEMORY_SIZE);

  constructor(private readonly keyboard: KeyboardDevice) {}

  public read(address: number): number {
    address &= 0xffff;
    if (address === MemoryMappedRegister.MR_KBSR) {
      this.pollKeyboard();
    }
    return this.cells[address];
  }

  public write(address: number, val: number): void {
    this.cells[address & 0xffff] = val;
  }

  public peek(address: number): number {
    return this.cells[address & 0xffff];
  }

  public clear(): void {
    this.cells.fill(0);
  }

  private pollKeyboard(): void {
    if (this.keyboard.hasKey()) {
      this.cells[MemoryMappedRegister.MR_KBSR] = KEYBOARD_READY;
      this.cells[MemoryMappedRegister.MR_KBDR] = this.keyboard.getChar();
    } else {
      this.cells[MemoryMappedRegister.MR_KBSR] = 0x00;
    }
  }
}
