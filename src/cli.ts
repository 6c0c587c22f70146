import { IllegalOpcodeError, ImageLoadError } from './errors';
import { type DisplayDevice } from './hardware/display';
import { type KeyboardDevice } from './hardware/keyboard';
import { TerminalDisplay, TerminalKeyboard, TerminalSession } from './io/terminal';
import { MachineState, VirtualMachine } from './vm/machine';

export const USAGE = 'Usage: lc3-emulator [image-file1] ...';

export enum ExitCode {
  SUCCESS = 0,
  LOAD_FAILURE = 1,
  ABORTED = -1,
}

export interface CliDevices {
  session?: TerminalSession;
  keyboard?: KeyboardDevice;
  display?: DisplayDevice;
}

/** Instructions executed between two looks for Ctrl-C */
export const INTERRUPT_POLL_INTERVAL = 1024;

/**
 * Raw mode turns Ctrl-C into an input byte, so stdin is checked between
 * batches of instructions even when the program never reads the keyboard.
 */
function runWatchingInterrupt(vm: VirtualMachine, keyboard: TerminalKeyboard): void {
  while (vm.state === MachineState.RUNNING) {
    for (let i = 0; i < INTERRUPT_POLL_INTERVAL && vm.state === MachineState.RUNNING; i++) {
      vm.step();
    }
    keyboard.pollInterrupt();
  }
}

/**
 * Loads every image in order, runs from the start address and returns the
 * process exit code. Ctrl-C in raw mode leaves through the session instead.
 */
export function main(args: string[], devices: CliDevices = {}): ExitCode {
  if (args.length < 1) {
    console.error(USAGE);
    return ExitCode.LOAD_FAILURE;
  }

  const session = devices.session ?? new TerminalSession();
  const keyboard = devices.keyboard ?? new TerminalKeyboard(session);
  const vm = new VirtualMachine({
    keyboard,
    display: devices.display ?? new TerminalDisplay(),
  });

  for (const imagePath of args) {
    try {
      vm.loadImageFile(imagePath);
    } catch (err) {
      if (err instanceof ImageLoadError) {
        console.error(err.message);
        return ExitCode.LOAD_FAILURE;
      }
      throw err;
    }
  }

  session.acquire();
  try {
    if (session.isTTY && keyboard instanceof TerminalKeyboard) {
      runWatchingInterrupt(vm, keyboard);
    } else {
      vm.run();
    }
  } catch (err) {
    if (err instanceof IllegalOpcodeError) {
      console.error(err.message);
      return ExitCode.ABORTED;
    }
    throw err;
  } finally {
    session.release();
  }

  return ExitCode.SUCCESS;
}
