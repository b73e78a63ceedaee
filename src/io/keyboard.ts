import { IoFunction, type IoccRequest, type IoFunctionCode } from './iocc.js';
import {
  CONTROL_ARM,
  CONTROL_DISARM,
  SENSE_RESET,
  createInterruptLatch,
  noData,
  unsupported,
  type DeviceContext,
  type DeviceState,
  type IDevice,
} from './device.js';

export const KEYBOARD_DEVICE_CODE = 1;

export const KeyboardStatus = {
  RESPONSE: 0x8000, // a character was read
  INPUT_WAITING: 0x0001,
} as const;

export interface KeyboardConfig {
  level?: number | undefined;
  ilsw?: number | undefined;
}

export interface IKeyboard extends IDevice {
  // Host side: queue characters as if typed at the console
  type: (text: string) => void;
  pendingInput: () => number;
  isArmed: () => boolean;
}

export const createKeyboard = (cfg: KeyboardConfig = {}): IKeyboard => {
  const level = cfg.level ?? 4;
  const ilsw = cfg.ilsw ?? 0x1000;
  const functions: ReadonlySet<IoFunctionCode> = new Set<IoFunctionCode>([
    IoFunction.Read,
    IoFunction.Control,
    IoFunction.SenseDevice,
  ]);

  const input: number[] = [];
  const latch = createInterruptLatch();
  let armed = false;
  let response = false;

  const dsw = (): number => (response ? KeyboardStatus.RESPONSE : 0) | (input.length > 0 ? KeyboardStatus.INPUT_WAITING : 0);

  const execute = (req: IoccRequest, ctx: DeviceContext): void => {
    switch (req.fn) {
      case IoFunction.Read: {
        const ch = input[0];
        if (ch === undefined) throw noData(ctx, req);
        ctx.writeMemory(req.address, ch);
        input.shift();
        response = true;
        if (armed) latch.set(ctx, level, ilsw);
        return;
      }
      case IoFunction.Control:
        if (req.modifiers & CONTROL_ARM) armed = true;
        if (req.modifiers & CONTROL_DISARM) armed = false;
        return;
      case IoFunction.SenseDevice:
        ctx.setAcc(dsw());
        if (req.modifiers & SENSE_RESET) {
          response = false;
          latch.clear(ctx);
        }
        return;
      default:
        throw unsupported(ctx, req);
    }
  };

  const reset = (): void => {
    input.length = 0;
    armed = false;
    response = false;
    latch.clear();
  };

  const status = (): DeviceState => ({ busy: false, dsw: dsw(), interruptPending: latch.pending() });

  return {
    name: 'Console Keyboard',
    functions,
    execute,
    reset,
    status,
    type: (text: string): void => {
      for (const ch of text) input.push((ch.codePointAt(0) ?? 0) & 0xffff);
    },
    pendingInput: (): number => input.length,
    isArmed: (): boolean => armed,
  };
};
