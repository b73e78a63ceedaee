import { IoFunction, type IoccRequest, type IoFunctionCode } from './iocc.js';
import {
  CONTROL_ARM,
  CONTROL_DISARM,
  SENSE_RESET,
  createInterruptLatch,
  unsupported,
  type DeviceContext,
  type DeviceState,
  type IDevice,
} from './device.js';

export const PRINTER_DEVICE_CODE = 2;

export const PrinterStatus = {
  RESPONSE: 0x8000, // a character was printed
} as const;

export interface PrinterConfig {
  level?: number | undefined;
  ilsw?: number | undefined;
  // Called with each printed character
  onPrint?: ((ch: string) => void) | undefined;
}

export interface IPrinter extends IDevice {
  getOutput: () => string;
  clearOutput: () => void;
}

export const createPrinter = (cfg: PrinterConfig = {}): IPrinter => {
  const level = cfg.level ?? 4;
  const ilsw = cfg.ilsw ?? 0x1000;
  const functions: ReadonlySet<IoFunctionCode> = new Set<IoFunctionCode>([
    IoFunction.Write,
    IoFunction.Control,
    IoFunction.SenseDevice,
  ]);

  const latch = createInterruptLatch();
  let output = '';
  let armed = false;
  let response = false;

  const execute = (req: IoccRequest, ctx: DeviceContext): void => {
    switch (req.fn) {
      case IoFunction.Write: {
        const ch = String.fromCharCode(ctx.readMemory(req.address) & 0xffff);
        output += ch;
        response = true;
        if (armed) latch.set(ctx, level, ilsw);
        cfg.onPrint?.(ch);
        return;
      }
      case IoFunction.Control:
        if (req.modifiers & CONTROL_ARM) armed = true;
        if (req.modifiers & CONTROL_DISARM) armed = false;
        return;
      case IoFunction.SenseDevice:
        ctx.setAcc(response ? PrinterStatus.RESPONSE : 0);
        if (req.modifiers & SENSE_RESET) {
          response = false;
          latch.clear(ctx);
        }
        return;
      default:
        throw unsupported(ctx, req);
    }
  };

  // Paper output survives a device reset
  const reset = (): void => {
    armed = false;
    response = false;
    latch.clear();
  };

  return {
    name: 'Console Printer',
    functions,
    execute,
    reset,
    status: (): DeviceState => ({ busy: false, dsw: response ? PrinterStatus.RESPONSE : 0, interruptPending: latch.pending() }),
    getOutput: (): string => output,
    clearOutput: (): void => {
      output = '';
    },
  };
};
