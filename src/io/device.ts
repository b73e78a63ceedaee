import { DeviceError } from '../errors.js';
import type { Interrupt } from '../interrupts/controller.js';
import type { IoccRequest, IoFunctionCode } from './iocc.js';

// What a device may touch while it executes an IOCC
export interface DeviceContext {
  readonly deviceCode: number;
  readMemory: (addr: number) => number;
  writeMemory: (addr: number, word: number) => void;
  getAcc: () => number;
  setAcc: (word: number) => void;
  // Queues an interrupt on behalf of this device
  raise: (level: number, ilsw: number) => Interrupt;
  // Withdraws this device's interrupts that are still queued
  cancelInterrupts: () => void;
}

export interface DeviceState {
  busy: boolean;
  // Device status word as returned by sense device
  dsw: number;
  interruptPending: boolean;
}

export interface IDevice {
  readonly name: string;
  readonly functions: ReadonlySet<IoFunctionCode>;
  execute: (request: IoccRequest, ctx: DeviceContext) => void;
  reset: () => void;
  status: () => DeviceState;
}

// Sense device modifier bit that resets the device's response bits
export const SENSE_RESET = 0x01;
// Control modifiers for console devices
export const CONTROL_ARM = 0x80;
export const CONTROL_DISARM = 0x40;

export const supportsFunction = (device: IDevice, fn: number): boolean => {
  for (const f of device.functions) if (f === fn) return true;
  return false;
};

export const noData = (ctx: DeviceContext, req: IoccRequest): DeviceError => new DeviceError('NoData', ctx.deviceCode, req.fn);
export const unsupported = (ctx: DeviceContext, req: IoccRequest): DeviceError =>
  new DeviceError('UnsupportedFunction', ctx.deviceCode, req.fn);

/**
 * The interrupt a device has raised and not yet had reset by the program.
 * Devices keep one of these; sense device with {@link SENSE_RESET} clears it.
 */
export interface InterruptLatch {
  readonly pending: () => boolean;
  readonly set: (ctx: DeviceContext, level: number, ilsw: number) => void;
  readonly clear: (ctx?: DeviceContext) => void;
}

export const createInterruptLatch = (): InterruptLatch => {
  let active: Interrupt | null = null;
  return {
    pending: (): boolean => active !== null,
    set: (ctx: DeviceContext, level: number, ilsw: number): void => {
      active = ctx.raise(level, ilsw);
    },
    clear: (ctx?: DeviceContext): void => {
      active = null;
      ctx?.cancelInterrupts();
    },
  };
};
