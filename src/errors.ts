import { hex2, hex4 } from './util/bit.js';

export type CpuErrorKind =
  | 'InvalidOpcode'
  | 'MemoryViolation'
  | 'DivideByZero'
  | 'WaitState'
  | 'Device'
  | 'InvalidInterruptLevel';

export abstract class CpuError extends Error {
  public abstract readonly kind: CpuErrorKind;
}

export class InvalidOpcodeError extends CpuError {
  public readonly kind = 'InvalidOpcode';

  constructor(
    public readonly address: number,
    public readonly word: number,
    public readonly opcode: number,
  ) {
    super(`invalid opcode 0x${hex2(opcode)} in word /${hex4(word)} at /${hex4(address)}`);
    this.name = 'InvalidOpcodeError';
  }
}

export class MemoryViolationError extends CpuError {
  public readonly kind = 'MemoryViolation';

  constructor(
    public readonly address: number,
    public readonly size: number,
  ) {
    super(`memory address ${address} outside 0..${size - 1}`);
    this.name = 'MemoryViolationError';
  }
}

export class DivideByZeroError extends CpuError {
  public readonly kind = 'DivideByZero';

  constructor(public readonly address: number) {
    super(`divide by zero at /${hex4(address)}`);
    this.name = 'DivideByZeroError';
  }
}

export class WaitStateError extends CpuError {
  public readonly kind = 'WaitState';

  constructor(public readonly iar: number) {
    super(`processor is in wait state at /${hex4(iar)}`);
    this.name = 'WaitStateError';
  }
}

export type DeviceErrorReason = 'NoData' | 'UnsupportedFunction' | 'DeviceNotFound';

export class DeviceError extends CpuError {
  public readonly kind = 'Device';

  constructor(
    public readonly reason: DeviceErrorReason,
    public readonly deviceCode: number,
    public readonly fn: number,
  ) {
    super(`device ${deviceCode}: ${reason} (function ${fn})`);
    this.name = 'DeviceError';
  }
}

export class InvalidInterruptLevelError extends CpuError {
  public readonly kind = 'InvalidInterruptLevel';

  constructor(public readonly level: number) {
    super(`interrupt level ${level} outside 0..5`);
    this.name = 'InvalidInterruptLevelError';
  }
}

export type CpuFault =
  | InvalidOpcodeError
  | MemoryViolationError
  | DivideByZeroError
  | WaitStateError
  | DeviceError
  | InvalidInterruptLevelError;

export const isCpuFault = (e: unknown): e is CpuFault => e instanceof CpuError;
