import { DeviceError } from '../errors.js';
import { debugLog } from '../debug/log.js';
import type { IMemory } from '../memory/memory.js';
import type { IInterruptController, Interrupt } from '../interrupts/controller.js';
import { supportsFunction, type DeviceContext, type IDevice } from '../io/device.js';
import { ioFunctionName, type IoccRequest } from '../io/iocc.js';

export const DEVICE_CODES = 32;

export interface DeviceStatus {
  code: number;
  name: string;
  busy: boolean;
  interruptPending: boolean;
  dsw: number;
}

// Accumulator access for sense-device style functions
export interface AccumulatorPort {
  getAcc: () => number;
  setAcc: (word: number) => void;
}

/**
 * Device registry keyed by 5-bit area code. One bus per machine; devices stay attached
 * until detached explicitly.
 */
export class DeviceBus {
  private readonly slots = new Map<number, IDevice>();

  constructor(
    private readonly memory: IMemory,
    private readonly interrupts: IInterruptController,
  ) {}

  private static checkCode = (code: number): number => {
    if (!Number.isInteger(code) || code < 0 || code >= DEVICE_CODES) throw new Error(`device code ${code} outside 0..${DEVICE_CODES - 1}`);
    return code;
  };

  public attach = (code: number, device: IDevice): void => {
    const c = DeviceBus.checkCode(code);
    const existing = this.slots.get(c);
    if (existing) throw new Error(`device code ${c} already attached to ${existing.name}`);
    this.slots.set(c, device);
  };

  public detach = (code: number): IDevice | undefined => {
    const c = DeviceBus.checkCode(code);
    const dev = this.slots.get(c);
    this.slots.delete(c);
    if (dev) this.interrupts.cancelDevice(c);
    return dev;
  };

  public get = (code: number): IDevice | undefined => this.slots.get(code);

  public codes = (): number[] => [...this.slots.keys()].sort((a, b): number => a - b);

  public status = (code: number): DeviceStatus | null => {
    const dev = this.slots.get(code);
    if (!dev) return null;
    const s = dev.status();
    return { code, name: dev.name, busy: s.busy, interruptPending: s.interruptPending, dsw: s.dsw & 0xffff };
  };

  public resetAll = (): void => {
    for (const dev of this.slots.values()) dev.reset();
  };

  public dispatch = (req: IoccRequest, acc: AccumulatorPort): void => {
    debugLog(
      'DEBUG_IO_LOG',
      (): string =>
        `io: dev=${req.deviceCode} fn=${ioFunctionName(req.fn)} mod=${req.modifiers.toString(16)} addr=${req.address.toString(16)}`,
    );
    const dev = this.slots.get(req.deviceCode);
    if (!dev) throw new DeviceError('DeviceNotFound', req.deviceCode, req.fn);
    if (!supportsFunction(dev, req.fn)) throw new DeviceError('UnsupportedFunction', req.deviceCode, req.fn);
    dev.execute(req, this.contextFor(req.deviceCode, acc));
  };

  private contextFor = (code: number, acc: AccumulatorPort): DeviceContext => ({
    deviceCode: code,
    readMemory: (addr: number): number => this.memory.read(addr),
    writeMemory: (addr: number, word: number): void => this.memory.write(addr, word),
    getAcc: acc.getAcc,
    setAcc: acc.setAcc,
    raise: (level: number, ilsw: number): Interrupt => this.interrupts.raise(level, code, ilsw),
    cancelInterrupts: (): void => {
      this.interrupts.cancelDevice(code);
    },
  });
}
