import { createCpu, type ICpu, type RegisterEdit, type StepResult, type TraceEvent } from '../cpu/ibm1130/cpu.js';
import type { CpuSnapshot } from '../cpu/ibm1130/state.js';
import { DeviceBus, type DeviceStatus } from '../bus/bus.js';
import { createInterruptController, type IInterruptController, type Interrupt } from '../interrupts/controller.js';
import { createMemory, DEFAULT_MEMORY_WORDS, type IMemory } from '../memory/memory.js';
import type { CpuFault } from '../errors.js';
import type { IDevice } from '../io/device.js';
import { createKeyboard, KEYBOARD_DEVICE_CODE, type IKeyboard } from '../io/keyboard.js';
import { createPrinter, PRINTER_DEVICE_CODE, type IPrinter } from '../io/printer.js';
import { createCardReader, CARD_READER_DEVICE_CODE, type ICardReader } from '../io/card_reader.js';
import type { WordImage } from './image.js';

export interface MachineTraceConfig {
  onTrace?: ((ev: TraceEvent) => void) | undefined;
  traceDisasm?: boolean | undefined;
  traceRegs?: boolean | undefined;
}

export interface MachineConfig {
  memorySize?: number | undefined;
  trace?: MachineTraceConfig | undefined;
  // Attach console keyboard (1), console printer (2) and 2501 reader (9) at construction
  standardDevices?: boolean | undefined;
  // Called with each character the console printer types
  onPrint?: ((ch: string) => void) | undefined;
}

export type StopReason = 'wait' | 'error' | 'limit' | 'condition';

export interface RunResult {
  steps: number;
  reason: StopReason;
  error?: CpuFault | undefined;
}

export interface IMachine {
  step: () => StepResult;
  run: (maxSteps: number) => RunResult;
  runUntil: (done: (state: CpuSnapshot) => boolean, maxSteps: number) => RunResult;
  reset: () => void;
  readMemory: (addr: number) => number;
  writeMemory: (addr: number, word: number) => void;
  readMemoryRange: (addr: number, count: number) => number[];
  writeMemoryRange: (addr: number, words: readonly number[]) => void;
  getState: () => CpuSnapshot;
  setState: (edit: RegisterEdit) => void;
  clearWait: () => void;
  attachDevice: (code: number, device: IDevice) => void;
  detachDevice: (code: number) => IDevice | undefined;
  deviceStatus: (code: number) => DeviceStatus | null;
  listDevices: () => DeviceStatus[];
  raiseInterrupt: (level: number, device: number, ilsw: number) => Interrupt;
  returnFromInterrupt: () => boolean;
  loadImage: (image: WordImage) => void;
  checksum: () => number;
  getCPU: () => ICpu;
  getMemory: () => IMemory;
  getInterrupts: () => IInterruptController;
  getBus: () => DeviceBus;
  getKeyboard: () => IKeyboard | null;
  getPrinter: () => IPrinter | null;
  getCardReader: () => ICardReader | null;
}

export const createMachine = (cfg: MachineConfig = {}): IMachine => {
  const memory = createMemory(cfg.memorySize ?? DEFAULT_MEMORY_WORDS);
  const interrupts = createInterruptController();
  const bus = new DeviceBus(memory, interrupts);
  const cpu = createCpu({
    memory,
    interrupts,
    bus,
    onTrace: cfg.trace?.onTrace,
    traceDisasm: cfg.trace?.traceDisasm,
    traceRegs: cfg.trace?.traceRegs,
  });

  let keyboard: IKeyboard | null = null;
  let printer: IPrinter | null = null;
  let cardReader: ICardReader | null = null;
  if (cfg.standardDevices) {
    keyboard = createKeyboard();
    printer = createPrinter({ onPrint: cfg.onPrint });
    cardReader = createCardReader();
    bus.attach(KEYBOARD_DEVICE_CODE, keyboard);
    bus.attach(PRINTER_DEVICE_CODE, printer);
    bus.attach(CARD_READER_DEVICE_CODE, cardReader);
  }

  const runUntil = (done: (state: CpuSnapshot) => boolean, maxSteps: number): RunResult => {
    let steps = 0;
    while (steps < maxSteps) {
      const r = cpu.step();
      if (!r.ok) return r.error.kind === 'WaitState' ? { steps, reason: 'wait' } : { steps, reason: 'error', error: r.error };
      steps++;
      const state = cpu.snapshot();
      if (state.wait) return { steps, reason: 'wait' };
      if (done(state)) return { steps, reason: 'condition' };
    }
    return { steps, reason: 'limit' };
  };

  const run = (maxSteps: number): RunResult => runUntil((): boolean => false, maxSteps);

  const loadImage = (image: WordImage): void => {
    for (const { address, value } of image.words) memory.write(address, value);
    if (image.entry !== null) cpu.setRegisters({ iar: image.entry });
  };

  const listDevices = (): DeviceStatus[] =>
    bus.codes().flatMap((code): DeviceStatus[] => {
      const s = bus.status(code);
      return s ? [s] : [];
    });

  // Registers, flags, counter and interrupt state return to zero; memory and devices stay
  const reset = (): void => {
    cpu.reset();
    bus.resetAll();
  };

  return {
    step: cpu.step,
    run,
    runUntil,
    reset,
    readMemory: memory.read,
    writeMemory: memory.write,
    readMemoryRange: memory.readRange,
    writeMemoryRange: memory.writeRange,
    getState: cpu.snapshot,
    setState: cpu.setRegisters,
    clearWait: (): void => cpu.setRegisters({ wait: false }),
    attachDevice: bus.attach,
    detachDevice: bus.detach,
    deviceStatus: bus.status,
    listDevices,
    raiseInterrupt: interrupts.raise,
    returnFromInterrupt: cpu.returnFromInterrupt,
    loadImage,
    checksum: memory.checksum,
    getCPU: (): ICpu => cpu,
    getMemory: (): IMemory => memory,
    getInterrupts: (): IInterruptController => interrupts,
    getBus: (): DeviceBus => bus,
    getKeyboard: (): IKeyboard | null => keyboard,
    getPrinter: (): IPrinter | null => printer,
    getCardReader: (): ICardReader | null => cardReader,
  };
};
