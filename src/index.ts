export * from './errors.js';
export { createMemory, DEFAULT_MEMORY_WORDS, type IMemory } from './memory/memory.js';
export type { CpuRegisters, CpuSnapshot } from './cpu/ibm1130/state.js';
export { Opcode, Condition, type Mnemonic, type OpcodeName } from './cpu/ibm1130/opcodes.js';
export { decode, encode, type DecodedInstruction, type Tag } from './cpu/ibm1130/decoder.js';
export { resolveEffectiveAddress } from './cpu/ibm1130/address.js';
export { createCpu, type ICpu, type StepResult, type TraceEvent, type RegisterEdit } from './cpu/ibm1130/cpu.js';
export { disassembleOne, formatInstruction, type DisasmResult } from './cpu/ibm1130/disasm.js';
export {
  createInterruptController,
  INTERRUPT_VECTOR_BASE,
  type IInterruptController,
  type Interrupt,
  type InterruptLevel,
} from './interrupts/controller.js';
export { DeviceBus, type DeviceStatus } from './bus/bus.js';
export { IoFunction, decodeIocc, encodeIocc, type IoccRequest } from './io/iocc.js';
export type { DeviceContext, DeviceState, IDevice } from './io/device.js';
export { createKeyboard, type IKeyboard } from './io/keyboard.js';
export { createPrinter, type IPrinter } from './io/printer.js';
export { createCardReader, type ICardReader } from './io/card_reader.js';
export { createMachine, type IMachine, type MachineConfig, type RunResult } from './machine/machine.js';
export { parseWordImage, ImageParseError, type WordImage } from './machine/image.js';
export { formatTrace, createTraceCollector } from './debug/trace.js';
