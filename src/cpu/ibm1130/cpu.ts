import { DeviceError, DivideByZeroError, WaitStateError, isCpuFault, type CpuFault } from '../../errors.js';
import { debugEnabled, debugLog } from '../../debug/log.js';
import type { DeviceBus } from '../../bus/bus.js';
import type { IMemory } from '../../memory/memory.js';
import { INTERRUPT_VECTOR_BASE, type IInterruptController, type Interrupt } from '../../interrupts/controller.js';
import { decodeIocc, IoFunction } from '../../io/iocc.js';
import { hex4, joinWords, sext16, sext8, splitWords, u16 } from '../../util/bit.js';
import { resolveEffectiveAddress, type AddressContext } from './address.js';
import { decode, type DecodedInstruction, type Tag } from './decoder.js';
import { disassembleOne } from './disasm.js';
import { Condition, CONDITION_MASK, type OpcodeName } from './opcodes.js';
import { createResetRegisters, type CpuRegisters, type CpuSnapshot } from './state.js';

export interface TraceEvent {
  iarBefore: number;
  words: number[];
  mnemonic: string;
  // Disassembly text when traceDisasm is enabled
  text?: string | undefined;
  // Register snapshot after the instruction when traceRegs is enabled
  regs?: CpuSnapshot | undefined;
  interrupt: Interrupt | null;
  instructionCount: number;
}

export interface CpuOptions {
  memory: IMemory;
  interrupts: IInterruptController;
  bus: DeviceBus;
  onTrace?: ((ev: TraceEvent) => void) | undefined;
  traceDisasm?: boolean | undefined;
  traceRegs?: boolean | undefined;
}

export type StepResult =
  | { ok: true; instruction: DecodedInstruction; interrupt: Interrupt | null }
  | { ok: false; error: CpuFault };

export type RegisterEdit = Partial<Omit<CpuRegisters, 'instructionCount'>> & { xr1?: number; xr2?: number; xr3?: number };

export interface ICpu {
  step: () => StepResult;
  getRegisters: () => CpuRegisters;
  setRegisters: (edit: RegisterEdit) => void;
  getXR: (tag: Exclude<Tag, 0>) => number;
  snapshot: () => CpuSnapshot;
  // Leaves the innermost interrupt level, resuming at the address saved at its entry
  returnFromInterrupt: () => boolean;
  reset: () => void;
}

interface ArithResult {
  result: number;
  carry: boolean;
  overflow: boolean;
}

export const add16 = (a: number, b: number): ArithResult => {
  const sum = (a & 0xffff) + (b & 0xffff);
  const result = sum & 0xffff;
  return { result, carry: sum > 0xffff, overflow: ((a ^ result) & (b ^ result) & 0x8000) !== 0 };
};

export const sub16 = (a: number, b: number): ArithResult => {
  const x = a & 0xffff;
  const y = b & 0xffff;
  const result = (x - y) & 0xffff;
  return { result, carry: x < y, overflow: ((x ^ y) & (x ^ result) & 0x8000) !== 0 };
};

export const add32 = (a: number, b: number): ArithResult => {
  const sum = (a >>> 0) + (b >>> 0);
  const result = sum >>> 0;
  return { result, carry: sum > 0xffffffff, overflow: ((a ^ result) & (b ^ result) & 0x80000000) !== 0 };
};

export const sub32 = (a: number, b: number): ArithResult => {
  const x = a >>> 0;
  const y = b >>> 0;
  const result = (x - y) >>> 0;
  return { result, carry: x < y, overflow: ((x ^ y) & (x ^ result) & 0x80000000) !== 0 };
};

export const createCpu = (opts: CpuOptions): ICpu => {
  const { memory, interrupts, bus } = opts;
  const regs: CpuRegisters = createResetRegisters();

  const xr = (tag: Exclude<Tag, 0>): number => memory.read(tag);
  const setXr = (tag: Exclude<Tag, 0>, v: number): void => memory.write(tag, u16(v));
  // Tag 0 names the IAR for the index instructions
  const readIndex = (tag: Tag): number => (tag === 0 ? regs.iar : xr(tag));
  const writeIndex = (tag: Tag, v: number): void => {
    if (tag === 0) regs.iar = u16(v);
    else setXr(tag, v);
  };

  const addrCtx: AddressContext = { read: (a: number): number => memory.read(a), xr };
  const ea = (ins: DecodedInstruction): number => resolveEffectiveAddress(ins, addrCtx);

  const readDouble = (addr: number): number => joinWords(memory.read(addr), memory.read(addr | 1));
  const accExt = (): number => joinWords(regs.acc, regs.ext);
  const setAccExt = (v: number): void => {
    const [h, l] = splitWords(v >>> 0);
    regs.acc = h;
    regs.ext = l;
  };

  const skip = (): void => {
    regs.iar = u16(regs.iar + 1);
  };

  // Any selected condition true? Testing overflow resets it.
  const conditionMet = (mods: number): boolean => {
    const m = mods & CONDITION_MASK;
    const acc = regs.acc;
    let met = false;
    if (m & Condition.ZERO && acc === 0) met = true;
    if (m & Condition.MINUS && acc & 0x8000) met = true;
    if (m & Condition.PLUS && acc !== 0 && (acc & 0x8000) === 0) met = true;
    if (m & Condition.EVEN && (acc & 1) === 0) met = true;
    if (m & Condition.CARRY_OFF && !regs.carry) met = true;
    if (m & Condition.OVERFLOW_OFF) {
      if (!regs.overflow) met = true;
      regs.overflow = false;
    }
    return met;
  };

  const applyArith = (r: ArithResult): number => {
    regs.carry = r.carry;
    if (r.overflow) regs.overflow = true;
    return r.result;
  };

  const shiftCount = (ins: DecodedInstruction): number => (ins.tag === 0 ? ins.displacement : xr(ins.tag)) & 0x3f;

  const shiftLeft = (ins: DecodedInstruction): void => {
    let count = shiftCount(ins);
    const double = ins.mnemonic === 'SLT' || ins.mnemonic === 'SLC';
    const normalize = ins.mnemonic === 'SLCA' || ins.mnemonic === 'SLC';
    let v = double ? accExt() : regs.acc << 16;
    let carry = regs.carry;
    while (count > 0) {
      if (normalize && v & 0x80000000) break;
      carry = (v & 0x80000000) !== 0;
      v = (v << 1) >>> 0;
      count--;
    }
    regs.carry = carry;
    if (double) setAccExt(v);
    else regs.acc = (v >>> 16) & 0xffff;
    if (normalize && ins.tag !== 0) setXr(ins.tag, (xr(ins.tag) & 0xffc0) | count);
  };

  const shiftRight = (ins: DecodedInstruction): void => {
    const count = shiftCount(ins);
    if (ins.mnemonic === 'SRA') {
      let v = regs.acc;
      for (let i = 0; i < count; i++) v = (v >>> 1) | (v & 0x8000);
      regs.acc = v;
      return;
    }
    let v = accExt();
    for (let i = 0; i < count; i++) {
      v = ins.mnemonic === 'RTE' ? ((v >>> 1) | ((v & 1) << 31)) >>> 0 : ((v >>> 1) | (v & 0x80000000)) >>> 0;
    }
    setAccExt(v);
  };

  const modifyIndex = (ins: DecodedInstruction): void => {
    let target: number | null;
    let before: number;
    let after: number;
    if (ins.format === 'short') {
      const delta = sext8(ins.displacement);
      if (ins.tag === 0) {
        regs.iar = u16(regs.iar + delta);
        return;
      }
      before = xr(ins.tag);
      after = u16(before + delta);
      target = null;
    } else if (ins.tag === 0) {
      // Long form, no tag: add the signed modifier byte to a memory word
      target = ins.displacement;
      before = memory.read(target);
      after = u16(before + sext8(ins.modifiers));
    } else {
      before = xr(ins.tag);
      after = u16(before + (ins.indirect ? memory.read(ins.displacement) : ins.displacement));
      target = null;
    }
    if (target === null) writeIndex(ins.tag, after);
    else memory.write(target, after);
    if (after === 0 || ((before ^ after) & 0x8000) !== 0) skip();
  };

  const loadIndex = (ins: DecodedInstruction): void => {
    if (ins.format === 'short') writeIndex(ins.tag, u16(sext8(ins.displacement)));
    else writeIndex(ins.tag, ins.indirect ? memory.read(ins.displacement) : ins.displacement);
  };

  const senseInterrupt = (): void => {
    regs.acc = interrupts.current()?.interrupt.ilsw ?? 0;
  };

  const executeIo = (ins: DecodedInstruction): void => {
    const at = ea(ins);
    const req = decodeIocc(memory.read(at), memory.read(at | 1));
    if (req.fn === IoFunction.SenseInterrupt) {
      senseInterrupt();
      return;
    }
    if (req.fn === 0) throw new DeviceError('UnsupportedFunction', req.deviceCode, req.fn);
    bus.dispatch(req, {
      getAcc: (): number => regs.acc,
      setAcc: (w: number): void => {
        regs.acc = u16(w);
      },
    });
  };

  const divide = (ins: DecodedInstruction): void => {
    const divisor = sext16(memory.read(ea(ins)));
    if (divisor === 0) throw new DivideByZeroError(ins.address);
    const dividend = accExt() | 0;
    const q = Math.trunc(dividend / divisor);
    if (q < -0x8000 || q > 0x7fff) {
      regs.overflow = true;
      return;
    }
    regs.acc = u16(q);
    regs.ext = u16(dividend - q * divisor);
  };

  const handlers: Record<OpcodeName, (ins: DecodedInstruction) => void> = {
    LD: (ins): void => {
      regs.acc = memory.read(ea(ins));
    },
    LDD: (ins): void => setAccExt(readDouble(ea(ins))),
    STO: (ins): void => memory.write(ea(ins), regs.acc),
    STD: (ins): void => {
      const at = ea(ins);
      memory.write(at, regs.acc);
      memory.write(at | 1, regs.ext);
    },
    LDS: (ins): void => {
      regs.carry = (ins.displacement & 0x02) !== 0;
      regs.overflow = (ins.displacement & 0x01) !== 0;
    },
    STS: (ins): void => {
      const at = ea(ins);
      memory.write(at, (memory.read(at) & 0xff00) | (regs.carry ? 0x02 : 0) | (regs.overflow ? 0x01 : 0));
      regs.carry = false;
      regs.overflow = false;
    },
    A: (ins): void => {
      regs.acc = applyArith(add16(regs.acc, memory.read(ea(ins))));
    },
    S: (ins): void => {
      regs.acc = applyArith(sub16(regs.acc, memory.read(ea(ins))));
    },
    AD: (ins): void => setAccExt(applyArith(add32(accExt(), readDouble(ea(ins))))),
    SD: (ins): void => setAccExt(applyArith(sub32(accExt(), readDouble(ea(ins))))),
    M: (ins): void => setAccExt((sext16(regs.acc) * sext16(memory.read(ea(ins)))) >>> 0),
    D: divide,
    AND: (ins): void => {
      regs.acc = regs.acc & memory.read(ea(ins));
    },
    OR: (ins): void => {
      regs.acc = regs.acc | memory.read(ea(ins));
    },
    EOR: (ins): void => {
      regs.acc = regs.acc ^ memory.read(ea(ins));
    },
    SHIFT_LEFT: shiftLeft,
    SHIFT_RIGHT: shiftRight,
    BSC: (ins): void => {
      if (ins.format === 'short') {
        if (conditionMet(ins.modifiers)) skip();
        if (ins.mnemonic === 'BOSC') interrupts.endLevel();
        return;
      }
      const target = ea(ins);
      if (conditionMet(ins.modifiers)) return;
      regs.iar = target;
      if (ins.mnemonic === 'BOSC') interrupts.endLevel();
    },
    BSI: (ins): void => {
      const target = ea(ins);
      if (ins.format === 'long' && conditionMet(ins.modifiers)) return;
      memory.write(target, regs.iar);
      regs.iar = u16(target + 1);
    },
    LDX: loadIndex,
    STX: (ins): void => memory.write(resolveEffectiveAddress(ins, addrCtx, { indexed: false }), readIndex(ins.tag)),
    MDX: modifyIndex,
    XIO: executeIo,
    WAIT: (): void => {
      regs.wait = true;
    },
  };

  // Forced BSI indirect through the level's vector word
  const deliverInterrupt = (): Interrupt | null => {
    if (regs.wait) return null;
    const irq = interrupts.poll();
    if (!irq) return null;
    const entry = memory.read(INTERRUPT_VECTOR_BASE + irq.level);
    memory.write(entry, regs.iar);
    regs.iar = u16(entry + 1);
    interrupts.acknowledge(irq, entry);
    return irq;
  };

  const snapshot = (): CpuSnapshot => ({
    ...regs,
    xr1: xr(1),
    xr2: xr(2),
    xr3: xr(3),
    interruptLevel: interrupts.currentLevel(),
  });

  const safeRead = (a: number): number => (a >= 0 && a < memory.size ? memory.read(a) : 0);

  const emitTrace = (ins: DecodedInstruction, interrupt: Interrupt | null): void => {
    const wantText = !!opts.traceDisasm || debugEnabled('CPU_DEBUG');
    const text = wantText ? disassembleOne(safeRead, ins.address).text : undefined;
    debugLog('CPU_DEBUG', (): string => `${hex4(ins.address)}: ${text ?? ins.mnemonic}  ACC=${hex4(regs.acc)} EXT=${hex4(regs.ext)} IAR=${hex4(regs.iar)}`);
    if (!opts.onTrace) return;
    opts.onTrace({
      iarBefore: ins.address,
      words: ins.words,
      mnemonic: ins.mnemonic,
      text: opts.traceDisasm ? text : undefined,
      regs: opts.traceRegs ? snapshot() : undefined,
      interrupt,
      instructionCount: regs.instructionCount,
    });
  };

  type Fault = { ok: false; error: CpuFault };

  const fault = (e: unknown, at: number): Fault => {
    if (!isCpuFault(e)) throw e;
    debugLog('CPU_DEBUG', (): string => `${hex4(at)}: fault ${e.kind}: ${e.message}`);
    return { ok: false, error: e };
  };

  // One instruction with its device effects, committed as a unit
  const execute = (): { ok: true; ins: DecodedInstruction } | Fault => {
    const saved: CpuRegisters = { ...regs };
    const cp = interrupts.checkpoint();
    memory.begin();
    try {
      const ins = decode(addrCtx.read, regs.iar);
      regs.iar = u16(regs.iar + ins.length);
      handlers[ins.name](ins);
      regs.instructionCount++;
      memory.commit();
      return { ok: true, ins };
    } catch (e) {
      memory.rollback();
      interrupts.restore(cp);
      Object.assign(regs, saved);
      return fault(e, saved.iar);
    }
  };

  // A faulting entry is undone on its own; the interrupt stays queued
  const enterInterrupt = (): { ok: true; interrupt: Interrupt | null } | Fault => {
    const iar = regs.iar;
    const cp = interrupts.checkpoint();
    memory.begin();
    try {
      const interrupt = deliverInterrupt();
      memory.commit();
      return { ok: true, interrupt };
    } catch (e) {
      memory.rollback();
      interrupts.restore(cp);
      regs.iar = iar;
      return fault(e, iar);
    }
  };

  const step = (): StepResult => {
    if (regs.wait) return { ok: false, error: new WaitStateError(regs.iar) };
    const ran = execute();
    if (!ran.ok) return ran;
    const entry = enterInterrupt();
    emitTrace(ran.ins, entry.ok ? entry.interrupt : null);
    return entry.ok ? { ok: true, instruction: ran.ins, interrupt: entry.interrupt } : entry;
  };

  const getRegisters = (): CpuRegisters => ({ ...regs });

  const setRegisters = (edit: RegisterEdit): void => {
    if (edit.acc !== undefined) regs.acc = u16(edit.acc);
    if (edit.ext !== undefined) regs.ext = u16(edit.ext);
    if (edit.iar !== undefined) regs.iar = u16(edit.iar);
    if (edit.carry !== undefined) regs.carry = edit.carry;
    if (edit.overflow !== undefined) regs.overflow = edit.overflow;
    if (edit.wait !== undefined) regs.wait = edit.wait;
    if (edit.xr1 !== undefined) setXr(1, edit.xr1);
    if (edit.xr2 !== undefined) setXr(2, edit.xr2);
    if (edit.xr3 !== undefined) setXr(3, edit.xr3);
  };

  const returnFromInterrupt = (): boolean => {
    const top = interrupts.current();
    if (!top) return false;
    regs.iar = memory.read(top.entry);
    interrupts.endLevel();
    return true;
  };

  const reset = (): void => {
    Object.assign(regs, createResetRegisters());
    for (const tag of [1, 2, 3] as const) setXr(tag, 0);
    interrupts.reset();
  };

  return { step, getRegisters, setRegisters, getXR: xr, snapshot, returnFromInterrupt, reset };
};
