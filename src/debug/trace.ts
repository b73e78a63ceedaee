import { hex4 } from '../util/bit.js';
import type { TraceEvent } from '../cpu/ibm1130/cpu.js';
import type { CpuSnapshot } from '../cpu/ibm1130/state.js';

export interface TraceFormatOptions {
  showWords?: boolean; // include the instruction words
  showFlags?: boolean; // include carry/overflow from regs
  uppercaseHex?: boolean; // hex letter casing
}

const word = (v: number, upper: boolean): string => (upper ? hex4(v) : hex4(v).toLowerCase());

const flagsToString = (r: CpuSnapshot): string => `${r.carry ? 'C' : '.'}${r.overflow ? 'O' : '.'}${r.wait ? 'W' : '.'}`;

const regsToString = (r: CpuSnapshot, upper: boolean): string => {
  const level = r.interruptLevel === null ? '-' : String(r.interruptLevel);
  return (
    `ACC=${word(r.acc, upper)} EXT=${word(r.ext, upper)} IAR=${word(r.iar, upper)} ` +
    `XR1=${word(r.xr1, upper)} XR2=${word(r.xr2, upper)} XR3=${word(r.xr3, upper)} L=${level}`
  );
};

export const formatTrace = (ev: TraceEvent, opts?: TraceFormatOptions): string => {
  const upper = opts?.uppercaseHex ?? true;
  const head = `${word(ev.iarBefore & 0xffff, upper)}:`;
  const body = ev.text ?? ev.mnemonic;
  const words =
    opts?.showWords && ev.words.length > 0 ? `  ${ev.words.map((w): string => word(w & 0xffff, upper)).join(' ')}` : '';
  const irq = ev.interrupt ? ` INT${ev.interrupt.level}` : '';
  const flags = opts?.showFlags && ev.regs ? `  F=${flagsToString(ev.regs)}` : '';
  const regs = ev.regs ? `  ${regsToString(ev.regs, upper)}` : '';
  return `${head} ${body}${words}${irq}${flags}${regs}`;
};

export interface TraceCollector {
  lines: string[];
  onTrace: (ev: TraceEvent) => void;
}

export const createTraceCollector = (opts?: TraceFormatOptions): TraceCollector => {
  const lines: string[] = [];
  const onTrace = (ev: TraceEvent): void => {
    lines.push(formatTrace(ev, opts));
  };
  return { lines, onTrace };
};
