import { hex2, hex4, sext8 } from '../../util/bit.js';
import { decode, fields, type DecodedInstruction } from './decoder.js';
import { Condition, CONDITION_MASK, lookupOpcode } from './opcodes.js';

export interface DisasmResult {
  length: number;
  words: number[];
  text: string;
}

const CONDITION_LETTERS: readonly [number, string][] = [
  [Condition.ZERO, 'Z'],
  [Condition.MINUS, '-'],
  [Condition.PLUS, '+'],
  [Condition.EVEN, 'E'],
  [Condition.CARRY_OFF, 'C'],
  [Condition.OVERFLOW_OFF, 'O'],
];

export const conditionText = (mods: number): string =>
  CONDITION_LETTERS.filter(([bit]): boolean => (mods & CONDITION_MASK & bit) !== 0)
    .map(([, ch]): string => ch)
    .join('');

// Format/tag column as written in source: L, I, L1, I3 for long; 1-3 or nothing for short
const formatTag = (ins: DecodedInstruction): string => {
  const t = ins.tag === 0 ? '' : String(ins.tag);
  if (ins.format === 'short') return t;
  return `${ins.indirect ? 'I' : 'L'}${t}`;
};

const join = (...parts: string[]): string => parts.filter((p): boolean => p.length > 0).join(' ');

const operandText = (ins: DecodedInstruction): string => {
  const ft = formatTag(ins);
  switch (ins.mnemonic) {
    case 'SLA':
    case 'SLCA':
    case 'SLT':
    case 'SLC':
    case 'SRA':
    case 'SRT':
    case 'RTE':
      return join(ft, String(ins.displacement & 0x3f));
    case 'WAIT':
      return '';
    case 'LDS':
      return String(ins.displacement & 0x03);
    case 'BSC':
    case 'BOSC':
    case 'BSI': {
      const cond = conditionText(ins.modifiers);
      if (ins.format === 'short') return join(ft, ins.mnemonic === 'BSI' ? `/${hex2(ins.displacement)}` : cond);
      return join(ft, `/${hex4(ins.displacement)}${cond ? `,${cond}` : ''}`);
    }
    case 'MDX':
      if (ins.format === 'long' && ins.tag === 0) return `L /${hex4(ins.displacement)},${sext8(ins.modifiers)}`;
      break;
    default:
      break;
  }
  return join(ft, ins.format === 'long' ? `/${hex4(ins.displacement)}` : `/${hex2(ins.displacement)}`);
};

export const formatInstruction = (ins: DecodedInstruction): string => join(ins.mnemonic, operandText(ins));

export const disassembleOne = (read: (addr: number) => number, addr: number): DisasmResult => {
  const w1 = read(addr) & 0xffff;
  if (!lookupOpcode(fields(w1).opcode)) return { length: 1, words: [w1], text: `DC /${hex4(w1)}` };
  const ins = decode(read, addr);
  return { length: ins.length, words: ins.words, text: formatInstruction(ins) };
};
