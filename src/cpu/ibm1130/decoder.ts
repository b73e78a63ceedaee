import { InvalidOpcodeError } from '../../errors.js';
import { u16 } from '../../util/bit.js';
import { lookupOpcode, mnemonicFor, type Mnemonic, type OpcodeName, type OpcodeValue } from './opcodes.js';

export type Tag = 0 | 1 | 2 | 3;
export type InstructionFormat = 'short' | 'long';

export interface DecodedInstruction {
  address: number;
  words: number[];
  opcode: OpcodeValue;
  name: OpcodeName;
  mnemonic: Mnemonic;
  format: InstructionFormat;
  tag: Tag;
  // Short: the raw 8-bit field. Long: the full second word.
  displacement: number;
  indirect: boolean;
  // Low byte of the first word
  modifiers: number;
  length: 1 | 2;
}

export const toTag = (n: number): Tag => {
  const t = n & 3;
  return t === 1 ? 1 : t === 2 ? 2 : t === 3 ? 3 : 0;
};

export const fields = (word: number): { opcode: number; f: boolean; tag: Tag; modifiers: number } => ({
  opcode: (word >>> 11) & 0x1f,
  f: ((word >>> 10) & 1) === 1,
  tag: toTag(word >>> 8),
  modifiers: word & 0xff,
});

export const decode = (read: (addr: number) => number, address: number): DecodedInstruction => {
  const w1 = read(address) & 0xffff;
  const { opcode, f, tag, modifiers } = fields(w1);
  const info = lookupOpcode(opcode);
  if (!info) throw new InvalidOpcodeError(address, w1, opcode);

  const mnemonic = mnemonicFor(info.name, modifiers);
  if (f && info.longFormat) {
    const w2 = read(u16(address + 1)) & 0xffff;
    return {
      address,
      words: [w1, w2],
      opcode: info.opcode,
      name: info.name,
      mnemonic,
      format: 'long',
      tag,
      displacement: w2,
      indirect: (modifiers & 0x80) !== 0,
      modifiers,
      length: 2,
    };
  }
  return {
    address,
    words: [w1],
    opcode: info.opcode,
    name: info.name,
    mnemonic,
    format: 'short',
    tag,
    displacement: modifiers,
    indirect: false,
    modifiers,
    length: 1,
  };
};

// Assemble one instruction into its word(s); the inverse of decode for tests and tools.
export const encode = (
  name: OpcodeName,
  opts: { long?: boolean; tag?: Tag; indirect?: boolean; modifiers?: number; displacement?: number } = {},
): number[] => {
  const opcode = lookupOpcodeByName(name);
  const tag = opts.tag ?? 0;
  if (opts.long) {
    const mods = ((opts.modifiers ?? 0) & 0x7f) | (opts.indirect ? 0x80 : 0);
    return [u16((opcode << 11) | 0x0400 | (tag << 8) | mods), u16(opts.displacement ?? 0)];
  }
  const disp = (opts.displacement ?? opts.modifiers ?? 0) & 0xff;
  return [u16((opcode << 11) | (tag << 8) | disp)];
};

const lookupOpcodeByName = (name: OpcodeName): number => {
  for (let v = 0; v < 32; v++) {
    const info = lookupOpcode(v);
    if (info?.name === name) return v;
  }
  throw new Error(`unknown opcode name ${name}`);
};
