// 5-bit operation code field values (word bits 0-4)
export const Opcode = {
  XIO: 0x01,
  SHIFT_LEFT: 0x02,
  SHIFT_RIGHT: 0x03,
  LDS: 0x04,
  STS: 0x05,
  WAIT: 0x06,
  BSI: 0x08,
  BSC: 0x09,
  LDX: 0x0c,
  STX: 0x0d,
  MDX: 0x0e,
  A: 0x10,
  AD: 0x11,
  S: 0x12,
  SD: 0x13,
  M: 0x14,
  D: 0x15,
  LD: 0x18,
  LDD: 0x19,
  STO: 0x1a,
  STD: 0x1b,
  AND: 0x1c,
  OR: 0x1d,
  EOR: 0x1e,
} as const;

export type OpcodeName = keyof typeof Opcode;
export type OpcodeValue = (typeof Opcode)[OpcodeName];

export type Mnemonic =
  | Exclude<OpcodeName, 'SHIFT_LEFT' | 'SHIFT_RIGHT'>
  | 'SLA'
  | 'SLCA'
  | 'SLT'
  | 'SLC'
  | 'SRA'
  | 'SRT'
  | 'RTE'
  | 'BOSC';

export interface OpcodeInfo {
  readonly opcode: OpcodeValue;
  readonly name: OpcodeName;
  // Whether F=1 selects the two-word form
  readonly longFormat: boolean;
}

const SHORT_ONLY: ReadonlySet<OpcodeName> = new Set<OpcodeName>(['SHIFT_LEFT', 'SHIFT_RIGHT', 'LDS', 'WAIT']);

const names = Object.keys(Opcode).filter((k): k is OpcodeName => k in Opcode);

export const OPCODE_TABLE: ReadonlyMap<number, OpcodeInfo> = new Map(
  names.map((name): [number, OpcodeInfo] => [Opcode[name], { opcode: Opcode[name], name, longFormat: !SHORT_ONLY.has(name) }]),
);

export const lookupOpcode = (field: number): OpcodeInfo | undefined => OPCODE_TABLE.get(field & 0x1f);

const LEFT_SHIFTS: readonly Mnemonic[] = ['SLA', 'SLCA', 'SLT', 'SLC'] as const;
const RIGHT_SHIFTS: readonly Mnemonic[] = ['SRA', 'SRA', 'SRT', 'RTE'] as const;

// Shift variant is selected by modifier bits 8-9; BSC with bit 9 set is BOSC.
export const mnemonicFor = (name: OpcodeName, modifiers: number): Mnemonic => {
  const sel = (modifiers >>> 6) & 3;
  switch (name) {
    case 'SHIFT_LEFT':
      return LEFT_SHIFTS[sel] ?? 'SLA';
    case 'SHIFT_RIGHT':
      return RIGHT_SHIFTS[sel] ?? 'SRA';
    case 'BSC':
      return modifiers & 0x40 ? 'BOSC' : 'BSC';
    default:
      return name;
  }
};

// Branch/skip condition bits in the low six bits of the modifier byte
export const Condition = {
  ZERO: 0x20,
  MINUS: 0x10,
  PLUS: 0x08,
  EVEN: 0x04,
  CARRY_OFF: 0x02,
  OVERFLOW_OFF: 0x01,
} as const;
export const CONDITION_MASK = 0x3f;
