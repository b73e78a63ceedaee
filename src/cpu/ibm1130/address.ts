import { sext8, u16 } from '../../util/bit.js';
import type { DecodedInstruction, Tag } from './decoder.js';

export interface AddressContext {
  read: (addr: number) => number;
  xr: (tag: Exclude<Tag, 0>) => number;
}

// IAR value once the instruction has been fetched
export const nextAddress = (ins: DecodedInstruction): number => u16(ins.address + ins.length);

/**
 * Effective address of a memory-reference instruction.
 *
 * Short form is relative to the updated IAR with the 8-bit displacement taken as signed;
 * long form uses the second word. A non-zero tag adds the selected index register and
 * the indirect bit (long form only) dereferences the result once. All sums wrap at 16 bits.
 *
 * LDX, STX and MDX use the tag to name their target register; they pass `indexed: false`.
 */
export const resolveEffectiveAddress = (
  ins: DecodedInstruction,
  ctx: AddressContext,
  opts: { indexed?: boolean } = {},
): number => {
  let ea = ins.format === 'long' ? u16(ins.displacement) : u16(nextAddress(ins) + sext8(ins.displacement));
  if ((opts.indexed ?? true) && ins.tag !== 0) ea = u16(ea + ctx.xr(ins.tag));
  if (ins.indirect) ea = u16(ctx.read(ea));
  return ea;
};
