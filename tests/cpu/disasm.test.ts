import { describe, it, expect } from 'vitest';
import { disassembleOne } from '../../src/cpu/ibm1130/disasm.js';

const dis = (...words: number[]): string => disassembleOne((a): number => words[a] ?? 0, 0).text;

describe('disassembler', (): void => {
  it('writes the format and tag column the way source does', (): void => {
    expect(dis(0xc400, 0x0105)).toBe('LD L /0105');
    expect(dis(0xc580, 0x0105)).toBe('LD I1 /0105');
    expect(dis(0xc005)).toBe('LD /05');
    expect(dis(0xc205)).toBe('LD 2 /05');
    expect(dis(0x0c00, 0x0300)).toBe('XIO L /0300');
  });

  it('shows shift counts in decimal', (): void => {
    expect(dis(0x1004)).toBe('SLA 4');
    expect(dis(0x18c4)).toBe('RTE 4');
    expect(dis(0x1140)).toBe('SLCA 1 0');
  });

  it('spells branch conditions', (): void => {
    expect(dis(0x4c3f, 0x0200)).toBe('BSC L /0200,Z-+ECO');
    expect(dis(0x4c00, 0x0100)).toBe('BSC L /0100');
    expect(dis(0x4820)).toBe('BSC Z');
    expect(dis(0x4cc0, 0x0400)).toBe('BOSC I /0400');
    expect(dis(0x4005)).toBe('BSI /05');
  });

  it('handles the operand-less and immediate forms', (): void => {
    expect(dis(0x3000)).toBe('WAIT');
    expect(dis(0x2003)).toBe('LDS 3');
    expect(dis(0x74ff, 0x0300)).toBe('MDX L /0300,-1');
  });

  it('renders unknown words as data', (): void => {
    expect(disassembleOne((): number => 0, 0)).toEqual({ length: 1, words: [0], text: 'DC /0000' });
  });

  it('reports the instruction length', (): void => {
    expect(disassembleOne((a): number => [0xc400, 0x0105][a] ?? 0, 0).length).toBe(2);
  });
});
