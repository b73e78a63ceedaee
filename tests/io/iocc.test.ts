import { describe, it, expect } from 'vitest';
import { decodeIocc, encodeIocc, ioFunctionName, IoFunction } from '../../src/io/iocc.js';

describe('IOCC', (): void => {
  it('splits the control word into device, function and modifiers', (): void => {
    expect(decodeIocc(0x0300, 0x4e81)).toEqual({ address: 0x0300, deviceCode: 9, fn: IoFunction.InitRead, modifiers: 0x81 });
  });

  it('packs a request back into two words', (): void => {
    expect(encodeIocc({ address: 0x0128, deviceCode: 2, fn: IoFunction.Write, modifiers: 0 })).toEqual([0x0128, 0x1100]);
    expect(encodeIocc({ address: 0, deviceCode: 31, fn: 7, modifiers: 0xff })).toEqual([0, 0xffff]);
  });

  it('names functions for logging', (): void => {
    expect(ioFunctionName(IoFunction.SenseInterrupt)).toBe('SENSE-INT');
    expect(ioFunctionName(0)).toBe('?');
  });
});
