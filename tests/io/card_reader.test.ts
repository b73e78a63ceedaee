import { describe, it, expect } from 'vitest';
import { createCardReader, makeCard, CardReaderStatus, CARD_COLUMNS } from '../../src/io/card_reader.js';
import { IoFunction } from '../../src/io/iocc.js';
import { SENSE_RESET } from '../../src/io/device.js';
import { encode } from '../../src/cpu/ibm1130/decoder.js';
import { machineWith } from '../cpu/helpers.js';
import { rig } from './helpers.js';

describe('2501 card reader', (): void => {
  it('transfers the requested columns after the word count', (): void => {
    const cr = createCardReader();
    const r = rig(9, cr);
    cr.loadCard([1, 2, 3, 4]);
    r.memory.write(0x40, 0xfffd);
    r.io(IoFunction.InitRead, 0x40);
    expect(r.memory.readRange(0x41, 4)).toEqual([1, 2, 3, 0]);
    expect(cr.hopperCount()).toBe(0);
    expect(r.interrupts.pending(4)).toEqual([{ level: 4, device: 9, ilsw: 0x2000, inBag: false }]);
    expect(cr.status().dsw).toBe(CardReaderStatus.LAST_CARD | CardReaderStatus.OP_COMPLETE);
  });

  it('clears completion on sense with reset', (): void => {
    const cr = createCardReader();
    const r = rig(9, cr);
    cr.loadDeck([[7], [8]]);
    r.memory.write(0x40, 0xffff);
    r.io(IoFunction.InitRead, 0x40);
    r.io(IoFunction.SenseDevice, 0, SENSE_RESET);
    expect(r.acc()).toBe(CardReaderStatus.OP_COMPLETE);
    expect(cr.status()).toEqual({ busy: false, dsw: 0, interruptPending: false });
    expect(r.interrupts.pendingCount()).toBe(0);
    r.io(IoFunction.InitRead, 0x40);
    r.io(IoFunction.SenseDevice, 0, SENSE_RESET);
    expect(r.acc()).toBe(CardReaderStatus.LAST_CARD | CardReaderStatus.OP_COMPLETE);
    expect(cr.status().dsw).toBe(CardReaderStatus.NOT_READY);
  });

  it('limits the transfer to one card and treats a positive count as zero', (): void => {
    const cr = createCardReader();
    const r = rig(9, cr);
    cr.loadDeck([Array.from({ length: CARD_COLUMNS }, (_, i): number => i + 1), [5]]);
    r.memory.write(0x100, (-100) & 0xffff);
    r.io(IoFunction.InitRead, 0x100);
    expect(r.memory.read(0x100 + CARD_COLUMNS)).toBe(CARD_COLUMNS);
    expect(r.memory.read(0x101 + CARD_COLUMNS)).toBe(0);
    r.memory.write(0x200, 5);
    r.io(IoFunction.InitRead, 0x200);
    expect(r.memory.read(0x201)).toBe(0);
    expect(cr.hopperCount()).toBe(0);
  });

  it('reports NoData with an empty hopper', (): void => {
    const r = rig(9, createCardReader());
    expect(() => r.io(IoFunction.InitRead, 0x40)).toThrow('device 9: NoData (function 6)');
  });

  it('pads short cards and truncates long ones', (): void => {
    expect(makeCard([0x12345])).toHaveLength(CARD_COLUMNS);
    expect(makeCard([0x12345])[0]).toBe(0x2345);
    expect(makeCard(new Array<number>(100).fill(1))).toHaveLength(CARD_COLUMNS);
  });

  it('keeps the hopper across reset', (): void => {
    const cr = createCardReader();
    cr.loadCard([1]);
    cr.reset();
    expect(cr.hopperCount()).toBe(1);
  });

  it('leaves the card in the hopper when the transfer runs off the end of memory', (): void => {
    const m = machineWith(encode('XIO', { long: true, displacement: 0x200 }), 0x100, {
      memorySize: 1024,
      standardDevices: true,
    });
    m.writeMemoryRange(0x200, [0x03fe, 0x4e00]);
    m.writeMemory(0x3fe, 0xfffd);
    m.writeMemory(0x3ff, 0x1111);
    m.getCardReader()?.loadCard([7, 8, 9]);
    const r = m.step();
    expect(r.ok ? null : r.error).toMatchObject({ kind: 'MemoryViolation', address: 0x400 });
    expect(m.readMemory(0x3ff)).toBe(0x1111);
    expect(m.getCardReader()?.hopperCount()).toBe(1);
    expect(m.getInterrupts().pendingCount()).toBe(0);
    expect(m.getState().iar).toBe(0x100);
  });
});
