import { describe, it, expect } from 'vitest';
import { encode } from '../../src/cpu/ibm1130/decoder.js';
import { InvalidOpcodeError, MemoryViolationError } from '../../src/errors.js';
import { IoFunction, encodeIocc, type IoFunctionCode } from '../../src/io/iocc.js';
import type { DeviceState, IDevice } from '../../src/io/device.js';
import { machineWith, stepOk } from './helpers.js';

describe('step', (): void => {
  it('runs LD /0105 from 0x100', (): void => {
    const m = machineWith([0xc400, 0x0105]);
    m.writeMemory(0x105, 0x1234);
    const r = stepOk(m);
    expect(r.instruction.mnemonic).toBe('LD');
    expect(r.interrupt).toBeNull();
    expect(m.getState()).toMatchObject({ acc: 0x1234, iar: 0x102, instructionCount: 1 });
  });

  it('returns WaitState without moving the IAR', (): void => {
    const m = machineWith([0xc400, 0x0105]);
    m.setState({ wait: true });
    const r = m.step();
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.kind).toBe('WaitState');
    expect(m.getState()).toMatchObject({ iar: 0x100, acc: 0, instructionCount: 0 });
  });

  it('reports an invalid opcode and leaves the IAR on it', (): void => {
    const m = machineWith([0x0000]);
    const r = m.step();
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error).toBeInstanceOf(InvalidOpcodeError);
      expect(r.error.message).toBe('invalid opcode 0x00 in word /0000 at /0100');
    }
    expect(m.getState().iar).toBe(0x100);
  });

  it('reports a fetch past the end of memory', (): void => {
    const m = machineWith([], 0x100, { memorySize: 1024 });
    m.setState({ iar: 0x3ff });
    m.writeMemory(0x3ff, 0xc400);
    const r = m.step();
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error).toBeInstanceOf(MemoryViolationError);
      if (r.error instanceof MemoryViolationError) expect(r.error.address).toBe(0x400);
    }
    expect(m.getState().iar).toBe(0x3ff);
  });

  it('keeps the instruction and re-queues the interrupt when entry faults', (): void => {
    const m = machineWith([...encode('LD', { long: true, displacement: 0x200 }), 0xc005], 0x100, { memorySize: 1024 });
    m.writeMemory(0x200, 0x55);
    // level 3 vector points outside a 1K memory
    m.writeMemory(0x0b, 0x0500);
    const irq = m.raiseInterrupt(3, 5, 0x8000);
    const r = m.step();
    expect(r.ok ? null : r.error).toMatchObject({ kind: 'MemoryViolation', address: 0x500 });
    expect(m.getState()).toMatchObject({ acc: 0x55, iar: 0x102, instructionCount: 1, interruptLevel: null });
    expect(m.getInterrupts().pending(3)).toEqual([irq]);
    expect(irq.inBag).toBe(false);

    m.writeMemory(0x0b, 0x0380);
    const next = stepOk(m);
    expect(next.interrupt).toBe(irq);
    expect(m.readMemory(0x380)).toBe(0x103);
    expect(m.getState()).toMatchObject({ iar: 0x381, interruptLevel: 3, instructionCount: 2 });
  });

  it('does not lose a card when the completion interrupt cannot be entered', (): void => {
    const m = machineWith([...encode('XIO', { long: true, displacement: 0x200 }), 0xc005], 0x100, {
      memorySize: 1024,
      standardDevices: true,
    });
    // initiate read on the 2501, two columns into 0x301
    m.writeMemoryRange(0x200, encodeIocc({ address: 0x300, deviceCode: 9, fn: IoFunction.InitRead, modifiers: 0 }));
    m.writeMemory(0x300, 0xfffe);
    m.writeMemory(0x0c, 0x0500);
    m.getCardReader()?.loadCard([7, 8]);

    const r = m.step();
    expect(r.ok ? null : r.error).toMatchObject({ kind: 'MemoryViolation', address: 0x500 });
    expect(m.readMemoryRange(0x301, 2)).toEqual([7, 8]);
    expect(m.getCardReader()?.hopperCount()).toBe(0);
    expect(m.getInterrupts().pending(4).map((i): number => i.device)).toEqual([9]);
    expect(m.deviceStatus(9)?.interruptPending).toBe(true);
    expect(m.getState()).toMatchObject({ iar: 0x102, instructionCount: 1 });

    m.writeMemory(0x0c, 0x0380);
    const next = stepOk(m);
    expect(next.interrupt?.device).toBe(9);
    expect(m.getState().iar).toBe(0x381);
  });

  it('prints once when the interrupt after a printer write cannot be entered', (): void => {
    const printed: string[] = [];
    const m = machineWith([...encode('XIO', { long: true, displacement: 0x200 }), 0xc005], 0x100, {
      memorySize: 1024,
      standardDevices: true,
      onPrint: (ch): void => {
        printed.push(ch);
      },
    });
    m.writeMemoryRange(0x200, encodeIocc({ address: 0x210, deviceCode: 2, fn: IoFunction.Write, modifiers: 0 }));
    m.writeMemory(0x210, 0x41);
    m.writeMemory(0x0b, 0x0500);
    m.raiseInterrupt(3, 0, 0);

    expect(m.step().ok).toBe(false);
    m.writeMemory(0x0b, 0x0380);
    stepOk(m);
    expect(m.getPrinter()?.getOutput()).toBe('A');
    expect(printed).toEqual(['A']);
  });

  it('keeps a completed instruction when the trace callback throws', (): void => {
    const m = machineWith(encode('STO', { long: true, displacement: 0x200 }), 0x100, {
      trace: {
        onTrace: (): void => {
          throw new Error('host failure');
        },
      },
    });
    m.setState({ acc: 5 });
    expect(() => m.step()).toThrow('host failure');
    expect(m.readMemory(0x200)).toBe(5);
    expect(m.getState()).toMatchObject({ iar: 0x102, instructionCount: 1 });
  });

  it('rolls back and rethrows errors that are not processor faults', (): void => {
    const broken: IDevice = {
      name: 'broken',
      functions: new Set<IoFunctionCode>([IoFunction.Write]),
      execute: (_req, ctx): void => {
        ctx.writeMemory(0x250, 0xdead);
        throw new Error('device bug');
      },
      reset: (): void => {},
      status: (): DeviceState => ({ busy: false, dsw: 0, interruptPending: false }),
    };
    const m = machineWith(encode('XIO', { long: true, displacement: 0x200 }));
    m.writeMemoryRange(0x200, encodeIocc({ address: 0, deviceCode: 5, fn: IoFunction.Write, modifiers: 0 }));
    m.attachDevice(5, broken);
    expect(() => m.step()).toThrow('device bug');
    expect(m.readMemory(0x250)).toBe(0);
    expect(m.getState().iar).toBe(0x100);
  });

  it('counts executed instructions', (): void => {
    const m = machineWith([0xc005, 0xc005, 0xc005]);
    stepOk(m);
    stepOk(m);
    stepOk(m);
    expect(m.getState().instructionCount).toBe(3);
  });

  it('reports trace events after each instruction', (): void => {
    const events: number[] = [];
    const m = machineWith([0xc005, 0x3000], 0x100, {
      trace: {
        onTrace: (ev): void => {
          events.push(ev.iarBefore);
        },
      },
    });
    stepOk(m);
    stepOk(m);
    expect(events).toEqual([0x100, 0x101]);
  });
});
