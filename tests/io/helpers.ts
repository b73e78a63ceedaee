import { DeviceBus } from '../../src/bus/bus.js';
import { createInterruptController, type IInterruptController } from '../../src/interrupts/controller.js';
import { createMemory, type IMemory } from '../../src/memory/memory.js';
import type { IDevice } from '../../src/io/device.js';

export interface DeviceRig {
  memory: IMemory;
  interrupts: IInterruptController;
  bus: DeviceBus;
  // Dispatches one IOCC to the device under test
  io: (fn: number, address?: number, modifiers?: number) => void;
  acc: () => number;
}

export const rig = (code: number, device: IDevice): DeviceRig => {
  const memory = createMemory(1024);
  const interrupts = createInterruptController();
  const bus = new DeviceBus(memory, interrupts);
  bus.attach(code, device);
  let acc = 0;
  const io = (fn: number, address = 0, modifiers = 0): void =>
    bus.dispatch(
      { address, deviceCode: code, fn, modifiers },
      {
        getAcc: (): number => acc,
        setAcc: (w: number): void => {
          acc = w;
        },
      },
    );
  return { memory, interrupts, bus, io, acc: (): number => acc };
};
