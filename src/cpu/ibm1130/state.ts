// Processor registers held outside core. XR1-XR3 are core words 1-3.
export interface CpuRegisters {
  acc: number;
  ext: number;
  iar: number;
  carry: boolean;
  overflow: boolean;
  wait: boolean;
  instructionCount: number;
}

export interface CpuSnapshot extends CpuRegisters {
  xr1: number;
  xr2: number;
  xr3: number;
  // Level of the interrupt currently in service, or null at mainline level
  interruptLevel: number | null;
}

export const createResetRegisters = (): CpuRegisters => ({
  acc: 0,
  ext: 0,
  iar: 0,
  carry: false,
  overflow: false,
  wait: false,
  instructionCount: 0,
});
