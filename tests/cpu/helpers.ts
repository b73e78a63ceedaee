import { createMachine, type IMachine, type MachineConfig } from '../../src/machine/machine.js';
import type { StepResult } from '../../src/cpu/ibm1130/cpu.js';

// Machine with `program` placed at `at` and the IAR pointing at it
export const machineWith = (program: readonly number[], at = 0x100, cfg: MachineConfig = {}): IMachine => {
  const m = createMachine(cfg);
  m.writeMemoryRange(at, program);
  m.setState({ iar: at });
  return m;
};

export const stepOk = (m: IMachine): Extract<StepResult, { ok: true }> => {
  const r = m.step();
  if (!r.ok) throw r.error;
  return r;
};
