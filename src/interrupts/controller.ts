import { InvalidInterruptLevelError } from '../errors.js';
import { debugLog } from '../debug/log.js';

export const INTERRUPT_LEVELS = 6;
// Word holding the handler address for level L is at INTERRUPT_VECTOR_BASE + L
export const INTERRUPT_VECTOR_BASE = 0x0008;

export type InterruptLevel = 0 | 1 | 2 | 3 | 4 | 5;

export const toInterruptLevel = (n: number): InterruptLevel => {
  switch (n) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
      return n;
    default:
      throw new InvalidInterruptLevelError(n);
  }
};

export interface Interrupt {
  readonly level: InterruptLevel;
  readonly device: number;
  readonly ilsw: number;
  inBag: boolean;
}

export interface InServiceEntry {
  readonly interrupt: Interrupt;
  // Handler entry word; holds the return address stored at delivery
  readonly entry: number;
}

export interface InterruptCheckpoint {
  readonly queues: readonly (readonly Interrupt[])[];
  readonly inService: readonly InServiceEntry[];
}

export interface IInterruptController {
  raise: (level: number, device: number, ilsw: number) => Interrupt;
  // Head of the highest-priority non-empty queue, whether or not it may be delivered now
  peek: () => Interrupt | null;
  // The candidate the engine should deliver now, or null
  poll: () => Interrupt | null;
  acknowledge: (interrupt: Interrupt, entry: number) => void;
  // Ends the innermost level in service
  endLevel: () => InServiceEntry | null;
  currentLevel: () => InterruptLevel | null;
  current: () => InServiceEntry | null;
  inService: () => readonly InServiceEntry[];
  pendingCount: (level?: number) => number;
  pending: (level: number) => readonly Interrupt[];
  cancelDevice: (device: number) => number;
  checkpoint: () => InterruptCheckpoint;
  restore: (cp: InterruptCheckpoint) => void;
  reset: () => void;
}

export const createInterruptController = (): IInterruptController => {
  let queues: Interrupt[][] = Array.from({ length: INTERRUPT_LEVELS }, (): Interrupt[] => []);
  let stack: InServiceEntry[] = [];

  const queueFor = (level: InterruptLevel): Interrupt[] => {
    const q = queues[level];
    if (!q) throw new InvalidInterruptLevelError(level);
    return q;
  };

  const raise = (level: number, device: number, ilsw: number): Interrupt => {
    const lv = toInterruptLevel(level);
    const irq: Interrupt = { level: lv, device: device & 0x1f, ilsw: ilsw & 0xffff, inBag: false };
    queueFor(lv).push(irq);
    debugLog('DEBUG_IRQ_LOG', (): string => `irq: raise level=${lv} device=${irq.device} ilsw=${irq.ilsw.toString(16)}`);
    return irq;
  };

  const peek = (): Interrupt | null => {
    for (const q of queues) {
      const head = q[0];
      if (head) return head;
    }
    return null;
  };

  const currentLevel = (): InterruptLevel | null => stack[stack.length - 1]?.interrupt.level ?? null;

  const poll = (): Interrupt | null => {
    const cand = peek();
    if (!cand) return null;
    // Only a strictly higher priority (lower number) preempts the level in service
    const active = currentLevel();
    if (active !== null && cand.level >= active) return null;
    return cand;
  };

  const acknowledge = (interrupt: Interrupt, entry: number): void => {
    const q = queueFor(interrupt.level);
    const idx = q.indexOf(interrupt);
    if (idx < 0) throw new Error(`interrupt level ${interrupt.level} device ${interrupt.device} is not pending`);
    q.splice(idx, 1);
    interrupt.inBag = true;
    stack.push({ interrupt, entry: entry & 0xffff });
    debugLog('DEBUG_IRQ_LOG', (): string => `irq: deliver level=${interrupt.level} entry=${entry.toString(16)}`);
  };

  const endLevel = (): InServiceEntry | null => {
    const top = stack.pop() ?? null;
    if (top) debugLog('DEBUG_IRQ_LOG', (): string => `irq: end level=${top.interrupt.level}`);
    return top;
  };

  const current = (): InServiceEntry | null => stack[stack.length - 1] ?? null;

  const pendingCount = (level?: number): number => {
    if (level === undefined) return queues.reduce((n, q): number => n + q.length, 0);
    return queueFor(toInterruptLevel(level)).length;
  };

  const pending = (level: number): readonly Interrupt[] => [...queueFor(toInterruptLevel(level))];

  // Drops interrupts a device has queued but that have not been delivered
  const cancelDevice = (device: number): number => {
    let removed = 0;
    queues = queues.map((q): Interrupt[] => {
      const kept = q.filter((irq): boolean => irq.device !== device);
      removed += q.length - kept.length;
      return kept;
    });
    return removed;
  };

  const checkpoint = (): InterruptCheckpoint => ({
    queues: queues.map((q): Interrupt[] => [...q]),
    inService: [...stack],
  });

  const restore = (cp: InterruptCheckpoint): void => {
    queues = cp.queues.map((q): Interrupt[] => [...q]);
    stack = [...cp.inService];
    for (const q of queues) for (const irq of q) irq.inBag = false;
  };

  const reset = (): void => {
    queues = Array.from({ length: INTERRUPT_LEVELS }, (): Interrupt[] => []);
    stack = [];
  };

  return {
    raise,
    peek,
    poll,
    acknowledge,
    endLevel,
    currentLevel,
    current,
    inService: (): readonly InServiceEntry[] => [...stack],
    pendingCount,
    pending,
    cancelDevice,
    checkpoint,
    restore,
    reset,
  };
};
