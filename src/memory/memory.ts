import { MemoryViolationError } from '../errors.js';
import { u16 } from '../util/bit.js';
import { fnv1a32 } from '../util/checksum.js';

export const DEFAULT_MEMORY_WORDS = 32768;
export const MIN_MEMORY_WORDS = 16;

export interface IMemory {
  readonly size: number;
  read: (addr: number) => number;
  write: (addr: number, word: number) => void;
  readRange: (addr: number, count: number) => number[];
  writeRange: (addr: number, words: readonly number[]) => void;
  fill: (word: number) => void;
  checksum: () => number;
  // Write journal used to undo a failed instruction
  begin: () => void;
  commit: () => void;
  rollback: () => void;
}

export const createMemory = (size: number = DEFAULT_MEMORY_WORDS): IMemory => {
  if (!Number.isInteger(size) || size < MIN_MEMORY_WORDS) {
    throw new Error(`memory size must be an integer >= ${MIN_MEMORY_WORDS}, got ${size}`);
  }
  const words = new Uint16Array(size);
  let journal: Map<number, number> | null = null;

  const check = (addr: number): number => {
    if (!Number.isInteger(addr) || addr < 0 || addr >= size) throw new MemoryViolationError(addr, size);
    return addr;
  };

  const read = (addr: number): number => words[check(addr)] ?? 0;

  const write = (addr: number, word: number): void => {
    const a = check(addr);
    if (journal && !journal.has(a)) journal.set(a, words[a] ?? 0);
    words[a] = u16(word);
  };

  const readRange = (addr: number, count: number): number[] => {
    check(addr);
    const end = Math.min(size, addr + Math.max(0, count));
    return Array.from(words.subarray(addr, end));
  };

  const writeRange = (addr: number, data: readonly number[]): void => {
    check(addr);
    if (data.length > 0) check(addr + data.length - 1);
    data.forEach((w, i): void => write(addr + i, w));
  };

  const fill = (word: number): void => {
    words.fill(u16(word));
  };

  const checksum = (): number => fnv1a32(words);

  const begin = (): void => {
    journal = new Map();
  };
  const commit = (): void => {
    journal = null;
  };
  const rollback = (): void => {
    if (!journal) return;
    for (const [a, v] of journal) words[a] = v;
    journal = null;
  };

  return { size, read, write, readRange, writeRange, fill, checksum, begin, commit, rollback };
};
