import { IoFunction, type IoccRequest, type IoFunctionCode } from './iocc.js';
import { SENSE_RESET, createInterruptLatch, noData, unsupported, type DeviceContext, type DeviceState, type IDevice } from './device.js';
import { sext16 } from '../util/bit.js';

export const CARD_READER_DEVICE_CODE = 9;
export const CARD_COLUMNS = 80;

export const CardReaderStatus = {
  LAST_CARD: 0x1000,
  OP_COMPLETE: 0x0800,
  NOT_READY: 0x0001,
} as const;

export interface CardReaderConfig {
  level?: number | undefined;
  ilsw?: number | undefined;
}

export interface ICardReader extends IDevice {
  loadCard: (columns: readonly number[]) => void;
  loadDeck: (cards: readonly (readonly number[])[]) => void;
  hopperCount: () => number;
}

// Pads or truncates to exactly 80 columns
export const makeCard = (columns: readonly number[]): number[] =>
  Array.from({ length: CARD_COLUMNS }, (_, i): number => (columns[i] ?? 0) & 0xffff);

/**
 * IBM 2501 card reader. Initiate read transfers one card: the word at the IOCC address
 * holds the negated column count and the columns land in the words after it. The
 * transfer completes within the XIO and raises the operation-complete interrupt.
 */
export const createCardReader = (cfg: CardReaderConfig = {}): ICardReader => {
  const level = cfg.level ?? 4;
  const ilsw = cfg.ilsw ?? 0x2000;
  const functions: ReadonlySet<IoFunctionCode> = new Set<IoFunctionCode>([IoFunction.InitRead, IoFunction.SenseDevice]);

  const hopper: number[][] = [];
  const latch = createInterruptLatch();
  let opComplete = false;
  let lastCard = false;

  const dsw = (): number => {
    let s = 0;
    if (lastCard) s |= CardReaderStatus.LAST_CARD;
    if (opComplete) s |= CardReaderStatus.OP_COMPLETE;
    if (hopper.length === 0 && !opComplete) s |= CardReaderStatus.NOT_READY;
    return s;
  };

  const initRead = (req: IoccRequest, ctx: DeviceContext): void => {
    const card = hopper[0];
    if (!card) throw noData(ctx, req);
    const count = Math.min(CARD_COLUMNS, Math.max(0, -sext16(ctx.readMemory(req.address))));
    for (let i = 0; i < count; i++) ctx.writeMemory(req.address + 1 + i, card[i] ?? 0);
    hopper.shift();
    lastCard = hopper.length === 0;
    opComplete = true;
    latch.set(ctx, level, ilsw);
  };

  const execute = (req: IoccRequest, ctx: DeviceContext): void => {
    switch (req.fn) {
      case IoFunction.InitRead:
        initRead(req, ctx);
        return;
      case IoFunction.SenseDevice:
        ctx.setAcc(dsw());
        if (req.modifiers & SENSE_RESET) {
          opComplete = false;
          lastCard = false;
          latch.clear(ctx);
        }
        return;
      default:
        throw unsupported(ctx, req);
    }
  };

  // The hopper keeps its cards across a reset
  const reset = (): void => {
    opComplete = false;
    lastCard = false;
    latch.clear();
  };

  return {
    name: '2501 Card Reader',
    functions,
    execute,
    reset,
    status: (): DeviceState => ({ busy: false, dsw: dsw(), interruptPending: latch.pending() }),
    loadCard: (columns: readonly number[]): void => {
      hopper.push(makeCard(columns));
    },
    loadDeck: (cards: readonly (readonly number[])[]): void => {
      for (const c of cards) hopper.push(makeCard(c));
    },
    hopperCount: (): number => hopper.length,
  };
};
