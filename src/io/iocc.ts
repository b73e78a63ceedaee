// I/O channel command: two words at an even/odd address pair.
//   word 0: word count / data address (WCA)
//   word 1: device area code (bits 0-4), function (bits 5-7), modifiers (bits 8-15)

export const IoFunction = {
  Write: 1,
  Read: 2,
  SenseInterrupt: 3,
  Control: 4,
  InitWrite: 5,
  InitRead: 6,
  SenseDevice: 7,
} as const;

export type IoFunctionName = keyof typeof IoFunction;
export type IoFunctionCode = (typeof IoFunction)[IoFunctionName];

export interface IoccRequest {
  address: number;
  deviceCode: number;
  // Raw 3-bit field; 0 is not a defined function
  fn: number;
  modifiers: number;
}

export const decodeIocc = (word0: number, word1: number): IoccRequest => ({
  address: word0 & 0xffff,
  deviceCode: (word1 >>> 11) & 0x1f,
  fn: (word1 >>> 8) & 0x07,
  modifiers: word1 & 0xff,
});

export const encodeIocc = (req: IoccRequest): [number, number] => [
  req.address & 0xffff,
  (((req.deviceCode & 0x1f) << 11) | ((req.fn & 0x07) << 8) | (req.modifiers & 0xff)) >>> 0,
];

const FUNCTION_NAMES: readonly string[] = ['?', 'WRITE', 'READ', 'SENSE-INT', 'CONTROL', 'INIT-WRITE', 'INIT-READ', 'SENSE-DEV'];

export const ioFunctionName = (fn: number): string => FUNCTION_NAMES[fn & 7] ?? '?';
