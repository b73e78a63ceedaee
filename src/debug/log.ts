export type DebugFlag = 'CPU_DEBUG' | 'DEBUG_IO_LOG' | 'DEBUG_IRQ_LOG';

export const debugEnabled = (flag: DebugFlag): boolean => {
  const v = typeof process !== 'undefined' ? process.env[flag] : undefined;
  return v !== undefined && v !== '' && v !== '0' && v.toLowerCase() !== 'false';
};

// message is only built when the flag is set
export const debugLog = (flag: DebugFlag, message: () => string): void => {
  if (!debugEnabled(flag)) return;
  // eslint-disable-next-line no-console
  console.log(message());
};
