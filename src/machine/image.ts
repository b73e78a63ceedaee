// Text form of an assembled program, as handed over by the assembler:
//
//   * comment            (also '#')
//   ENTRY /0100
//   SYMBOL START /0100
//   /0100: /C400 /0105 /3000
//
// Numbers take '/' or '0x' for hexadecimal, otherwise decimal. A leading '-' is allowed
// on data words. Each data line places its words at consecutive addresses.

export interface WordImage {
  words: { address: number; value: number }[];
  entry: number | null;
  symbols: Map<string, number>;
}

export class ImageParseError extends Error {
  constructor(
    public readonly line: number,
    message: string,
  ) {
    super(`line ${line}: ${message}`);
    this.name = 'ImageParseError';
  }
}

export const parseNumber = (token: string): number | null => {
  const t = token.trim();
  const neg = t.startsWith('-');
  const body = neg ? t.slice(1) : t;
  let v: number;
  if (/^\/[0-9a-fA-F]+$/.test(body)) v = parseInt(body.slice(1), 16);
  else if (/^0[xX][0-9a-fA-F]+$/.test(body)) v = parseInt(body.slice(2), 16);
  else if (/^[0-9]+$/.test(body)) v = parseInt(body, 10);
  else return null;
  return neg ? -v : v;
};

const SYMBOL_NAME = /^[A-Za-z$#@][A-Za-z0-9$#@]{0,7}$/;

export const parseWordImage = (text: string): WordImage => {
  const image: WordImage = { words: [], entry: null, symbols: new Map() };
  const lines = text.split(/\r?\n/);

  const num = (tok: string | undefined, lineNo: number, what: string): number => {
    const v = tok === undefined ? null : parseNumber(tok);
    if (v === null) throw new ImageParseError(lineNo, `bad ${what} '${tok ?? ''}'`);
    return v;
  };
  const address = (tok: string | undefined, lineNo: number): number => {
    const v = num(tok, lineNo, 'address');
    if (v < 0 || v > 0xffff) throw new ImageParseError(lineNo, `address ${v} out of range`);
    return v;
  };

  lines.forEach((raw, idx): void => {
    const lineNo = idx + 1;
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('*') || line.startsWith('#')) return;
    const toks = line.split(/\s+/);
    const head = (toks[0] ?? '').toUpperCase();

    if (head === 'ENTRY') {
      image.entry = address(toks[1], lineNo);
      return;
    }
    if (head === 'SYMBOL') {
      const name = toks[1] ?? '';
      if (!SYMBOL_NAME.test(name)) throw new ImageParseError(lineNo, `bad symbol name '${name}'`);
      image.symbols.set(name, address(toks[2], lineNo));
      return;
    }

    const colon = line.indexOf(':');
    if (colon < 0) throw new ImageParseError(lineNo, `expected '<address>: <words>'`);
    let at = address(line.slice(0, colon), lineNo);
    for (const tok of line.slice(colon + 1).trim().split(/\s+/)) {
      if (tok.length === 0) continue;
      const v = num(tok, lineNo, 'word');
      if (v < -0x8000 || v > 0xffff) throw new ImageParseError(lineNo, `word ${v} does not fit 16 bits`);
      image.words.push({ address: at, value: v & 0xffff });
      at++;
    }
  });
  return image;
};
