#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { createMachine } from '../src/machine/machine.js';
import { parseWordImage, parseNumber } from '../src/machine/image.js';
import { disassembleOne } from '../src/cpu/ibm1130/disasm.js';
import { createTraceCollector } from '../src/debug/trace.js';
import { KEYBOARD_DEVICE_CODE } from '../src/io/keyboard.js';
import { hex4 } from '../src/util/bit.js';

// A simple, non-interactive debugger CLI you can drive with subcommands.
// Example:
//   tsx scripts/debugger.ts image ./echo.img type HELLO run 200 regs printer
// Commands:
//   image <path>            (load a word image; sets IAR when it has ENTRY)
//   iar <addr>              (set IAR)
//   run <steps>             (stop early at WAIT or on a fault)
//   step
//   regs
//   mem <addr> <len>
//   wmem <addr> <word...>
//   disasm <addr|iar> <count>
//   type <text>             (queue keyboard input)
//   card <word,word,...>    (put a card in the 2501 hopper)
//   irq <level> <ilsw>      (raise an interrupt as device 0)
//   clearwait
//   trace <on|off>          (print each executed instruction)
//   printer                 (show console printer output)
//   devices
//   help

const toNum = (s: string | undefined): number => {
  const v = s === undefined ? null : parseNumber(s);
  if (v === null) throw new Error(`not a number: '${s ?? ''}'`);
  return v;
};

const main = (): void => {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || argv[0] === 'help') {
    console.log('Usage: tsx scripts/debugger.ts [image <path>] [commands...]');
    process.exit(0);
  }

  const collector = createTraceCollector({ showWords: true });
  let tracing = false;
  const m = createMachine({
    standardDevices: true,
    trace: {
      traceDisasm: true,
      onTrace: (ev): void => {
        if (!tracing) return;
        collector.onTrace(ev);
        const line = collector.lines.pop();
        if (line !== undefined) console.log(line);
      },
    },
  });

  const safeRead = (a: number): number => (a >= 0 && a < m.getMemory().size ? m.readMemory(a) : 0);

  const dumpRegs = (): void => {
    const s = m.getState();
    const level = s.interruptLevel === null ? '-' : String(s.interruptLevel);
    console.log(
      `ACC=${hex4(s.acc)} EXT=${hex4(s.ext)} IAR=${hex4(s.iar)} XR1=${hex4(s.xr1)} XR2=${hex4(s.xr2)} XR3=${hex4(s.xr3)} ` +
        `C=${s.carry ? 1 : 0} V=${s.overflow ? 1 : 0} W=${s.wait ? 1 : 0} L=${level} count=${s.instructionCount}`,
    );
  };

  const dumpMem = (addr: number, len: number): void => {
    const words = m.readMemoryRange(addr, len);
    for (let off = 0; off < words.length; off += 8) {
      const row = words.slice(off, off + 8).map((w): string => hex4(w));
      console.log(`${hex4(addr + off)}: ${row.join(' ')}`);
    }
  };

  const disasm = (addr: number, count: number): void => {
    let a = addr;
    for (let n = 0; n < count && a < m.getMemory().size; n++) {
      const d = disassembleOne(safeRead, a);
      console.log(`${hex4(a)}: ${d.words.map((w): string => hex4(w)).join(' ').padEnd(10)} ${d.text}`);
      a += d.length;
    }
  };

  let i = 0;
  while (i < argv.length) {
    const cmd = argv[i++]!;
    switch (cmd) {
      case 'image': {
        const path = argv[i++]!;
        const image = parseWordImage(readFileSync(path, 'utf8'));
        m.loadImage(image);
        console.log(`Loaded image: ${basename(path)} (${image.words.length} words, ${image.symbols.size} symbols)`);
        break;
      }
      case 'iar':
        m.setState({ iar: toNum(argv[i++]) });
        break;
      case 'run': {
        const res = m.run(toNum(argv[i++]));
        console.log(`ran ${res.steps} steps, stop=${res.reason}${res.error ? ` (${res.error.message})` : ''}`);
        break;
      }
      case 'step': {
        const r = m.step();
        console.log(r.ok ? `step ok${r.interrupt ? ` INT${r.interrupt.level}` : ''}` : `fault: ${r.error.message}`);
        break;
      }
      case 'regs':
        dumpRegs();
        break;
      case 'mem': {
        const a = toNum(argv[i++]);
        dumpMem(a, toNum(argv[i++]));
        break;
      }
      case 'wmem': {
        const a = toNum(argv[i++]);
        const vals: number[] = [];
        while (i < argv.length) {
          const v = parseNumber(argv[i]!);
          if (v === null) break;
          vals.push(v & 0xffff);
          i++;
        }
        m.writeMemoryRange(a, vals);
        console.log(`wrote ${vals.length} word(s) at ${hex4(a)}`);
        break;
      }
      case 'disasm': {
        const a = argv[i++]!;
        disasm(a === 'iar' ? m.getState().iar : toNum(a), toNum(argv[i++]));
        break;
      }
      case 'type':
        m.getKeyboard()?.type(argv[i++] ?? '');
        break;
      case 'card': {
        const cols = (argv[i++] ?? '').split(',').map((t): number => toNum(t));
        m.getCardReader()?.loadCard(cols);
        break;
      }
      case 'irq': {
        const level = toNum(argv[i++]);
        m.raiseInterrupt(level, 0, toNum(argv[i++]));
        break;
      }
      case 'clearwait':
        m.clearWait();
        break;
      case 'trace':
        tracing = argv[i++] === 'on';
        break;
      case 'printer':
        console.log(m.getPrinter()?.getOutput() ?? '');
        break;
      case 'devices':
        for (const d of m.listDevices()) {
          const tag = d.code === KEYBOARD_DEVICE_CODE ? ` pending=${m.getKeyboard()?.pendingInput() ?? 0}` : '';
          console.log(`${String(d.code).padStart(2)} ${d.name} dsw=${hex4(d.dsw)} irq=${d.interruptPending ? 1 : 0}${tag}`);
        }
        break;
      default:
        console.log(`Unknown cmd '${cmd}'.`);
        process.exit(1);
    }
  }
};

main();
