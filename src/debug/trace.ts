import type { Registers } from '../cpu/registers';
import { hex2, hex4 } from '../util/bit';

// Minimal view of the CPU needed for formatting
export interface CpuView {
  readonly registers: Registers;
  readonly pc: number;
  readonly sp: number;
}

export interface TraceEvent {
  pc: number; // address the opcode was fetched from
  opcode: number;
  text: string; // canonical mnemonic
  mCycles: number; // m-cycles executed before this fetch
}

const bit = (on: boolean): string => (on ? '1' : '0');

// e.g. `SM83 { A:CD c:1 h:0 n:1 z:0 BC:89AB DE:4567 HL:0123 SP:A801 PC:532D }`
export const formatCpu = (cpu: CpuView): string => {
  const r = cpu.registers;
  return `SM83 { A:${hex2(r.a)} c:${bit(r.cFlag)} h:${bit(r.hFlag)} n:${bit(r.nFlag)} z:${bit(r.zFlag)} `
    + `BC:${hex4(r.bc)} DE:${hex4(r.de)} HL:${hex4(r.hl)} SP:${hex4(cpu.sp)} PC:${hex4(cpu.pc)} }`;
};

export const formatTrace = (ev: TraceEvent): string =>
  `${hex4(ev.pc)}: ${hex2(ev.opcode)}  ${ev.text}  m=${ev.mCycles}`;

export interface TraceCollector {
  lines: string[];
  onTrace: (ev: TraceEvent) => void;
}

export const createTraceCollector = (): TraceCollector => {
  const lines: string[] = [];
  const onTrace = (ev: TraceEvent): void => {
    lines.push(formatTrace(ev));
  };
  return { lines, onTrace };
};
