// Shared types for the SingleStepTests sm83 vectors (github.com/SingleStepTests/sm83)

export interface SstState {
  pc: number;
  sp: number;
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
  h: number;
  l: number;
  ime?: number; // parsed, not compared
  ie?: number;  // usually only present on the initial state
  ram: [number, number][]; // [address, value]
}

// One bus cycle: [address, data, activity such as "r-m" / "-w-"]; null entries are idle cycles
export type SstCycle = [number | null, number | null, string] | null;

export interface SstTestCase {
  name: string; // opcode followed by the case number, e.g. "00 0000"
  initial: SstState;
  final: SstState;
  cycles: SstCycle[];
}

// Register fields compared after execution
export const SST_REGISTERS = ['pc', 'sp', 'a', 'b', 'c', 'd', 'e', 'f', 'h', 'l'] as const;
