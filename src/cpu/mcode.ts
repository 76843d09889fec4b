import type { Reg8 } from './registers';

// Break each instruction on the SM83 down to the actions performed in each machine cycle
// (m-cycle). These "m-codes" are not the chip's microcode; they follow the per-cycle
// diagrams of the Game Boy Complete Technical Reference.
//
// An instruction of N m-cycles is N m-codes. The last one runs in the same cycle as the
// fetch of the next opcode, so it only ever touches registers.

// Internal 8-bit temporaries used by multi-cycle instructions
export type Latch = 'z' | 'w';

export type Operand8 = Reg8 | Latch;

// 16-bit register targets of loads and increments
export type Reg16Target = 'af' | 'bc' | 'de' | 'hl' | 'sp';

// Address sources for bus accesses. 'hz' and 'hc' are $FF00+Z and $FF00+C (LDH forms).
export type AddrSource = 'bc' | 'de' | 'hl' | 'sp' | 'wz' | 'hz' | 'hc';

// Post-access adjustment of the address register (HL+/HL-, stack pointer, WZ)
export type AddrStep = 1 | -1;

export type Cond = 'nz' | 'z' | 'nc' | 'c';

export type AluOp = 'add' | 'adc' | 'sub' | 'sbc' | 'and' | 'xor' | 'or' | 'cp';

export type ShiftOp = 'rlc' | 'rrc' | 'rl' | 'rr' | 'sla' | 'sra' | 'swap' | 'srl';

export type AccumulatorOp = 'rlca' | 'rrca' | 'rla' | 'rra' | 'daa' | 'cpl' | 'scf' | 'ccf';

// Read-modify-write operations on a single byte
export type Modify =
  | { op: 'inc' }
  | { op: 'dec' }
  | { op: 'shift'; shift: ShiftOp }
  | { op: 'res'; bit: number }
  | { op: 'set'; bit: number };

// Extra m-codes queued in front of the remaining ones when a condition holds
export interface Branch {
  cond: Cond;
  taken: readonly MCode[];
}

export type JumpTarget = 'wz' | number;

export type MCode =
  | { kind: 'nop' }
  | { kind: 'illegal'; opcode: number }
  | { kind: 'readImm'; dst: Latch; branch?: Branch }
  | { kind: 'read'; addr: AddrSource; dst: Operand8; step?: AddrStep }
  | { kind: 'write'; addr: AddrSource; src: Operand8 | 'spl' | 'sph'; step?: AddrStep; modify?: Modify }
  | { kind: 'ld'; dst: Operand8; src: Operand8 }
  | { kind: 'ld16'; dst: Reg16Target; src: 'wz' | 'hl' }
  | { kind: 'step16'; target: Reg16Target; delta: AddrStep }
  | { kind: 'alu'; op: AluOp; src: Operand8 }
  | { kind: 'modify'; target: Operand8; modify: Modify }
  | { kind: 'bit'; bit: number; src: Operand8 }
  | { kind: 'accumulator'; op: AccumulatorOp }
  | { kind: 'addHl'; src: Reg16Target; half: 'low' | 'high' }
  | { kind: 'addSpRel' }
  | { kind: 'jrAdd' }
  | { kind: 'jump'; target: JumpTarget; enableIme?: boolean }
  | { kind: 'jumpHl' }
  | { kind: 'pushPcHigh' }
  | { kind: 'pushPcLow'; target: JumpTarget }
  | { kind: 'checkCond'; branch: Branch }
  | { kind: 'prefixCb' }
  | { kind: 'ime'; enable: boolean };

export const NOP_MCODE: MCode = { kind: 'nop' };
// IR may already hold the next opcode when the marker runs
export const illegalMCode = (opcode: number): MCode => ({ kind: 'illegal', opcode });

// Short display form for traces and assertion messages
export function describeMCode(m: MCode): string {
  switch (m.kind) {
    case 'nop': return 'nop';
    case 'illegal': return 'illegal';
    case 'readImm': return m.branch ? `${m.dst}<-imm ?${m.branch.cond}` : `${m.dst}<-imm`;
    case 'read': return `${m.dst}<-(${m.addr}${stepSuffix(m.step)})`;
    case 'write': return `(${m.addr}${stepSuffix(m.step)})<-${m.modify ? `${describeModify(m.modify)} ` : ''}${m.src}`;
    case 'ld': return `${m.dst}<-${m.src}`;
    case 'ld16': return `${m.dst}<-${m.src}`;
    case 'step16': return `${m.target}${m.delta > 0 ? '++' : '--'}`;
    case 'alu': return `${m.op} a,${m.src}`;
    case 'modify': return `${describeModify(m.modify)} ${m.target}`;
    case 'bit': return `bit ${m.bit},${m.src}`;
    case 'accumulator': return m.op;
    case 'addHl': return `add hl.${m.half},${m.src}`;
    case 'addSpRel': return 'wz<-sp+e';
    case 'jrAdd': return 'pc<-pc+e';
    case 'jump': return `pc<-${typeof m.target === 'number' ? `$${m.target.toString(16)}` : m.target}${m.enableIme ? ' ei' : ''}`;
    case 'jumpHl': return 'pc<-hl';
    case 'pushPcHigh': return '(sp--)<-pch';
    case 'pushPcLow': return '(sp)<-pcl';
    case 'checkCond': return `?${m.branch.cond}`;
    case 'prefixCb': return 'cb<-imm';
    case 'ime': return m.enable ? 'ei' : 'di';
  }
}

function stepSuffix(step: AddrStep | undefined): string {
  if (step === undefined) return '';
  return step > 0 ? '+' : '-';
}

function describeModify(m: Modify): string {
  switch (m.op) {
    case 'inc': return 'inc';
    case 'dec': return 'dec';
    case 'shift': return m.shift;
    case 'res': return `res ${m.bit}`;
    case 'set': return `set ${m.bit}`;
  }
}
