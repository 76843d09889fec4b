// Expands every opcode into the m-codes it executes, one per machine cycle.
// Both tables are built once at module load; decoding at run time is an array lookup.
import type { Reg8 } from './registers';
import type { AluOp, AccumulatorOp, Branch, Cond, Latch, MCode, Modify, Reg16Target, ShiftOp } from './mcode';
import { NOP_MCODE, illegalMCode } from './mcode';
import type { Opcode } from './opcodes';

// Operand encoding of bits 0..2 / 3..5: B C D E H L (HL) A
type R8Slot = Reg8 | 'ihl';
const R8: readonly R8Slot[] = ['b', 'c', 'd', 'e', 'h', 'l', 'ihl', 'a'];
const RR: readonly Reg16Target[] = ['bc', 'de', 'hl', 'sp'];
const RR_STACK: readonly ('bc' | 'de' | 'hl' | 'af')[] = ['bc', 'de', 'hl', 'af'];
const CC: readonly Cond[] = ['nz', 'z', 'nc', 'c'];
const ALU: readonly AluOp[] = ['add', 'adc', 'sub', 'sbc', 'and', 'xor', 'or', 'cp'];
const ACC: readonly AccumulatorOp[] = ['rlca', 'rrca', 'rla', 'rra', 'daa', 'cpl', 'scf', 'ccf'];
const SHIFT: readonly ShiftOp[] = ['rlc', 'rrc', 'rl', 'rr', 'sla', 'sra', 'swap', 'srl'];

const PAIR_HALVES: Record<'bc' | 'de' | 'hl' | 'af', [Reg8, Reg8]> = {
  bc: ['b', 'c'], de: ['d', 'e'], hl: ['h', 'l'], af: ['a', 'f'],
};

const nop = NOP_MCODE;
const illegal = (op: number): MCode[] => [illegalMCode(op)];

function imm(dst: Latch, branch?: Branch): MCode {
  return branch ? { kind: 'readImm', dst, branch } : { kind: 'readImm', dst };
}

const readHl: MCode = { kind: 'read', addr: 'hl', dst: 'z' };
const popZ: MCode = { kind: 'read', addr: 'sp', dst: 'z', step: 1 };
const popW: MCode = { kind: 'read', addr: 'sp', dst: 'w', step: 1 };
const decSp: MCode = { kind: 'step16', target: 'sp', delta: -1 };

// Read (HL) into Z, write back the modified value, then the overlap cycle
function rmwHl(modify: Modify): MCode[] {
  return [readHl, { kind: 'write', addr: 'hl', src: 'z', modify }, nop];
}

function modifyR8(slot: R8Slot, modify: Modify): MCode[] {
  return slot === 'ihl' ? rmwHl(modify) : [{ kind: 'modify', target: slot, modify }];
}

function callTo(target: 'wz' | number): MCode[] {
  return [decSp, { kind: 'pushPcHigh' }, { kind: 'pushPcLow', target }];
}

function ldR8R8(dst: R8Slot, src: R8Slot): MCode[] {
  if (src === 'ihl') return [readHl, { kind: 'ld', dst: dst === 'ihl' ? 'z' : dst, src: 'z' }];
  if (dst === 'ihl') return [{ kind: 'write', addr: 'hl', src }, nop];
  return [{ kind: 'ld', dst, src }];
}

function aluOperand(op: AluOp, src: R8Slot): MCode[] {
  return src === 'ihl' ? [readHl, { kind: 'alu', op, src: 'z' }] : [{ kind: 'alu', op, src }];
}

export function baseMCodes(op: number): MCode[] {
  const x = (op >>> 6) & 3;
  const y = (op >>> 3) & 7;
  const z = op & 7;
  const p = y >>> 1;
  const q = y & 1;

  switch (x) {
    case 0:
      switch (z) {
        case 0:
          if (y === 0) return [nop];
          // LD (a16),SP
          if (y === 1) return [imm('z'), imm('w'), { kind: 'write', addr: 'wz', src: 'spl', step: 1 }, { kind: 'write', addr: 'wz', src: 'sph' }, nop];
          // STOP needs the timer/joypad hardware
          if (y === 2) return illegal(op);
          if (y === 3) return [imm('z'), { kind: 'jrAdd' }, nop];
          return [imm('z', { cond: CC[y - 4], taken: [{ kind: 'jrAdd' }] }), nop];
        case 1:
          if (q === 0) return [imm('z'), imm('w'), { kind: 'ld16', dst: RR[p], src: 'wz' }];
          return [{ kind: 'addHl', src: RR[p], half: 'low' }, { kind: 'addHl', src: RR[p], half: 'high' }];
        case 2: {
          const addr = p === 0 ? 'bc' : p === 1 ? 'de' : 'hl';
          const step = p === 2 ? 1 : p === 3 ? -1 : undefined;
          if (q === 0) {
            return [step === undefined ? { kind: 'write', addr, src: 'a' } : { kind: 'write', addr, src: 'a', step }, nop];
          }
          return [step === undefined ? { kind: 'read', addr, dst: 'z' } : { kind: 'read', addr, dst: 'z', step }, { kind: 'ld', dst: 'a', src: 'z' }];
        }
        case 3:
          return [{ kind: 'step16', target: RR[p], delta: q === 0 ? 1 : -1 }, nop];
        case 4:
          return modifyR8(R8[y], { op: 'inc' });
        case 5:
          return modifyR8(R8[y], { op: 'dec' });
        case 6: {
          const dst = R8[y];
          if (dst === 'ihl') return [imm('z'), { kind: 'write', addr: 'hl', src: 'z' }, nop];
          return [imm('z'), { kind: 'ld', dst, src: 'z' }];
        }
        default:
          return [{ kind: 'accumulator', op: ACC[y] }];
      }
    case 1:
      // HALT waits on the interrupt controller
      if (op === 0x76) return illegal(op);
      return ldR8R8(R8[y], R8[z]);
    case 2:
      return aluOperand(ALU[y], R8[z]);
    default:
      return baseControlMCodes(op, y, z, p, q);
  }
}

// 0xC0..0xFF: control flow, stack, high-page loads, misc
function baseControlMCodes(op: number, y: number, z: number, p: number, q: number): MCode[] {
  switch (z) {
    case 0:
      if (y < 4) return [{ kind: 'checkCond', branch: { cond: CC[y], taken: [popZ, popW, { kind: 'jump', target: 'wz' }] } }, nop];
      if (y === 4) return [imm('z'), { kind: 'write', addr: 'hz', src: 'a' }, nop];
      if (y === 5) return [imm('z'), { kind: 'addSpRel' }, nop, { kind: 'ld16', dst: 'sp', src: 'wz' }];
      if (y === 6) return [imm('z'), { kind: 'read', addr: 'hz', dst: 'z' }, { kind: 'ld', dst: 'a', src: 'z' }];
      return [imm('z'), { kind: 'addSpRel' }, { kind: 'ld16', dst: 'hl', src: 'wz' }];
    case 1:
      if (q === 0) return [popZ, popW, { kind: 'ld16', dst: RR_STACK[p], src: 'wz' }];
      if (p === 0) return [popZ, popW, { kind: 'jump', target: 'wz' }, nop];
      if (p === 1) return [popZ, popW, { kind: 'jump', target: 'wz', enableIme: true }, nop];
      if (p === 2) return [{ kind: 'jumpHl' }];
      return [{ kind: 'ld16', dst: 'sp', src: 'hl' }, nop];
    case 2:
      if (y < 4) return [imm('z'), imm('w', { cond: CC[y], taken: [{ kind: 'jump', target: 'wz' }] }), nop];
      if (y === 4) return [{ kind: 'write', addr: 'hc', src: 'a' }, nop];
      if (y === 5) return [imm('z'), imm('w'), { kind: 'write', addr: 'wz', src: 'a' }, nop];
      if (y === 6) return [{ kind: 'read', addr: 'hc', dst: 'z' }, { kind: 'ld', dst: 'a', src: 'z' }];
      return [imm('z'), imm('w'), { kind: 'read', addr: 'wz', dst: 'z' }, { kind: 'ld', dst: 'a', src: 'z' }];
    case 3:
      if (y === 0) return [imm('z'), imm('w'), { kind: 'jump', target: 'wz' }, nop];
      // The prefix reads the extended opcode; its overlap slot is claimed by the extended m-codes
      if (y === 1) return [{ kind: 'prefixCb' }, nop];
      if (y === 6) return [{ kind: 'ime', enable: false }];
      if (y === 7) return [{ kind: 'ime', enable: true }];
      return illegal(op);
    case 4:
      if (y < 4) return [imm('z'), imm('w', { cond: CC[y], taken: callTo('wz') }), nop];
      return illegal(op);
    case 5: {
      if (q === 0) {
        const [high, low] = PAIR_HALVES[RR_STACK[p]];
        return [decSp, { kind: 'write', addr: 'sp', src: high, step: -1 }, { kind: 'write', addr: 'sp', src: low }, nop];
      }
      if (p === 0) return [imm('z'), imm('w'), ...callTo('wz'), nop];
      return illegal(op);
    }
    case 6:
      return [imm('z'), { kind: 'alu', op: ALU[y], src: 'z' }];
    default:
      return [...callTo(y * 8), nop];
  }
}

// M-codes of an extended instruction, after the cycle that read the extended opcode
export function cbMCodes(op: number): MCode[] {
  const x = (op >>> 6) & 3;
  const y = (op >>> 3) & 7;
  const slot = R8[op & 7];
  switch (x) {
    case 0:
      return modifyR8(slot, { op: 'shift', shift: SHIFT[y] });
    case 1:
      return slot === 'ihl' ? [readHl, { kind: 'bit', bit: y, src: 'z' }] : [{ kind: 'bit', bit: y, src: slot }];
    case 2:
      return modifyR8(slot, { op: 'res', bit: y });
    default:
      return modifyR8(slot, { op: 'set', bit: y });
  }
}

function freezeTable(build: (op: number) => MCode[]): readonly (readonly MCode[])[] {
  return Object.freeze(Array.from({ length: 256 }, (_, op) => Object.freeze(build(op))));
}

export const BASE_MCODES = freezeTable(baseMCodes);
export const CB_MCODES = freezeTable(cbMCodes);

export function mcodesFor(op: Opcode): readonly MCode[] {
  return op.table === 'base' ? BASE_MCODES[op.opcode] : CB_MCODES[op.opcode];
}

export function isImplemented(op: Opcode): boolean {
  return !mcodesFor(op).some((m) => m.kind === 'illegal');
}
