import type { Registers } from './registers';
import type { AccumulatorOp, AluOp, Modify, ShiftOp } from './mcode';

// 8-bit arithmetic and logic on the accumulator. Results land in A (except CP) and F.
export const alu8 = (r: Registers, op: AluOp, v: number): void => {
  const a = r.a;
  const carryIn = r.cFlag ? 1 : 0;
  switch (op) {
    case 'add':
    case 'adc': {
      const c = op === 'adc' ? carryIn : 0;
      const res = a + v + c;
      r.a = res;
      r.setFlags((res & 0xff) === 0, false, (a & 0xf) + (v & 0xf) + c > 0xf, res > 0xff);
      return;
    }
    case 'sub':
    case 'sbc':
    case 'cp': {
      const c = op === 'sbc' ? carryIn : 0;
      const res = a - v - c;
      if (op !== 'cp') r.a = res;
      r.setFlags((res & 0xff) === 0, true, (a & 0xf) - (v & 0xf) - c < 0, res < 0);
      return;
    }
    case 'and':
      r.a = a & v;
      r.setFlags(r.a === 0, false, true, false);
      return;
    case 'xor':
      r.a = a ^ v;
      r.setFlags(r.a === 0, false, false, false);
      return;
    case 'or':
      r.a = a | v;
      r.setFlags(r.a === 0, false, false, false);
      return;
  }
};

// Rotates and shifts of the extended table. Returns the result; Z/N/H/C are set from it.
export const shift8 = (r: Registers, op: ShiftOp, v: number): number => {
  const carryIn = r.cFlag ? 1 : 0;
  let res = v;
  let carry = false;
  switch (op) {
    case 'rlc': res = (v << 1) | (v >>> 7); carry = (v & 0x80) !== 0; break;
    case 'rrc': res = (v >>> 1) | (v << 7); carry = (v & 1) !== 0; break;
    case 'rl': res = (v << 1) | carryIn; carry = (v & 0x80) !== 0; break;
    case 'rr': res = (v >>> 1) | (carryIn << 7); carry = (v & 1) !== 0; break;
    case 'sla': res = v << 1; carry = (v & 0x80) !== 0; break;
    case 'sra': res = (v >>> 1) | (v & 0x80); carry = (v & 1) !== 0; break;
    case 'swap': res = ((v & 0x0f) << 4) | (v >>> 4); carry = false; break;
    case 'srl': res = v >>> 1; carry = (v & 1) !== 0; break;
  }
  res &= 0xff;
  r.setFlags(res === 0, false, false, carry);
  return res;
};

// Apply a read-modify-write operation, updating flags where the operation defines them
export const modify8 = (r: Registers, m: Modify, v: number): number => {
  switch (m.op) {
    case 'inc': {
      const res = (v + 1) & 0xff;
      r.zFlag = res === 0;
      r.nFlag = false;
      r.hFlag = (v & 0xf) === 0xf;
      return res;
    }
    case 'dec': {
      const res = (v - 1) & 0xff;
      r.zFlag = res === 0;
      r.nFlag = true;
      r.hFlag = (v & 0xf) === 0;
      return res;
    }
    case 'shift': return shift8(r, m.shift, v);
    case 'res': return v & ~(1 << m.bit) & 0xff;
    case 'set': return (v | (1 << m.bit)) & 0xff;
  }
};

export const bit8 = (r: Registers, bit: number, v: number): void => {
  r.zFlag = (v & (1 << bit)) === 0;
  r.nFlag = false;
  r.hFlag = true;
};

const daa = (r: Registers): void => {
  let a = r.a;
  let carry = r.cFlag;
  if (!r.nFlag) {
    let adjust = 0;
    if (r.hFlag || (a & 0xf) > 9) adjust |= 0x06;
    if (carry || a > 0x99) {
      adjust |= 0x60;
      carry = true;
    }
    a += adjust;
  } else {
    let adjust = 0;
    if (r.hFlag) adjust |= 0x06;
    if (carry) adjust |= 0x60;
    a -= adjust;
  }
  r.a = a;
  r.zFlag = r.a === 0;
  r.hFlag = false;
  r.cFlag = carry;
};

// Single-cycle operations on A and F. The rotates always clear Z.
export const accumulator = (r: Registers, op: AccumulatorOp): void => {
  switch (op) {
    case 'rlca':
    case 'rrca':
    case 'rla':
    case 'rra': {
      const shift: ShiftOp = op === 'rlca' ? 'rlc' : op === 'rrca' ? 'rrc' : op === 'rla' ? 'rl' : 'rr';
      r.a = shift8(r, shift, r.a);
      r.zFlag = false;
      return;
    }
    case 'daa': daa(r); return;
    case 'cpl':
      r.a = ~r.a;
      r.nFlag = true;
      r.hFlag = true;
      return;
    case 'scf':
      r.nFlag = false;
      r.hFlag = false;
      r.cFlag = true;
      return;
    case 'ccf':
      r.nFlag = false;
      r.hFlag = false;
      r.cFlag = !r.cFlag;
      return;
  }
};
