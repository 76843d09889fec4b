import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Registers } from '../../src/cpu/registers';
import { alu8 } from '../../src/cpu/alu';
import type { AluOp } from '../../src/cpu/mcode';
import { load, run } from './program';

const byte = fc.integer({ min: 0, max: 0xff });

// Reference model: result and flags of an 8-bit ALU operation on A
function model(op: AluOp, a: number, v: number, carry: boolean): { a: number; f: number } {
  const c = carry ? 1 : 0;
  const pack = (z: boolean, n: boolean, h: boolean, cy: boolean) =>
    (z ? 0x80 : 0) | (n ? 0x40 : 0) | (h ? 0x20 : 0) | (cy ? 0x10 : 0);
  switch (op) {
    case 'add': {
      const r = a + v;
      return { a: r & 0xff, f: pack((r & 0xff) === 0, false, (a & 0xf) + (v & 0xf) > 0xf, r > 0xff) };
    }
    case 'adc': {
      const r = a + v + c;
      return { a: r & 0xff, f: pack((r & 0xff) === 0, false, (a & 0xf) + (v & 0xf) + c > 0xf, r > 0xff) };
    }
    case 'sub':
    case 'cp': {
      const r = a - v;
      const out = op === 'cp' ? a : r & 0xff;
      return { a: out, f: pack((r & 0xff) === 0, true, (a & 0xf) < (v & 0xf), a < v) };
    }
    case 'sbc': {
      const r = a - v - c;
      return { a: r & 0xff, f: pack((r & 0xff) === 0, true, (a & 0xf) < (v & 0xf) + c, a < v + c) };
    }
    case 'and': return { a: a & v, f: pack((a & v) === 0, false, true, false) };
    case 'xor': return { a: a ^ v, f: pack((a ^ v) === 0, false, false, false) };
    case 'or': return { a: a | v, f: pack((a | v) === 0, false, false, false) };
  }
}

describe('alu8 against the reference model', () => {
  const ops: AluOp[] = ['add', 'adc', 'sub', 'sbc', 'and', 'xor', 'or', 'cp'];
  for (const op of ops) {
    it(op, () => {
      fc.assert(
        fc.property(byte, byte, fc.boolean(), fc.boolean(), fc.boolean(), (a, v, carry, z, n) => {
          const r = new Registers();
          r.a = a;
          r.setFlags(z, n, false, carry);
          alu8(r, op, v);
          const want = model(op, a, v, carry);
          return r.a === want.a && r.f === want.f;
        }),
        { numRuns: 500 }
      );
    });
  }
});

describe('ALU instructions', () => {
  it('ADD A,B with zero, half carry and carry', () => {
    const m = load([0x80]);
    m.cpu.registers.a = 0x3a;
    m.cpu.registers.b = 0xc6;
    run(m);
    expect(m.cpu.registers.a).toBe(0x00);
    expect(m.cpu.registers.f).toBe(0xb0);
  });

  it('ADC A,n8 adds the carry', () => {
    const m = load([0xce, 0x0f]);
    m.cpu.registers.a = 0xe1;
    m.cpu.registers.f = 0x10;
    run(m);
    expect(m.cpu.registers.a).toBe(0xf1);
    expect(m.cpu.registers.f).toBe(0x20);
  });

  it('SUB A,E', () => {
    const m = load([0x93]);
    m.cpu.registers.a = 0x3e;
    m.cpu.registers.e = 0x0f;
    run(m);
    expect(m.cpu.registers.a).toBe(0x2f);
    expect(m.cpu.registers.f).toBe(0x60);
  });

  it('SBC A,H subtracts the carry', () => {
    const m = load([0x9c]);
    m.cpu.registers.a = 0x3b;
    m.cpu.registers.h = 0x2a;
    m.cpu.registers.f = 0x10;
    run(m);
    expect(m.cpu.registers.a).toBe(0x10);
    expect(m.cpu.registers.f).toBe(0x40);
  });

  it('AND A,L sets H', () => {
    const m = load([0xa5]);
    m.cpu.registers.a = 0x5a;
    m.cpu.registers.l = 0x3f;
    run(m);
    expect(m.cpu.registers.a).toBe(0x1a);
    expect(m.cpu.registers.f).toBe(0x20);
  });

  it('XOR A,A clears A', () => {
    const m = load([0xaf]);
    m.cpu.registers.a = 0x5a;
    m.cpu.registers.f = 0x70;
    run(m);
    expect(m.cpu.registers.a).toBe(0x00);
    expect(m.cpu.registers.f).toBe(0x80);
  });

  it('CP A,(HL) leaves A alone', () => {
    const m = load([0xbe]);
    m.cpu.registers.a = 0x3c;
    m.cpu.registers.hl = 0xd000;
    m.bus.write8(0xd000, 0x40);
    run(m);
    expect(m.cpu.registers.a).toBe(0x3c);
    expect(m.cpu.registers.f).toBe(0x50);
  });

  it('INC r keeps C and sets H on a nibble carry', () => {
    const m = load([0x3c, 0x04]);
    m.cpu.registers.a = 0x0f;
    m.cpu.registers.b = 0xff;
    m.cpu.registers.f = 0x10;
    run(m);
    expect(m.cpu.registers.a).toBe(0x10);
    expect(m.cpu.registers.f).toBe(0x30);
    run(m);
    expect(m.cpu.registers.b).toBe(0x00);
    expect(m.cpu.registers.f).toBe(0xb0);
  });

  it('DEC r sets N and borrows into H', () => {
    const m = load([0x05, 0x0d]);
    m.cpu.registers.b = 0x01;
    m.cpu.registers.c = 0x00;
    run(m);
    expect(m.cpu.registers.b).toBe(0x00);
    expect(m.cpu.registers.f).toBe(0xc0);
    run(m);
    expect(m.cpu.registers.c).toBe(0xff);
    expect(m.cpu.registers.f).toBe(0x60);
  });

  it('INC (HL) and DEC (HL) write back through memory', () => {
    const m = load([0x34, 0x35, 0x35]);
    m.cpu.registers.hl = 0xd000;
    m.bus.write8(0xd000, 0xff);
    run(m);
    expect(m.bus.read8(0xd000)).toBe(0x00);
    expect(m.cpu.registers.f).toBe(0xa0);
    run(m, 2);
    expect(m.bus.read8(0xd000)).toBe(0xfe);
    expect(m.cpu.registers.f).toBe(0x40);
  });
});

describe('DAA', () => {
  it('adjusts after an addition', () => {
    const m = load([0x80, 0x27]);
    m.cpu.registers.a = 0x15;
    m.cpu.registers.b = 0x27;
    run(m, 2);
    expect(m.cpu.registers.a).toBe(0x42);
    expect(m.cpu.registers.f).toBe(0x00);
  });

  it('adjusts after a subtraction', () => {
    const m = load([0x90, 0x27]);
    m.cpu.registers.a = 0x42;
    m.cpu.registers.b = 0x15;
    run(m, 2);
    expect(m.cpu.registers.a).toBe(0x27);
    expect(m.cpu.registers.f).toBe(0x40);
  });

  it('carries out of 99', () => {
    const m = load([0x80, 0x27]);
    m.cpu.registers.a = 0x99;
    m.cpu.registers.b = 0x01;
    run(m, 2);
    expect(m.cpu.registers.a).toBe(0x00);
    expect(m.cpu.registers.f).toBe(0x90);
  });

  it('yields packed BCD sums', () => {
    const bcd = (n: number) => ((Math.floor(n / 10) << 4) | (n % 10));
    const digits = fc.integer({ min: 0, max: 99 });
    fc.assert(
      fc.property(digits, digits, (x, y) => {
        const m = load([0x80, 0x27]);
        m.cpu.registers.a = bcd(x);
        m.cpu.registers.b = bcd(y);
        run(m, 2);
        return m.cpu.registers.a === bcd((x + y) % 100) && m.cpu.registers.cFlag === (x + y >= 100);
      }),
      { numRuns: 300 }
    );
  });

  it('yields packed BCD differences', () => {
    const bcd = (n: number) => ((Math.floor(n / 10) << 4) | (n % 10));
    const digits = fc.integer({ min: 0, max: 99 });
    fc.assert(
      fc.property(digits, digits, (x, y) => {
        const m = load([0x90, 0x27]);
        m.cpu.registers.a = bcd(x);
        m.cpu.registers.b = bcd(y);
        run(m, 2);
        return m.cpu.registers.a === bcd((x - y + 100) % 100) && m.cpu.registers.cFlag === (x < y);
      }),
      { numRuns: 300 }
    );
  });
});

describe('accumulator and flag instructions', () => {
  it('RLCA / RRCA / RLA / RRA', () => {
    const m = load([0x07, 0x0f, 0x17, 0x1f]);
    m.cpu.registers.a = 0x85;
    run(m);
    expect(m.cpu.registers.a).toBe(0x0b);
    expect(m.cpu.registers.f).toBe(0x10);
    m.cpu.registers.a = 0x3b;
    run(m);
    expect(m.cpu.registers.a).toBe(0x9d);
    expect(m.cpu.registers.f).toBe(0x10);
    m.cpu.registers.a = 0x95;
    run(m);
    expect(m.cpu.registers.a).toBe(0x2b);
    expect(m.cpu.registers.f).toBe(0x10);
    m.cpu.registers.a = 0x81;
    m.cpu.registers.f = 0x00;
    run(m);
    expect(m.cpu.registers.a).toBe(0x40);
    expect(m.cpu.registers.f).toBe(0x10);
  });

  it('accumulator rotates always clear Z', () => {
    const m = load([0x07]);
    m.cpu.registers.a = 0x00;
    m.cpu.registers.f = 0x80;
    run(m);
    expect(m.cpu.registers.a).toBe(0x00);
    expect(m.cpu.registers.f).toBe(0x00);
  });

  it('CPL', () => {
    const m = load([0x2f]);
    m.cpu.registers.a = 0x35;
    m.cpu.registers.f = 0x90;
    run(m);
    expect(m.cpu.registers.a).toBe(0xca);
    expect(m.cpu.registers.f).toBe(0xf0);
  });

  it('SCF and CCF', () => {
    const m = load([0x37, 0x3f, 0x3f]);
    m.cpu.registers.f = 0xe0;
    run(m);
    expect(m.cpu.registers.f).toBe(0x90);
    run(m);
    expect(m.cpu.registers.f).toBe(0x80);
    run(m);
    expect(m.cpu.registers.f).toBe(0x90);
  });
});

describe('16-bit arithmetic', () => {
  it('ADD HL,BC sets H from bit 11 and keeps Z', () => {
    const m = load([0x09]);
    m.cpu.registers.hl = 0x8a23;
    m.cpu.registers.bc = 0x0605;
    m.cpu.registers.f = 0x80;
    run(m);
    expect(m.cpu.registers.hl).toBe(0x9028);
    expect(m.cpu.registers.f).toBe(0xa0);
  });

  it('ADD HL,HL carries out of bit 15', () => {
    const m = load([0x29]);
    m.cpu.registers.hl = 0x8a23;
    run(m);
    expect(m.cpu.registers.hl).toBe(0x1446);
    expect(m.cpu.registers.f).toBe(0x30);
  });

  it('ADD HL,rr carries from the low byte into the high byte', () => {
    const m = load([0x19]);
    m.cpu.registers.hl = 0x0fff;
    m.cpu.registers.de = 0x0001;
    run(m);
    expect(m.cpu.registers.hl).toBe(0x1000);
    expect(m.cpu.registers.f).toBe(0x20);
  });

  it('ADD HL,SP wraps to zero without setting Z', () => {
    const m = load([0x39]);
    m.cpu.registers.hl = 0x0001;
    m.cpu.sp = 0xffff;
    run(m);
    expect(m.cpu.registers.hl).toBe(0x0000);
    expect(m.cpu.registers.f).toBe(0x30);
  });

  it('ADD SP,e8', () => {
    const up = load([0xe8, 0x02]);
    up.cpu.sp = 0xfff8;
    run(up);
    expect(up.cpu.sp).toBe(0xfffa);
    expect(up.cpu.registers.f).toBe(0x00);

    const down = load([0xe8, 0xff]);
    down.cpu.sp = 0x0000;
    down.cpu.registers.f = 0x80;
    run(down);
    expect(down.cpu.sp).toBe(0xffff);
    expect(down.cpu.registers.f).toBe(0x00);

    const half = load([0xe8, 0x01]);
    half.cpu.sp = 0x000f;
    run(half);
    expect(half.cpu.sp).toBe(0x0010);
    expect(half.cpu.registers.f).toBe(0x20);
  });

  it('INC rr and DEC rr wrap without touching flags', () => {
    const m = load([0x03, 0x1b, 0x33, 0x2b]);
    m.cpu.registers.bc = 0xffff;
    m.cpu.registers.de = 0x0000;
    m.cpu.registers.hl = 0x0000;
    m.cpu.sp = 0xffff;
    m.cpu.registers.f = 0x50;
    run(m, 4);
    expect(m.cpu.registers.bc).toBe(0x0000);
    expect(m.cpu.registers.de).toBe(0xffff);
    expect(m.cpu.sp).toBe(0x0000);
    expect(m.cpu.registers.hl).toBe(0xffff);
    expect(m.cpu.registers.f).toBe(0x50);
  });
});
