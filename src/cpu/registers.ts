import type { HardwareRevision } from '../emulator/types';

// Flag bits within F (and the low byte of AF)
export const enum Flag {
  C = 0x10,
  H = 0x20,
  N = 0x40,
  Z = 0x80,
}

// F only ever exposes its upper nibble
const F_MASK = 0xf0;

// Byte offsets into the 64-bit backing store, least significant byte first.
// Each 16-bit pair is the little-endian view over its low/high 8-bit fields.
const OFF_F = 0;
const OFF_A = 1;
const OFF_C = 2;
const OFF_B = 3;
const OFF_E = 4;
const OFF_D = 5;
const OFF_L = 6;
const OFF_H = 7;

export type Reg8 = 'a' | 'f' | 'b' | 'c' | 'd' | 'e' | 'h' | 'l';
export type Reg16 = 'af' | 'bc' | 'de' | 'hl';

const REG8_OFFSET: Record<Reg8, number> = {
  f: OFF_F, a: OFF_A, c: OFF_C, b: OFF_B, e: OFF_E, d: OFF_D, l: OFF_L, h: OFF_H,
};
const REG16_OFFSET: Record<Reg16, number> = { af: OFF_F, bc: OFF_C, de: OFF_E, hl: OFF_L };

/**
 * The general purpose 8 and 16 bit registers of the SM83, including the flags.
 *
 * All fields are views over one 64-bit value laid out as `0xHH_LL_DD_EE_BB_CC_AA_FF`,
 * so writing `b` is immediately visible through `bc` and the other way around.
 */
export class Registers {
  private readonly bytes = new Uint8Array(8);
  private readonly view = new DataView(this.bytes.buffer);

  constructor(raw: bigint = 0n) {
    this.raw = raw;
  }

  get raw(): bigint { return this.view.getBigUint64(0, true); }
  set raw(v: bigint) {
    this.view.setBigUint64(0, BigInt.asUintN(64, v), true);
    this.bytes[OFF_F] &= F_MASK;
  }

  get8(r: Reg8): number { return this.bytes[REG8_OFFSET[r]]; }
  set8(r: Reg8, v: number): void {
    this.bytes[REG8_OFFSET[r]] = r === 'f' ? v & F_MASK : v & 0xff;
  }

  get16(r: Reg16): number { return this.view.getUint16(REG16_OFFSET[r], true); }
  set16(r: Reg16, v: number): void {
    this.view.setUint16(REG16_OFFSET[r], r === 'af' ? v & 0xfff0 : v & 0xffff, true);
  }

  get a(): number { return this.bytes[OFF_A]; }
  set a(v: number) { this.bytes[OFF_A] = v & 0xff; }
  get f(): number { return this.bytes[OFF_F]; }
  set f(v: number) { this.bytes[OFF_F] = v & F_MASK; }
  get b(): number { return this.bytes[OFF_B]; }
  set b(v: number) { this.bytes[OFF_B] = v & 0xff; }
  get c(): number { return this.bytes[OFF_C]; }
  set c(v: number) { this.bytes[OFF_C] = v & 0xff; }
  get d(): number { return this.bytes[OFF_D]; }
  set d(v: number) { this.bytes[OFF_D] = v & 0xff; }
  get e(): number { return this.bytes[OFF_E]; }
  set e(v: number) { this.bytes[OFF_E] = v & 0xff; }
  get h(): number { return this.bytes[OFF_H]; }
  set h(v: number) { this.bytes[OFF_H] = v & 0xff; }
  get l(): number { return this.bytes[OFF_L]; }
  set l(v: number) { this.bytes[OFF_L] = v & 0xff; }

  get af(): number { return this.get16('af'); }
  set af(v: number) { this.set16('af', v); }
  get bc(): number { return this.get16('bc'); }
  set bc(v: number) { this.set16('bc', v); }
  get de(): number { return this.get16('de'); }
  set de(v: number) { this.set16('de', v); }
  get hl(): number { return this.get16('hl'); }
  set hl(v: number) { this.set16('hl', v); }

  // Set when a result is zero
  get zFlag(): boolean { return (this.bytes[OFF_F] & Flag.Z) !== 0; }
  set zFlag(on: boolean) { this.setFlag(Flag.Z, on); }
  // Set by subtractions, consumed by DAA
  get nFlag(): boolean { return (this.bytes[OFF_F] & Flag.N) !== 0; }
  set nFlag(on: boolean) { this.setFlag(Flag.N, on); }
  // Carry out of bit 3 (bit 11 for 16-bit adds)
  get hFlag(): boolean { return (this.bytes[OFF_F] & Flag.H) !== 0; }
  set hFlag(on: boolean) { this.setFlag(Flag.H, on); }
  get cFlag(): boolean { return (this.bytes[OFF_F] & Flag.C) !== 0; }
  set cFlag(on: boolean) { this.setFlag(Flag.C, on); }

  setFlags(z: boolean, n: boolean, h: boolean, c: boolean): void {
    this.bytes[OFF_F] = (z ? Flag.Z : 0) | (n ? Flag.N : 0) | (h ? Flag.H : 0) | (c ? Flag.C : 0);
  }

  clone(): Registers { return new Registers(this.raw); }

  equals(other: Registers): boolean { return this.raw === other.raw; }

  private setFlag(flag: Flag, on: boolean): void {
    if (on) this.bytes[OFF_F] |= flag;
    else this.bytes[OFF_F] &= ~flag & 0xff;
  }

  // Post-boot register patterns per revision, via the Cycle Accurate GB Docs.
  static initial(revision: HardwareRevision): Registers {
    switch (revision) {
      case 'dmg': return new Registers(0x01_4d_00_d8_00_13_01_b0n);
      case 'mgb': return new Registers(0x01_4d_00_d8_00_13_ff_b0n);
      // SGB values are documented but not verified on hardware
      case 'sgb': return new Registers(0xc0_60_00_00_00_14_01_00n);
      case 'sgb2': {
        // Only A is documented for SGB2; everything else follows SGB
        const regs = Registers.initial('sgb');
        regs.a = 0xff;
        return regs;
      }
      case 'cgb': return new Registers(0x00_7c_00_08_00_00_11_80n);
      case 'agb': return new Registers(0x00_7c_00_08_01_00_11_00n);
      case 'ags': return new Registers(0x00_7c_00_08_01_00_11_00n);
    }
  }
}
