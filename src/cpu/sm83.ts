import type { IMemoryBus, HardwareRevision } from '../emulator/types';
import { Registers } from './registers';
import type { AddrSource, AddrStep, Cond, MCode, Operand8, Reg16Target } from './mcode';
import { NOP, decodeCbOpcode, decodeOpcode, opcodeName } from './opcodes';
import type { Opcode } from './opcodes';
import { CB_MCODES, mcodesFor } from './decode';
import { accumulator, alu8, bit8, modify8 } from './alu';
import { envFlag } from '../debug/env';
import type { TraceEvent } from '../debug/trace';
import { formatCpu } from '../debug/trace';
import { hex2, hex4, signed8, word } from '../util/bit';

export class IllegalInstructionError extends Error {
  constructor(public readonly opcode: number, public readonly mnemonic: string) {
    super(`Illegal instruction encountered: 0x${hex2(opcode)} (${mnemonic})`);
  }
}

export class MCodeQueueUnderrunError extends Error {
  constructor() {
    super('Attempted to pop from an empty m-code queue');
  }
}

/**
 * The Sharp SM83 core.
 *
 * Every instruction is decoded into a list of m-codes, one per machine cycle, which are
 * queued and executed one at a time. The next opcode is fetched while the last m-code of
 * the current instruction runs, as on hardware.
 */
export class SM83 {
  readonly registers: Registers;
  pc = 0x0100;
  sp = 0xfffe;
  // Opcode of the instruction being executed
  ir: Opcode = NOP;
  ime = false;
  // EI takes effect after the following instruction
  imePending = false;
  // Internal temporaries
  z = 0;
  w = 0;
  mCycles = 0;
  onTrace?: (ev: TraceEvent) => void;

  private readonly mcodeQueue: MCode[] = [];
  // Carry between the two halves of ADD HL,rr
  private carryLatch = false;
  private readonly debugEnabled = envFlag('SM83_DEBUG');

  constructor(registers: Registers = new Registers()) {
    this.registers = registers;
  }

  static forRevision(revision: HardwareRevision): SM83 {
    return new SM83(Registers.initial(revision));
  }

  get queueLength(): number { return this.mcodeQueue.length; }
  get pendingMCodes(): readonly MCode[] { return this.mcodeQueue; }

  get wz(): number { return word(this.w, this.z); }
  set wz(v: number) {
    this.z = v & 0xff;
    this.w = (v >>> 8) & 0xff;
  }

  // Advance exactly one machine cycle. The fetch overlaps the last m-code of the current instruction.
  execMCycle(bus: IMemoryBus): void {
    if (this.mcodeQueue.length <= 1) this.fetch(bus);
    this.step(bus);
  }

  // Read the opcode at PC, queue its m-codes and advance PC
  fetch(bus: IMemoryBus): void {
    const pc = this.pc;
    const byte = bus.read8(pc);
    this.ir = decodeOpcode(byte);
    this.mcodeQueue.push(...mcodesFor(this.ir));
    this.pc = (pc + 1) & 0xffff;
    if (this.imePending) {
      this.imePending = false;
      this.ime = true;
    }
    if (this.onTrace) this.onTrace({ pc, opcode: byte, text: opcodeName(this.ir), mCycles: this.mCycles });
    if (this.debugEnabled) {
      // eslint-disable-next-line no-console
      console.log(`[SM83] fetch PC=${hex4(pc)} OP=${hex2(byte)} ${opcodeName(this.ir)}`);
    }
  }

  // Run the current instruction to completion without overlapping the next fetch
  execInstruction(bus: IMemoryBus): void {
    if (this.mcodeQueue.length === 0) this.fetch(bus);
    while (this.mcodeQueue.length > 0) this.step(bus);
  }

  toString(): string { return formatCpu(this); }

  private step(bus: IMemoryBus): void {
    const m = this.mcodeQueue.shift();
    if (!m) throw new MCodeQueueUnderrunError();
    this.exec(m, bus);
    this.mCycles++;
  }

  private get8(o: Operand8): number {
    if (o === 'z') return this.z;
    if (o === 'w') return this.w;
    return this.registers.get8(o);
  }

  private set8(o: Operand8, v: number): void {
    if (o === 'z') this.z = v & 0xff;
    else if (o === 'w') this.w = v & 0xff;
    else this.registers.set8(o, v);
  }

  private get16(r: Reg16Target): number {
    return r === 'sp' ? this.sp : this.registers.get16(r);
  }

  private set16(r: Reg16Target, v: number): void {
    if (r === 'sp') this.sp = v & 0xffff;
    else this.registers.set16(r, v);
  }

  private address(src: AddrSource): number {
    switch (src) {
      case 'wz': return this.wz;
      case 'hz': return 0xff00 | this.z;
      case 'hc': return 0xff00 | this.registers.c;
      default: return this.get16(src);
    }
  }

  // Post-access adjustment for HL+/HL-, the stack pointer and WZ
  private stepAddress(src: AddrSource, step: AddrStep | undefined): void {
    if (step === undefined) return;
    if (src === 'wz') this.wz = (this.wz + step) & 0xffff;
    else if (src === 'hl' || src === 'sp' || src === 'bc' || src === 'de') this.set16(src, this.get16(src) + step);
  }

  private condition(cond: Cond): boolean {
    const r = this.registers;
    switch (cond) {
      case 'nz': return !r.zFlag;
      case 'z': return r.zFlag;
      case 'nc': return !r.cFlag;
      case 'c': return r.cFlag;
    }
  }

  private readImm(bus: IMemoryBus): number {
    const v = bus.read8(this.pc);
    this.pc = (this.pc + 1) & 0xffff;
    return v;
  }

  private exec(m: MCode, bus: IMemoryBus): void {
    const r = this.registers;
    switch (m.kind) {
      case 'nop':
        return;
      case 'illegal':
        throw new IllegalInstructionError(m.opcode, opcodeName(decodeOpcode(m.opcode)));
      case 'readImm':
        this.set8(m.dst, this.readImm(bus));
        if (m.branch && this.condition(m.branch.cond)) this.mcodeQueue.unshift(...m.branch.taken);
        return;
      case 'read':
        this.set8(m.dst, bus.read8(this.address(m.addr)));
        this.stepAddress(m.addr, m.step);
        return;
      case 'write': {
        let v: number;
        if (m.src === 'spl') v = this.sp & 0xff;
        else if (m.src === 'sph') v = (this.sp >>> 8) & 0xff;
        else v = this.get8(m.src);
        if (m.modify) v = modify8(r, m.modify, v);
        bus.write8(this.address(m.addr), v);
        this.stepAddress(m.addr, m.step);
        return;
      }
      case 'ld':
        this.set8(m.dst, this.get8(m.src));
        return;
      case 'ld16':
        this.set16(m.dst, m.src === 'wz' ? this.wz : r.hl);
        return;
      case 'step16':
        this.set16(m.target, this.get16(m.target) + m.delta);
        return;
      case 'alu':
        alu8(r, m.op, this.get8(m.src));
        return;
      case 'modify':
        this.set8(m.target, modify8(r, m.modify, this.get8(m.target)));
        return;
      case 'bit':
        bit8(r, m.bit, this.get8(m.src));
        return;
      case 'accumulator':
        accumulator(r, m.op);
        return;
      case 'addHl': {
        const v = this.get16(m.src);
        if (m.half === 'low') {
          const sum = r.l + (v & 0xff);
          r.l = sum;
          this.carryLatch = sum > 0xff;
        } else {
          const hi = (v >>> 8) & 0xff;
          const c = this.carryLatch ? 1 : 0;
          const sum = r.h + hi + c;
          r.hFlag = (r.h & 0xf) + (hi & 0xf) + c > 0xf;
          r.h = sum;
          r.nFlag = false;
          r.cFlag = sum > 0xff;
        }
        return;
      }
      case 'addSpRel': {
        const e = this.z;
        r.setFlags(false, false, (this.sp & 0xf) + (e & 0xf) > 0xf, (this.sp & 0xff) + e > 0xff);
        this.wz = (this.sp + signed8(e)) & 0xffff;
        return;
      }
      case 'jrAdd':
        this.pc = (this.pc + signed8(this.z)) & 0xffff;
        return;
      case 'jump':
        this.pc = m.target === 'wz' ? this.wz : m.target & 0xffff;
        if (m.enableIme) {
          this.ime = true;
          this.imePending = false;
        }
        return;
      case 'jumpHl':
        this.pc = r.hl;
        // A fetch in this same cycle read from the old PC; redo it from HL
        if (this.mcodeQueue.length > 0) {
          this.mcodeQueue.length = 0;
          this.fetch(bus);
        }
        return;
      case 'pushPcHigh':
        bus.write8(this.sp, (this.pc >>> 8) & 0xff);
        this.sp = (this.sp - 1) & 0xffff;
        return;
      case 'pushPcLow':
        bus.write8(this.sp, this.pc & 0xff);
        this.pc = m.target === 'wz' ? this.wz : m.target & 0xffff;
        return;
      case 'checkCond':
        if (this.condition(m.branch.cond)) this.mcodeQueue.unshift(...m.branch.taken);
        return;
      case 'prefixCb': {
        const op = this.readImm(bus);
        this.ir = decodeCbOpcode(op);
        // The extended m-codes take over the overlap slot queued behind the prefix
        this.mcodeQueue.splice(0, 1, ...CB_MCODES[op]);
        return;
      }
      case 'ime':
        if (m.enable) {
          this.imePending = true;
        } else {
          this.ime = false;
          this.imePending = false;
        }
        return;
    }
  }
}
