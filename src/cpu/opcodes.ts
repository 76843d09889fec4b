// Opcode tables derived from the declarative opcode lists (opcodes.json, cb_opcodes.json).
// The lists are validated once, when this module is first loaded; after that the CPU only
// performs fixed-cost array lookups and never looks at the source data again.
import baseRecords from './opcodes.json';
import cbRecords from './cb_opcodes.json';

export class OpcodeTableError extends Error {}

export type OpcodeTableKind = 'base' | 'cb';

export interface Opcode {
  readonly table: OpcodeTableKind;
  readonly opcode: number; // byte value, 0..255
  readonly id: string; // symbolic identifier, e.g. LD_BC_N16
  readonly mnemonic: readonly string[]; // first entry is the canonical display form
  readonly length: number; // instruction length in bytes (prefix included for CB)
  readonly cycles: readonly number[]; // T-cycles; [taken, not taken] for conditionals
}

export interface OpcodeTable {
  readonly kind: OpcodeTableKind;
  readonly entries: readonly Opcode[]; // indexed by byte value
  readonly byId: ReadonlyMap<string, Opcode>;
}

const OPCODE_COUNT = 256;
const ID_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isStringList(v: unknown): v is string[] {
  return Array.isArray(v) && v.length > 0 && v.every((s) => typeof s === 'string' && s.length > 0);
}

function isCycleList(v: unknown): v is number[] {
  return Array.isArray(v) && (v.length === 1 || v.length === 2)
    && v.every((c) => Number.isInteger(c) && c > 0 && c % 4 === 0);
}

function parseRecord(kind: OpcodeTableKind, raw: unknown, index: number): Opcode {
  const where = `[${kind}] entry #${index}`;
  if (!isObject(raw)) throw new OpcodeTableError(`${where}: not an object`);
  const { opcode, id, mnemonic, length, cycles } = raw;
  if (typeof opcode !== 'number' || !Number.isInteger(opcode) || opcode < 0 || opcode > 0xff) {
    throw new OpcodeTableError(`${where}: opcode must be a byte value, got ${String(opcode)}`);
  }
  if (typeof id !== 'string' || !ID_RE.test(id)) {
    throw new OpcodeTableError(`${where}: id must be an identifier, got ${String(id)}`);
  }
  if (!isStringList(mnemonic)) throw new OpcodeTableError(`${where} (${id}): mnemonic must be a non-empty list of strings`);
  if (typeof length !== 'number' || !Number.isInteger(length) || length < 1 || length > 3) {
    throw new OpcodeTableError(`${where} (${id}): length must be 1..3, got ${String(length)}`);
  }
  if (!isCycleList(cycles)) throw new OpcodeTableError(`${where} (${id}): cycles must be one or two multiples of 4`);
  return Object.freeze({
    table: kind,
    opcode,
    id,
    mnemonic: Object.freeze([...mnemonic]),
    length,
    cycles: Object.freeze([...cycles]),
  });
}

export function buildOpcodeTable(kind: OpcodeTableKind, records: unknown): OpcodeTable {
  if (!Array.isArray(records)) throw new OpcodeTableError(`[${kind}] opcode list must be an array`);
  const list: readonly unknown[] = records;
  if (list.length !== OPCODE_COUNT) {
    throw new OpcodeTableError(`[${kind}] must have exactly ${OPCODE_COUNT} opcodes, got ${list.length}`);
  }

  const slots = new Map<number, Opcode>();
  const byId = new Map<string, Opcode>();
  list.forEach((raw, index) => {
    const op = parseRecord(kind, raw, index);
    const prev = slots.get(op.opcode);
    if (prev) throw new OpcodeTableError(`[${kind}] opcode 0x${op.opcode.toString(16)} defined twice (${prev.id}, ${op.id})`);
    if (byId.has(op.id)) throw new OpcodeTableError(`[${kind}] id ${op.id} defined twice`);
    slots.set(op.opcode, op);
    byId.set(op.id, op);
  });

  // 256 entries with no duplicates cover every byte value
  const entries: Opcode[] = [];
  for (let b = 0; b < OPCODE_COUNT; b++) {
    const op = slots.get(b);
    if (!op) throw new OpcodeTableError(`[${kind}] opcode 0x${b.toString(16)} missing`);
    entries.push(op);
  }
  return { kind, entries: Object.freeze(entries), byId };
}

export const BASE_OPCODES: OpcodeTable = buildOpcodeTable('base', baseRecords);
export const CB_OPCODES: OpcodeTable = buildOpcodeTable('cb', cbRecords);

export function decodeOpcode(byte: number): Opcode {
  return BASE_OPCODES.entries[byte & 0xff];
}

export function decodeCbOpcode(byte: number): Opcode {
  return CB_OPCODES.entries[byte & 0xff];
}

export function opcodeName(op: Opcode): string {
  return op.mnemonic[0];
}

export const NOP: Opcode = decodeOpcode(0x00);
