import type { IMemoryBus, Byte, Word } from '../emulator/types';
import { Cartridge } from '../cart/cartridge';

export const ADDRESS_SPACE = 0x10000;
export const PAGE_SIZE = 0x100;
export const PAGE_COUNT = ADDRESS_SPACE / PAGE_SIZE;

// Cartridge ROM occupies $0000-$7FFF in the standard memory map
const ROM_PAGES = 0x80;

// A 256-byte chunk of address space indexed by the low byte of an address.
// Can be wired to RAM, cartridge ROM, or (later) memory-mapped hardware.
export type Page =
  | { kind: 'ram'; data: Uint8Array }
  | { kind: 'rom'; cart: Cartridge; base: Word };

export type PageKind = Page['kind'];

function ramPage(): Page {
  // Unprogrammed memory reads back as 0xFF
  return { kind: 'ram', data: new Uint8Array(PAGE_SIZE).fill(0xff) };
}

function readPage(page: Page, index: number): Byte {
  switch (page.kind) {
    case 'ram': return page.data[index];
    case 'rom': return page.cart.read8(page.base | index);
  }
}

function writePage(page: Page, index: number, value: Byte): void {
  switch (page.kind) {
    case 'ram':
      page.data[index] = value & 0xff;
      return;
    case 'rom':
      // No mapper: writes into ROM space go nowhere
      return;
  }
}

// The main bus of the system, divided into pages per the memory map.
// Addresses are 16 bits wide and values are 8 bits wide; every address resolves to a page.
export class Bus implements IMemoryBus {
  private readonly pages: Page[];

  private constructor(pages: Page[]) {
    this.pages = pages;
  }

  // Standard memory map. Only RAM is wired so far; ROM arrives through mapCartridge.
  static standard(): Bus {
    return new Bus(Array.from({ length: PAGE_COUNT }, ramPage));
  }

  // Nothing but RAM, for staging arbitrary states in single-step conformance tests.
  static flat(): Bus {
    return new Bus(Array.from({ length: PAGE_COUNT }, ramPage));
  }

  // Expose the cartridge ROM at $0000-$7FFF. The cartridge is shared, not copied.
  mapCartridge(cart: Cartridge): void {
    for (let p = 0; p < ROM_PAGES; p++) {
      this.pages[p] = { kind: 'rom', cart, base: p << 8 };
    }
  }

  pageKind(page: number): PageKind {
    return this.pages[page & 0xff].kind;
  }

  read8(addr: Word): Byte {
    const a = addr & 0xffff;
    return readPage(this.pages[a >>> 8], a & 0xff);
  }

  // Little-endian; the high byte comes from addr+1 with 16-bit wraparound ($FFFF -> $0000)
  read16(addr: Word): Word {
    const lo = this.read8(addr);
    const hi = this.read8((addr + 1) & 0xffff);
    return (hi << 8) | lo;
  }

  write8(addr: Word, value: Byte): void {
    const a = addr & 0xffff;
    writePage(this.pages[a >>> 8], a & 0xff, value);
  }

  write16(addr: Word, value: Word): void {
    this.write8(addr, value & 0xff);
    this.write8((addr + 1) & 0xffff, (value >>> 8) & 0xff);
  }
}
