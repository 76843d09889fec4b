// A cartridge plugged into the console. Only the ROM image is modeled; bank switching,
// cartridge RAM and other MMIO (RTC, camera, rumble) are left to a future mapper layer.
export class Cartridge {
  readonly rom: Uint8Array;

  constructor(rom: Uint8Array) {
    this.rom = rom;
  }

  get size(): number { return this.rom.length; }

  // Unpopulated addresses float high like an empty data bus
  read8(addr: number): number {
    const a = addr & 0xffff;
    return a < this.rom.length ? this.rom[a] : 0xff;
  }
}
