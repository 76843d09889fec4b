export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface IMemoryBus {
  read8(addr: Word): Byte;
  read16(addr: Word): Word;
  write8(addr: Word, value: Byte): void;
  write16(addr: Word, value: Word): void;
}

// Hardware revisions that ship with a distinct post-boot register pattern
export type HardwareRevision = 'dmg' | 'mgb' | 'sgb' | 'sgb2' | 'cgb' | 'agb' | 'ags';

export const HARDWARE_REVISIONS: readonly HardwareRevision[] = ['dmg', 'mgb', 'sgb', 'sgb2', 'cgb', 'agb', 'ags'];

export interface IEmulator {
  execInstruction(): void; // run the current instruction to completion (no fetch overlap)
  execMCycle(): void; // advance exactly one machine cycle
}
