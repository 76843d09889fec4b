import { SM83 } from '../cpu/sm83';
import { Registers } from '../cpu/registers';
import { Bus } from '../bus/bus';
import { Cartridge } from '../cart/cartridge';
import type { HardwareRevision, IEmulator } from './types';

export class Emulator implements IEmulator {
  cart: Cartridge | null = null;

  constructor(public readonly bus: Bus, public readonly cpu: SM83) {}

  // A console as it comes out of the boot ROM for the given revision
  static create(revision: HardwareRevision = 'dmg'): Emulator {
    return new Emulator(Bus.standard(), SM83.forRevision(revision));
  }

  // Zeroed registers over an all-RAM bus, for staging arbitrary states
  static withFlatBus(): Emulator {
    return new Emulator(Bus.flat(), new SM83(new Registers()));
  }

  load(rom: Uint8Array): void {
    const cart = new Cartridge(rom);
    this.cart = cart;
    this.bus.mapCartridge(cart);
  }

  execInstruction(): void {
    this.cpu.execInstruction(this.bus);
  }

  execMCycle(): void {
    this.cpu.execMCycle(this.bus);
  }
}
