import type { SolidBlockType } from '../utils/types';
import { PLACEABLE_BLOCKS, getBlockName } from '../utils/blocks';

/**
 * The block type the player places next. Number keys 1-5 pick a slot.
 */
export class Hotbar {
  private readonly slots: readonly SolidBlockType[];
  private selectedSlot: number;

  constructor(slots: readonly SolidBlockType[] = PLACEABLE_BLOCKS, initialBlock: SolidBlockType = 'grass') {
    if (slots.length === 0) {
      throw new Error('[HOTBAR] Hotbar needs at least one slot');
    }
    this.slots = [...slots];
    this.selectedSlot = Math.max(0, slots.indexOf(initialBlock));
  }

  public get selectedBlock(): SolidBlockType {
    return this.slots[this.selectedSlot];
  }

  public get selectedIndex(): number {
    return this.selectedSlot;
  }

  public selectSlot(slot: number): boolean {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.slots.length) {
      return false;
    }
    this.selectedSlot = slot;
    console.log(`[HOTBAR] Selected: ${getBlockName(this.selectedBlock)}`);
    return true;
  }

  public selectBlock(blockType: SolidBlockType): boolean {
    return this.selectSlot(this.slots.indexOf(blockType));
  }

  // Number keys 1-9, anything past the last slot is ignored
  public handleKey(key: string): boolean {
    if (key.length !== 1 || key < '1' || key > '9') {
      return false;
    }
    return this.selectSlot(parseInt(key) - 1);
  }
}
