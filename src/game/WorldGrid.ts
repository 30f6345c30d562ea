import type { Block, BlockPosition, BlockType } from '../utils/types';
import { isSolidBlock } from '../utils/blocks';

// Helper to create a unique block key
export const makeBlockKey = (x: number, y: number, z: number) => `${x},${y},${z}`;

const DEBUG_BLOCK_CHANGES = false;

/**
 * Sparse block storage. Only solid blocks are stored, anything missing reads as empty.
 */
export class WorldGrid {
  private readonly storage: Map<string, Block> = new Map();
  private changeVersion = 0;

  // Bumped on every call to set() that actually changed something
  public get version(): number {
    return this.changeVersion;
  }

  public get size(): number {
    return this.storage.size;
  }

  public get(position: BlockPosition): BlockType {
    const block = this.storage.get(makeBlockKey(position.x, position.y, position.z));
    return block ? block.type : 'empty';
  }

  public has(position: BlockPosition): boolean {
    return this.storage.has(makeBlockKey(position.x, position.y, position.z));
  }

  public set(position: BlockPosition, type: BlockType): void {
    const { x, y, z } = position;
    if (!Number.isInteger(x) || !Number.isInteger(y) || !Number.isInteger(z)) {
      throw new Error(`[WORLD] Block positions must be integers, got ${x},${y},${z}`);
    }

    const blockKey = makeBlockKey(x, y, z);
    const existing = this.storage.get(blockKey);

    if (!isSolidBlock(type)) {
      if (existing) {
        this.storage.delete(blockKey);
        this.changeVersion++;

        if (DEBUG_BLOCK_CHANGES) {
          console.log(`[WORLD] Block removed at ${blockKey}`);
        }
      }
      return;
    }

    if (existing?.type === type) {
      return;
    }

    this.storage.set(blockKey, { x, y, z, type });
    this.changeVersion++;

    if (DEBUG_BLOCK_CHANGES) {
      console.log(`[WORLD] ${type} block set at ${blockKey}`);
    }
  }

  // Copies, so callers can't sneak an empty type into storage
  public *blocks(): Generator<Block> {
    for (const block of this.storage.values()) {
      yield { ...block };
    }
  }
}
