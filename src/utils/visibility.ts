import type { Vector3 } from 'three';
import type { Block, BlockPosition } from './types';
import type { WorldGrid } from '../game/WorldGrid';

// The six axis-aligned neighbors of a block
export const NEIGHBOR_OFFSETS: readonly (readonly [number, number, number])[] = [
  [1, 0, 0],
  [-1, 0, 0],
  [0, 1, 0],
  [0, -1, 0],
  [0, 0, 1],
  [0, 0, -1],
];

export function isExposed(grid: WorldGrid, position: BlockPosition): boolean {
  return NEIGHBOR_OFFSETS.some(([dx, dy, dz]) =>
    grid.get({ x: position.x + dx, y: position.y + dy, z: position.z + dz }) === 'empty'
  );
}

/**
 * Lazily yield every stored block with at least one empty neighbor.
 * Order is whatever the grid iterates in. Don't mutate the grid mid-iteration.
 */
export function* exposedBlocks(grid: WorldGrid): Generator<Block> {
  for (const block of grid.blocks()) {
    if (isExposed(grid, block)) {
      yield block;
    }
  }
}

/**
 * Exposed blocks within `maxDistance` of the viewpoint.
 */
export function* exposedBlocksNear(grid: WorldGrid, viewpoint: Vector3, maxDistance: number): Generator<Block> {
  const maxDistanceSq = maxDistance * maxDistance;

  for (const block of exposedBlocks(grid)) {
    const dx = block.x - viewpoint.x;
    const dy = block.y - viewpoint.y;
    const dz = block.z - viewpoint.z;
    if (dx * dx + dy * dy + dz * dz <= maxDistanceSq) {
      yield block;
    }
  }
}
