import { Color } from 'three';
import type { BlockType, SolidBlockType } from './types';

// Flat block colors used by whatever draws the world
const BLOCK_COLORS: Record<SolidBlockType, Color> = {
  grass: new Color(0.36, 0.73, 0.28),
  dirt: new Color(0.55, 0.27, 0.07),
  stone: new Color(0.5, 0.5, 0.5),
  wood: new Color(0.63, 0.32, 0.18),
  sand: new Color(0.96, 0.64, 0.38),
};

const BLOCK_NAMES: Record<BlockType, string> = {
  empty: 'Empty',
  grass: 'Grass',
  dirt: 'Dirt',
  stone: 'Stone',
  wood: 'Wood',
  sand: 'Sand',
};

// Hotbar order, number keys 1-5
export const PLACEABLE_BLOCKS: readonly SolidBlockType[] = [
  'grass',
  'dirt',
  'stone',
  'wood',
  'sand',
];

export const isSolidBlock = (type: BlockType): type is SolidBlockType => type !== 'empty';

/**
 * Get the display color for a block type. Empty has no color.
 * The returned color is a fresh copy, callers may mutate it.
 */
export const getBlockColor = (type: BlockType): Color | null => {
  if (!isSolidBlock(type)) {
    return null;
  }
  return BLOCK_COLORS[type].clone();
};

export const getBlockName = (type: BlockType): string => BLOCK_NAMES[type];
