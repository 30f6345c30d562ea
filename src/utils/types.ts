export type BlockType =
  | 'empty'
  | 'grass'
  | 'dirt'
  | 'stone'
  | 'wood'
  | 'sand';

// Anything that can actually be stored in the world
export type SolidBlockType = Exclude<BlockType, 'empty'>;

export interface BlockPosition {
  x: number;
  y: number;
  z: number;
}

export interface Block extends BlockPosition {
  type: SolidBlockType;
}

export interface ChunkCoordinate {
  x: number;
  z: number;
}

export type InteractionAction = 'break' | 'place';

export interface BlockChange extends Block {
  action: InteractionAction;
}

export interface WorldStats {
  loadedChunks: number;
  storedBlocks: number;
  generatedBlocks: number;
  blockChanges: number;
  version: number;
}
