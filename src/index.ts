export type {
  Block,
  BlockChange,
  BlockPosition,
  BlockType,
  ChunkCoordinate,
  InteractionAction,
  SolidBlockType,
  WorldStats,
} from './utils/types';
export { PLACEABLE_BLOCKS, getBlockColor, getBlockName, isSolidBlock } from './utils/blocks';
export { DEFAULT_WORLD_CONFIG, createWorldConfig, type WorldConfig } from './utils/config';
export { TerrainGenerator } from './utils/noise';
export { NEIGHBOR_OFFSETS, exposedBlocks, exposedBlocksNear, isExposed } from './utils/visibility';
export {
  MAX_DISTANCE,
  getRayCandidates,
  raycastBlocks,
  resolveInteraction,
  type RaycastResult,
} from './utils/raycaster';
export { WorldGrid, makeBlockKey } from './game/WorldGrid';
export { ChunkStreamer, getChunkKey, worldToChunk } from './game/ChunkStreamer';
export { Hotbar } from './game/Hotbar';
export { Game } from './game/Game';
