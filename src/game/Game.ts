import type { Vector3 } from 'three';
import type { Block, BlockChange, ChunkCoordinate, InteractionAction, SolidBlockType, WorldStats } from '../utils/types';
import { createWorldConfig, type WorldConfig } from '../utils/config';
import { TerrainGenerator } from '../utils/noise';
import { resolveInteraction } from '../utils/raycaster';
import { exposedBlocks, exposedBlocksNear } from '../utils/visibility';
import { WorldGrid } from './WorldGrid';
import { ChunkStreamer } from './ChunkStreamer';
import { Hotbar } from './Hotbar';

const DEBUG_BLOCK_CHANGES = false;

/**
 * One simulated world: the grid plus everything that reads or writes it.
 * Nothing here is global, so several games can live side by side.
 */
export class Game {
  public readonly config: Readonly<WorldConfig>;
  public readonly grid: WorldGrid;
  public readonly terrain: TerrainGenerator;
  public readonly chunks: ChunkStreamer;
  public readonly hotbar: Hotbar;
  private blockChanges = 0;

  constructor(overrides: Partial<WorldConfig> = {}) {
    this.config = createWorldConfig(overrides);
    this.grid = new WorldGrid();
    this.terrain = new TerrainGenerator(this.config);
    this.chunks = new ChunkStreamer(this.terrain, this.grid, this.config);
    this.hotbar = new Hotbar();
  }

  // Generate the area around the origin before the first frame
  public initialize(): ChunkCoordinate[] {
    console.log('[WORLD] Generating initial chunks...');
    const loaded = this.chunks.ensureLoaded({ x: 0, z: 0 });
    console.log(`[WORLD] Generated ${loaded.length} initial chunks`);
    return loaded;
  }

  public updateViewpoint(position: Vector3): ChunkCoordinate[] {
    return this.chunks.update(position);
  }

  public get selectedBlock(): SolidBlockType {
    return this.hotbar.selectedBlock;
  }

  public selectBlock(blockType: SolidBlockType): boolean {
    return this.hotbar.selectBlock(blockType);
  }

  public handleKey(key: string): boolean {
    return this.hotbar.handleKey(key);
  }

  public interact(origin: Vector3, direction: Vector3, action: InteractionAction): BlockChange | null {
    const change = resolveInteraction(
      this.grid,
      origin,
      direction,
      action,
      this.hotbar.selectedBlock,
      this.config.maxInteractionDistance
    );

    if (change) {
      this.blockChanges++;

      if (DEBUG_BLOCK_CHANGES) {
        console.log(`[WORLD] ${change.action} ${change.type} at ${change.x},${change.y},${change.z}`);
      }
    }

    return change;
  }

  public getExposedBlocks(): Generator<Block> {
    return exposedBlocks(this.grid);
  }

  // Exposed blocks the renderer should draw from this viewpoint
  public getVisibleBlocks(viewpoint: Vector3): Generator<Block> {
    return exposedBlocksNear(this.grid, viewpoint, this.config.renderDistance * this.config.chunkSize);
  }

  public getStats(): WorldStats {
    return {
      loadedChunks: this.chunks.loadedCount,
      storedBlocks: this.grid.size,
      generatedBlocks: this.chunks.generatedBlockCount,
      blockChanges: this.blockChanges,
      version: this.grid.version,
    };
  }
}
