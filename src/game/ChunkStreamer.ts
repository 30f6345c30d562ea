import type { Vector3 } from 'three';
import type { ChunkCoordinate } from '../utils/types';
import type { WorldConfig } from '../utils/config';
import type { TerrainGenerator } from '../utils/noise';
import type { WorldGrid } from './WorldGrid';

const DEBUG_CHUNK_MANAGEMENT = false;

export const getChunkKey = (x: number, z: number) => `${x},${z}`;

// Chunk column containing a world position
export const worldToChunk = (worldX: number, worldZ: number, chunkSize: number): ChunkCoordinate => ({
  x: Math.floor(worldX / chunkSize),
  z: Math.floor(worldZ / chunkSize),
});

/**
 * Generates terrain for chunks as they come within range of the viewpoint.
 * Chunks are never unloaded, the loaded set only grows.
 */
export class ChunkStreamer {
  private readonly loadedChunks: Map<string, ChunkCoordinate> = new Map();
  private readonly generator: TerrainGenerator;
  private readonly grid: WorldGrid;
  private readonly config: Readonly<WorldConfig>;
  private lastViewpointChunk: ChunkCoordinate | null = null;
  private generatedBlocks = 0;

  constructor(generator: TerrainGenerator, grid: WorldGrid, config: Readonly<WorldConfig>) {
    this.generator = generator;
    this.grid = grid;
    this.config = config;
  }

  public get loadedCount(): number {
    return this.loadedChunks.size;
  }

  public get generatedBlockCount(): number {
    return this.generatedBlocks;
  }

  public isLoaded(chunk: ChunkCoordinate): boolean {
    return this.loadedChunks.has(getChunkKey(chunk.x, chunk.z));
  }

  public getLoadedChunks(): ChunkCoordinate[] {
    return Array.from(this.loadedChunks.values(), chunk => ({ ...chunk }));
  }

  /**
   * Generate every chunk within Chebyshev distance `radius` of `center` that
   * hasn't been generated yet. Returns the chunks generated by this call.
   */
  public ensureLoaded(center: ChunkCoordinate, radius: number = this.config.renderDistance): ChunkCoordinate[] {
    if (!Number.isInteger(radius) || radius < 0) {
      throw new Error(`[WORLD] Load radius must be a non-negative integer, got ${radius}`);
    }
    if (!Number.isInteger(center.x) || !Number.isInteger(center.z)) {
      throw new Error(`[WORLD] Chunk coordinates must be integers, got ${center.x},${center.z}`);
    }

    const newlyLoaded: ChunkCoordinate[] = [];

    for (let dx = -radius; dx <= radius; dx++) {
      for (let dz = -radius; dz <= radius; dz++) {
        const chunkX = center.x + dx;
        const chunkZ = center.z + dz;
        const chunkKey = getChunkKey(chunkX, chunkZ);

        if (this.loadedChunks.has(chunkKey)) continue;

        this.generatedBlocks += this.generator.generateChunk(chunkX, chunkZ, this.grid);
        this.loadedChunks.set(chunkKey, { x: chunkX, z: chunkZ });
        newlyLoaded.push({ x: chunkX, z: chunkZ });

        if (DEBUG_CHUNK_MANAGEMENT) {
          console.log(`[WORLD] Generated new chunk at ${chunkKey}`);
        }
      }
    }

    if (DEBUG_CHUNK_MANAGEMENT && newlyLoaded.length > 0) {
      console.log(`[WORLD] Loaded ${newlyLoaded.length} chunks around ${getChunkKey(center.x, center.z)}`);
    }

    return newlyLoaded;
  }

  /**
   * Load chunks around a world-space viewpoint. Does nothing until the
   * viewpoint moves into a different chunk.
   */
  public update(viewpoint: Vector3): ChunkCoordinate[] {
    const currentChunk = worldToChunk(viewpoint.x, viewpoint.z, this.config.chunkSize);

    if (
      this.lastViewpointChunk &&
      currentChunk.x === this.lastViewpointChunk.x &&
      currentChunk.z === this.lastViewpointChunk.z
    ) {
      return [];
    }

    if (DEBUG_CHUNK_MANAGEMENT) {
      console.log(`[WORLD] Viewpoint moved to chunk ${currentChunk.x},${currentChunk.z}`);
    }

    // Only remember the chunk once loading it went through
    const loaded = this.ensureLoaded(currentChunk);
    this.lastViewpointChunk = currentChunk;
    return loaded;
  }
}
