import { createNoise2D, type NoiseFunction2D } from 'simplex-noise';
import type { BlockType } from './types';
import type { WorldConfig } from './config';
import type { WorldGrid } from '../game/WorldGrid';

const DEBUG_TERRAIN = false;

// Mulberry32 PRNG, only used to shuffle the noise permutation table
const createRandom = (seed: number): (() => number) => {
  let a = seed | 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export class TerrainGenerator {
  private readonly noise2D: NoiseFunction2D;
  private readonly config: Readonly<WorldConfig>;
  public readonly seed: number;

  constructor(config: Readonly<WorldConfig>) {
    this.config = config;
    this.seed = typeof config.seed === 'string' ? this.hashSeed(config.seed) >>> 0 : config.seed;
    this.noise2D = createNoise2D(createRandom(this.seed));

    if (DEBUG_TERRAIN) {
      console.log(`[TERRAIN] Terrain generator created with seed ${this.seed}`);
    }
  }

  // Convert string seed to a 32bit integer, callers wrap it unsigned
  private hashSeed(seed: string): number {
    let hash = 0;
    for (let i = 0; i < seed.length; i++) {
      const char = seed.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash;
    }
    return hash;
  }

  // Surface height of the column at x, z
  public getHeight(x: number, z: number): number {
    const { noiseFrequency, noiseAmplitude, heightOffset, chunkHeight } = this.config;
    const noise = this.noise2D(x * noiseFrequency, z * noiseFrequency);
    const height = Math.round(((noise + 1) / 2) * noiseAmplitude) + heightOffset;
    return Math.min(height, chunkHeight - 1);
  }

  public getBlockType(x: number, y: number, z: number): BlockType {
    return this.blockTypeForHeight(y, this.getHeight(x, z));
  }

  private blockTypeForHeight(y: number, height: number): BlockType {
    // Open air above the surface
    if (y < 0 || y > height) {
      return 'empty';
    }
    if (y === height) {
      return 'grass';
    }
    if (y >= height - this.config.dirtDepth) {
      return 'dirt';
    }
    return 'stone';
  }

  /**
   * Fill every column of a chunk into the grid.
   * Returns the number of blocks written.
   */
  public generateChunk(chunkX: number, chunkZ: number, grid: WorldGrid): number {
    if (!Number.isInteger(chunkX) || !Number.isInteger(chunkZ)) {
      throw new Error(`[TERRAIN] Chunk coordinates must be integers, got ${chunkX},${chunkZ}`);
    }

    const { chunkSize } = this.config;
    const startX = chunkX * chunkSize;
    const startZ = chunkZ * chunkSize;
    let written = 0;

    for (let x = 0; x < chunkSize; x++) {
      for (let z = 0; z < chunkSize; z++) {
        const worldX = startX + x;
        const worldZ = startZ + z;
        const height = this.getHeight(worldX, worldZ);

        for (let y = 0; y <= height; y++) {
          grid.set({ x: worldX, y, z: worldZ }, this.blockTypeForHeight(y, height));
          written++;
        }
      }
    }

    if (DEBUG_TERRAIN) {
      console.log(`[TERRAIN] Chunk ${chunkX},${chunkZ} generated with ${written} blocks`);
    }

    return written;
  }
}
