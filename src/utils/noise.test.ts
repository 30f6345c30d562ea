import { describe, it, expect } from 'vitest';
import { TerrainGenerator } from './noise';
import { createWorldConfig } from './config';
import { WorldGrid } from '../game/WorldGrid';
import type { Block } from './types';

const sortBlocks = (blocks: Block[]) =>
  [...blocks].sort((a, b) => a.x - b.x || a.y - b.y || a.z - b.z);

describe('TerrainGenerator', () => {
  describe('flat terrain', () => {
    // Zero amplitude pins every column to the floor offset
    const config = createWorldConfig({ chunkSize: 4, noiseAmplitude: 0, heightOffset: 5, dirtDepth: 3 });

    it('puts every column at the floor offset', () => {
      const terrain = new TerrainGenerator(config);
      expect(terrain.getHeight(0, 0)).toBe(5);
      expect(terrain.getHeight(-37, 112)).toBe(5);
    });

    it('layers grass over dirt over stone', () => {
      const terrain = new TerrainGenerator(config);
      expect(terrain.getBlockType(1, 6, 1)).toBe('empty');
      expect(terrain.getBlockType(1, 5, 1)).toBe('grass');
      expect(terrain.getBlockType(1, 4, 1)).toBe('dirt');
      expect(terrain.getBlockType(1, 2, 1)).toBe('dirt');
      expect(terrain.getBlockType(1, 1, 1)).toBe('stone');
      expect(terrain.getBlockType(1, 0, 1)).toBe('stone');
      expect(terrain.getBlockType(1, -1, 1)).toBe('empty');
    });

    it('fills the whole chunk footprint', () => {
      const terrain = new TerrainGenerator(config);
      const grid = new WorldGrid();

      const written = terrain.generateChunk(-1, 2, grid);

      // 4x4 columns, y = 0..5
      expect(written).toBe(96);
      expect(grid.size).toBe(96);
      expect(grid.get({ x: -4, y: 5, z: 8 })).toBe('grass');
      expect(grid.get({ x: -1, y: 0, z: 11 })).toBe('stone');
      expect(grid.get({ x: 0, y: 5, z: 8 })).toBe('empty');
      expect(grid.get({ x: -4, y: 5, z: 12 })).toBe('empty');
    });
  });

  it('keeps default heights between the floor offset and offset + amplitude', () => {
    const terrain = new TerrainGenerator(createWorldConfig());

    for (let x = -40; x < 40; x += 3) {
      for (let z = -40; z < 40; z += 3) {
        const height = terrain.getHeight(x, z);
        expect(Number.isInteger(height)).toBe(true);
        expect(height).toBeGreaterThanOrEqual(5);
        expect(height).toBeLessThanOrEqual(20);
      }
    }
  });

  it('never builds past the height cap', () => {
    const terrain = new TerrainGenerator(createWorldConfig({ chunkHeight: 8 }));

    for (let x = 0; x < 32; x++) {
      expect(terrain.getHeight(x, x * 2)).toBeLessThanOrEqual(7);
    }
  });

  it('fills each column solid up to its height and leaves the air above empty', () => {
    const config = createWorldConfig({ chunkSize: 8 });
    const terrain = new TerrainGenerator(config);
    const grid = new WorldGrid();
    terrain.generateChunk(0, 0, grid);

    for (let x = 0; x < 8; x++) {
      for (let z = 0; z < 8; z++) {
        const height = terrain.getHeight(x, z);
        for (let y = 0; y <= height; y++) {
          expect(grid.get({ x, y, z })).not.toBe('empty');
        }
        for (let y = height + 1; y < config.chunkHeight; y++) {
          expect(grid.get({ x, y, z })).toBe('empty');
        }
        expect(grid.get({ x, y: height, z })).toBe('grass');
      }
    }
  });

  it('generates identical chunks for the same seed', () => {
    const config = createWorldConfig({ chunkSize: 6, seed: 'test-seed' });
    const first = new WorldGrid();
    const second = new WorldGrid();

    new TerrainGenerator(config).generateChunk(1, -2, first);

    // Unrelated work first must not change the result
    const other = new TerrainGenerator(config);
    other.generateChunk(5, 5, new WorldGrid());
    other.generateChunk(1, -2, second);

    expect(sortBlocks(Array.from(second.blocks()))).toEqual(sortBlocks(Array.from(first.blocks())));
  });

  it('regenerating a chunk into the same grid changes nothing', () => {
    const terrain = new TerrainGenerator(createWorldConfig({ chunkSize: 4 }));
    const grid = new WorldGrid();
    terrain.generateChunk(0, 0, grid);
    const version = grid.version;
    const size = grid.size;

    terrain.generateChunk(0, 0, grid);

    expect(grid.version).toBe(version);
    expect(grid.size).toBe(size);
  });

  it('hashes string seeds to a 32bit integer', () => {
    // 'a' -> 97, 'b' -> 97 * 31 + 98, 'c' -> 3105 * 31 + 99
    expect(new TerrainGenerator(createWorldConfig({ seed: 'abc' })).seed).toBe(96354);
    expect(new TerrainGenerator(createWorldConfig({ seed: 7 })).seed).toBe(7);
  });

  it('wraps negative string hashes to an unsigned seed', () => {
    // 'test-seed' overflows the hash to -1226328372
    expect(new TerrainGenerator(createWorldConfig({ seed: 'test-seed' })).seed).toBe(3068638924);
    expect(new TerrainGenerator(createWorldConfig({ seed: 0xffffffff })).seed).toBe(4294967295);
  });

  it('rejects fractional chunk coordinates', () => {
    const terrain = new TerrainGenerator(createWorldConfig());
    expect(() => terrain.generateChunk(0.5, 0, new WorldGrid())).toThrow('[TERRAIN] Chunk coordinates must be integers');
  });
});
