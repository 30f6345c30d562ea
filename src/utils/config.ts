export interface WorldConfig {
  chunkSize: number;
  chunkHeight: number;
  renderDistance: number;
  noiseFrequency: number;
  noiseAmplitude: number;
  heightOffset: number;
  dirtDepth: number;
  maxInteractionDistance: number;
  seed: number | string;
}

export const DEFAULT_WORLD_CONFIG: Readonly<WorldConfig> = {
  chunkSize: 16,
  chunkHeight: 64,
  renderDistance: 3, // Chunks in each direction
  noiseFrequency: 0.05,
  noiseAmplitude: 15,
  heightOffset: 5,
  dirtDepth: 3,
  maxInteractionDistance: 10, // Ray steps of one block each
  seed: 42,
};

const requireInteger = (name: keyof WorldConfig, value: number, min: number) => {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`[CONFIG] ${name} must be an integer >= ${min}, got ${value}`);
  }
};

const requireNonNegative = (name: keyof WorldConfig, value: number) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`[CONFIG] ${name} must be a finite number >= 0, got ${value}`);
  }
};

/**
 * Merge overrides onto the defaults and validate the result.
 * The result is frozen, every holder shares the same validated values.
 */
export function createWorldConfig(overrides: Partial<WorldConfig> = {}): Readonly<WorldConfig> {
  const config: WorldConfig = { ...DEFAULT_WORLD_CONFIG, ...overrides };

  requireInteger('chunkSize', config.chunkSize, 1);
  requireInteger('chunkHeight', config.chunkHeight, 1);
  requireInteger('renderDistance', config.renderDistance, 0);
  requireInteger('dirtDepth', config.dirtDepth, 0);
  requireInteger('maxInteractionDistance', config.maxInteractionDistance, 1);
  requireInteger('heightOffset', config.heightOffset, 0);
  requireNonNegative('noiseFrequency', config.noiseFrequency);
  requireNonNegative('noiseAmplitude', config.noiseAmplitude);

  if (config.heightOffset >= config.chunkHeight) {
    throw new Error(
      `[CONFIG] heightOffset (${config.heightOffset}) must be below chunkHeight (${config.chunkHeight})`
    );
  }

  // Numeric seeds feed a 32bit PRNG directly
  if (typeof config.seed === 'number' && (!Number.isInteger(config.seed) || config.seed < 0 || config.seed > 0xffffffff)) {
    throw new Error(`[CONFIG] seed must be an integer between 0 and ${0xffffffff}, got ${config.seed}`);
  }

  return Object.freeze(config);
}
