import { Vector3 } from 'three';
import { Game } from './index';

const game = new Game();
game.initialize();

// Hover a few blocks above the surface of the origin column and look straight down
const surface = game.terrain.getHeight(8, 8);
const eye = new Vector3(8, surface + 5, 8);
const down = new Vector3(0, -1, 0);

game.updateViewpoint(eye);

const broken = game.interact(eye, down, 'break');
console.log('[WORLD] Break:', broken ?? 'nothing in reach');

game.handleKey('4');
const placed = game.interact(eye, down, 'place');
console.log('[WORLD] Place:', placed ?? 'nothing in reach');

const visible = Array.from(game.getVisibleBlocks(eye)).length;

const stats = game.getStats();
console.log(
  `[WORLD] Stats: ${stats.loadedChunks} chunks loaded, ${stats.storedBlocks} blocks stored, ` +
  `${visible} visible, ${stats.blockChanges} block changes`
);
