import { Vector3 } from 'three';
import type { BlockChange, BlockPosition, InteractionAction, SolidBlockType } from './types';
import type { WorldGrid } from '../game/WorldGrid';
import { isSolidBlock } from './blocks';
import { DEFAULT_WORLD_CONFIG } from './config';

// Constants for configuration
export const MAX_DISTANCE = DEFAULT_WORLD_CONFIG.maxInteractionDistance;
const UNIT_TOLERANCE = 1e-6;
const DEBUG_RAYCASTING = false; // Enable for detailed debugging output

export type RaycastResult =
  | { hasTarget: false }
  | {
      hasTarget: true;
      position: BlockPosition;
      type: SolidBlockType;
      distance: number;
      // Empty cell stepped through right before the target, null if the target was the first step
      placePosition: BlockPosition | null;
    };

// Nearest integer, halves away from zero, never -0
const roundCoordinate = (value: number): number => {
  const rounded = value < 0 ? -Math.round(-value) : Math.round(value);
  return rounded === 0 ? 0 : rounded;
};

const toBlockPosition = (point: Vector3): BlockPosition => ({
  x: roundCoordinate(point.x),
  y: roundCoordinate(point.y),
  z: roundCoordinate(point.z),
});

const validateRay = (origin: Vector3, direction: Vector3, maxDistance: number) => {
  const components = [origin.x, origin.y, origin.z, direction.x, direction.y, direction.z];
  if (!components.every(Number.isFinite)) {
    throw new Error(`[RAYCAST] Ray must be finite, got origin ${origin.toArray()} direction ${direction.toArray()}`);
  }
  if (Math.abs(direction.length() - 1) > UNIT_TOLERANCE) {
    throw new Error(`[RAYCAST] Ray direction must be a unit vector, length was ${direction.length()}`);
  }
  if (!Number.isInteger(maxDistance) || maxDistance < 1) {
    throw new Error(`[RAYCAST] Max distance must be a positive integer, got ${maxDistance}`);
  }
};

/**
 * Block positions sampled by the ray at whole-unit distances 1..maxDistance.
 * Shallow rays can hit the same cell twice or skip one.
 */
export function getRayCandidates(origin: Vector3, direction: Vector3, maxDistance: number = MAX_DISTANCE): BlockPosition[] {
  validateRay(origin, direction, maxDistance);

  const candidates: BlockPosition[] = [];
  const point = new Vector3();

  for (let distance = 1; distance <= maxDistance; distance++) {
    point.copy(direction).multiplyScalar(distance).add(origin);
    candidates.push(toBlockPosition(point));
  }

  return candidates;
}

/**
 * March the ray and stop at the first solid block.
 */
export function raycastBlocks(
  grid: WorldGrid,
  origin: Vector3,
  direction: Vector3,
  maxDistance: number = MAX_DISTANCE
): RaycastResult {
  const candidates = getRayCandidates(origin, direction, maxDistance);

  for (let i = 0; i < candidates.length; i++) {
    const position = candidates[i];
    const type = grid.get(position);

    if (!isSolidBlock(type)) continue;

    if (DEBUG_RAYCASTING) {
      console.log(`[RAYCAST] Target found: ${type} at ${position.x},${position.y},${position.z}, step ${i + 1}`);
    }

    return {
      hasTarget: true,
      position,
      type,
      distance: i + 1,
      placePosition: i > 0 ? candidates[i - 1] : null,
    };
  }

  if (DEBUG_RAYCASTING) {
    console.log(`[RAYCAST] No block within ${maxDistance} steps`);
  }

  return { hasTarget: false };
}

/**
 * Break the nearest block along the ray, or place `selectedType` in the
 * empty cell right before it. Returns the change that was applied, or null
 * when the ray found nothing to act on.
 */
export function resolveInteraction(
  grid: WorldGrid,
  origin: Vector3,
  direction: Vector3,
  action: InteractionAction,
  selectedType: SolidBlockType,
  maxDistance: number = MAX_DISTANCE
): BlockChange | null {
  const hit = raycastBlocks(grid, origin, direction, maxDistance);

  if (!hit.hasTarget) {
    return null;
  }

  if (action === 'break') {
    grid.set(hit.position, 'empty');

    if (DEBUG_RAYCASTING) {
      console.log(`[RAYCAST] Breaking block: ${hit.type} at ${hit.position.x},${hit.position.y},${hit.position.z}`);
    }

    return { ...hit.position, type: hit.type, action };
  }

  // Placing needs at least one empty step before the backstop
  if (!hit.placePosition) {
    if (DEBUG_RAYCASTING) {
      console.log("[RAYCAST] Can't place - target is right at the origin");
    }
    return null;
  }

  grid.set(hit.placePosition, selectedType);

  if (DEBUG_RAYCASTING) {
    const { x, y, z } = hit.placePosition;
    console.log(`[RAYCAST] Placing ${selectedType} at ${x},${y},${z} against ${hit.type}`);
  }

  return { ...hit.placePosition, type: selectedType, action };
}
