/**
 * Default tunables for the simulation core.
 * Units: world units, seconds, radians.
 */

import type { SizeTierTable } from './core/types';

// World
export const WORLD_WIDTH = 160;
export const WORLD_HEIGHT = 144;
export const TWO_PI = Math.PI * 2;

// Kinetics
export const DEFAULT_DRAG = 0.01; // fraction of velocity lost per update call
export const VELOCITY_EPSILON = 0.01; // speeds below this snap to zero
export const DEFAULT_MASS = 1;

// Ship
export const SHIP_RADIUS = 3;
export const SHIP_THRUST_POWER = 60;
export const SHIP_MAX_VELOCITY = 80;
export const SHIP_DRAG = DEFAULT_DRAG;

// Projectiles
export const PROJECTILE_POOL_SIZE = 32;
export const FIRE_COOLDOWN = 0.25;
export const PROJECTILE_SPEED = 120;
export const PROJECTILE_LIFETIME = 1.5;
export const PROJECTILE_DAMAGE = 1;
export const PROJECTILE_RADIUS = 1;

// Asteroids
export const ASTEROID_MAX_VELOCITY = 200;
export const FRAGMENT_SPEED_MIN = 15;
export const FRAGMENT_SPEED_MAX = 40;
export const SCATTER_CONE = Math.PI / 3; // 60 degree spread around the impact angle
export const FRAGMENT_JITTER = 2;
export const INITIAL_SPEED_MIN = 15;
export const INITIAL_SPEED_MAX = 30;
export const SPAWN_MARGIN = 20; // distance from world edges for wave spawns
export const SAFE_ZONE_BUFFER = 10;
export const PLACEMENT_ATTEMPTS = 50;

export const DEFAULT_SIZE_TIERS: SizeTierTable = {
  3: { radius: 8, health: 3, points: 20, childCount: 2, childTier: 2 },
  2: { radius: 4, health: 2, points: 50, childCount: 2, childTier: 1 },
  1: { radius: 2, health: 1, points: 100, childCount: 0, childTier: 0 },
};

// Waves
export const WAVE_BASE_COUNT = 4;
export const WAVE_COUNT_STEP = 2;
export const WAVE_MAX_COUNT = 12;
export const WAVE_SPEED_STEP = 0.1;
export const SAFE_HAVEN_RADIUS = 40;
export const WAVE_TIER_POOLS: number[][] = [
  [3, 3, 2, 2, 1], // waves 1-2
  [3, 2, 2, 1, 1], // waves 3-4
  [2, 2, 1, 1, 1], // waves 5-6
  [2, 1, 1, 1, 1], // waves 7+
];

// Steering
export const SEEK_WEIGHT = 0.8;
export const AVOID_WEIGHT = 2.5;
export const DANGER_RADIUS = 25;
export const TURN_RATE = 6; // radians per second
export const ARRIVAL_TOLERANCE = 8;
export const MAX_STEER_FORCE = 80;
export const MANEUVER_COOLDOWN_TICKS = 15;
export const WAYPOINT_MARGIN = 20;
export const WAYPOINT_CANDIDATES = 10;
export const MIN_SURFACE_DISTANCE = 0.1;
