/**
 * Simulation configuration: shape, defaults and validation.
 *
 * Every system validates the section it consumes in its constructor. A bad
 * value is a setup error, so validation throws instead of returning a Result.
 */

import * as C from './constants';
import type { SizeTierTable } from './core/types';
import { createInvalidConfigurationError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('Config');

export interface WorldConfig {
  width: number;
  height: number;
  /** Seed for the shared random generator */
  seed: number;
}

export interface ShipConfig {
  radius: number;
  thrustPower: number;
  maxVelocity: number;
  drag: number;
  mass: number;
}

export interface ProjectileConfig {
  poolSize: number;
  /** Seconds between shots for one owner */
  cooldown: number;
  speed: number;
  /** Seconds a projectile stays active */
  lifetime: number;
  damage: number;
  radius: number;
}

export interface FractureConfig {
  tiers: SizeTierTable;
  fragmentSpeedRange: [number, number];
  /** Full width of the scatter cone around the impact angle, radians */
  scatterCone: number;
  /** Max per-axis offset of a fragment from its parent's centre */
  jitter: number;
  initialSpeedRange: [number, number];
  spawnMargin: number;
  safeZoneBuffer: number;
  placementAttempts: number;
  asteroidMaxVelocity: number;
}

export interface WaveConfig {
  baseCount: number;
  countStep: number;
  maxCount: number;
  speedStep: number;
  tierPools: number[][];
  safeHavenRadius: number;
  /** Start the next wave automatically once the field is cleared */
  autoAdvance: boolean;
}

export interface SteeringConfig {
  seekWeight: number;
  avoidWeight: number;
  dangerRadius: number;
  /** Radians per second */
  turnRate: number;
  arrivalTolerance: number;
  maxSteerForce: number;
  maneuverCooldownTicks: number;
  waypointMargin: number;
  waypointCandidates: number;
}

export interface SimulationConfig {
  world: WorldConfig;
  ship: ShipConfig;
  projectiles: ProjectileConfig;
  fracture: FractureConfig;
  waves: WaveConfig;
  steering: SteeringConfig;
}

export type SimulationConfigOverrides = {
  [K in keyof SimulationConfig]?: Partial<SimulationConfig[K]>;
};

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  width: C.WORLD_WIDTH,
  height: C.WORLD_HEIGHT,
  seed: 1,
};

export const DEFAULT_SHIP_CONFIG: ShipConfig = {
  radius: C.SHIP_RADIUS,
  thrustPower: C.SHIP_THRUST_POWER,
  maxVelocity: C.SHIP_MAX_VELOCITY,
  drag: C.SHIP_DRAG,
  mass: C.DEFAULT_MASS,
};

export const DEFAULT_PROJECTILE_CONFIG: ProjectileConfig = {
  poolSize: C.PROJECTILE_POOL_SIZE,
  cooldown: C.FIRE_COOLDOWN,
  speed: C.PROJECTILE_SPEED,
  lifetime: C.PROJECTILE_LIFETIME,
  damage: C.PROJECTILE_DAMAGE,
  radius: C.PROJECTILE_RADIUS,
};

export const DEFAULT_FRACTURE_CONFIG: FractureConfig = {
  tiers: C.DEFAULT_SIZE_TIERS,
  fragmentSpeedRange: [C.FRAGMENT_SPEED_MIN, C.FRAGMENT_SPEED_MAX],
  scatterCone: C.SCATTER_CONE,
  jitter: C.FRAGMENT_JITTER,
  initialSpeedRange: [C.INITIAL_SPEED_MIN, C.INITIAL_SPEED_MAX],
  spawnMargin: C.SPAWN_MARGIN,
  safeZoneBuffer: C.SAFE_ZONE_BUFFER,
  placementAttempts: C.PLACEMENT_ATTEMPTS,
  asteroidMaxVelocity: C.ASTEROID_MAX_VELOCITY,
};

export const DEFAULT_WAVE_CONFIG: WaveConfig = {
  baseCount: C.WAVE_BASE_COUNT,
  countStep: C.WAVE_COUNT_STEP,
  maxCount: C.WAVE_MAX_COUNT,
  speedStep: C.WAVE_SPEED_STEP,
  tierPools: C.WAVE_TIER_POOLS,
  safeHavenRadius: C.SAFE_HAVEN_RADIUS,
  autoAdvance: false,
};

export const DEFAULT_STEERING_CONFIG: SteeringConfig = {
  seekWeight: C.SEEK_WEIGHT,
  avoidWeight: C.AVOID_WEIGHT,
  dangerRadius: C.DANGER_RADIUS,
  turnRate: C.TURN_RATE,
  arrivalTolerance: C.ARRIVAL_TOLERANCE,
  maxSteerForce: C.MAX_STEER_FORCE,
  maneuverCooldownTicks: C.MANEUVER_COOLDOWN_TICKS,
  waypointMargin: C.WAYPOINT_MARGIN,
  waypointCandidates: C.WAYPOINT_CANDIDATES,
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  world: DEFAULT_WORLD_CONFIG,
  ship: DEFAULT_SHIP_CONFIG,
  projectiles: DEFAULT_PROJECTILE_CONFIG,
  fracture: DEFAULT_FRACTURE_CONFIG,
  waves: DEFAULT_WAVE_CONFIG,
  steering: DEFAULT_STEERING_CONFIG,
};

/**
 * Merge overrides into the defaults section by section and validate the result.
 */
export function createSimulationConfig(overrides: SimulationConfigOverrides = {}): SimulationConfig {
  const config: SimulationConfig = {
    world: { ...DEFAULT_WORLD_CONFIG, ...overrides.world },
    ship: { ...DEFAULT_SHIP_CONFIG, ...overrides.ship },
    projectiles: { ...DEFAULT_PROJECTILE_CONFIG, ...overrides.projectiles },
    fracture: { ...DEFAULT_FRACTURE_CONFIG, ...overrides.fracture },
    waves: { ...DEFAULT_WAVE_CONFIG, ...overrides.waves },
    steering: { ...DEFAULT_STEERING_CONFIG, ...overrides.steering },
  };

  assertValid([
    ...validateWorldConfig(config.world),
    ...validateShipConfig(config.ship),
    ...validateProjectileConfig(config.projectiles),
    ...validateFractureConfig(config.fracture),
    ...validateWaveConfig(config.waves, config.fracture.tiers),
    ...validateSteeringConfig(config.steering),
  ]);

  return config;
}

// =============================================================================
// Validators
// =============================================================================

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isRange(value: [number, number]): boolean {
  return isFiniteNumber(value[0]) && isFiniteNumber(value[1]) && value[0] >= 0 && value[0] <= value[1];
}

/**
 * Throw an INVALID_CONFIGURATION error listing every problem, if any.
 */
export function assertValid(problems: string[]): void {
  if (problems.length === 0) return;
  const error = createInvalidConfigurationError(problems);
  logger.error('Rejected configuration', error);
  throw error;
}

export function validateWorldConfig(world: WorldConfig): string[] {
  const problems: string[] = [];
  if (!isFiniteNumber(world.width) || world.width <= 0) problems.push('world.width must be > 0');
  if (!isFiniteNumber(world.height) || world.height <= 0) problems.push('world.height must be > 0');
  if (!Number.isInteger(world.seed)) problems.push('world.seed must be an integer');
  return problems;
}

export function validateShipConfig(ship: ShipConfig): string[] {
  const problems: string[] = [];
  if (!isFiniteNumber(ship.radius) || ship.radius <= 0) problems.push('ship.radius must be > 0');
  if (!isFiniteNumber(ship.thrustPower) || ship.thrustPower < 0) problems.push('ship.thrustPower must be >= 0');
  if (!(ship.maxVelocity > 0)) problems.push('ship.maxVelocity must be > 0');
  if (!isFiniteNumber(ship.drag) || ship.drag < 0 || ship.drag >= 1) problems.push('ship.drag must be in [0, 1)');
  if (!isFiniteNumber(ship.mass) || ship.mass <= 0) problems.push('ship.mass must be > 0');
  return problems;
}

export function validateProjectileConfig(projectiles: ProjectileConfig): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(projectiles.poolSize) || projectiles.poolSize <= 0) {
    problems.push('projectiles.poolSize must be a positive integer');
  }
  if (!isFiniteNumber(projectiles.cooldown) || projectiles.cooldown < 0) {
    problems.push('projectiles.cooldown must be >= 0');
  }
  if (!isFiniteNumber(projectiles.speed) || projectiles.speed < 0) problems.push('projectiles.speed must be >= 0');
  if (!isFiniteNumber(projectiles.lifetime) || projectiles.lifetime <= 0) {
    problems.push('projectiles.lifetime must be > 0');
  }
  if (!isFiniteNumber(projectiles.damage) || projectiles.damage < 0) problems.push('projectiles.damage must be >= 0');
  if (!isFiniteNumber(projectiles.radius) || projectiles.radius <= 0) problems.push('projectiles.radius must be > 0');
  return problems;
}

/**
 * A well-formed table has at least one terminal tier, and every other tier
 * splits into a strictly smaller tier that exists, so every cascade ends.
 */
export function validateSizeTierTable(tiers: SizeTierTable): string[] {
  const problems: string[] = [];
  const keys = Object.keys(tiers).map(Number);

  if (keys.length === 0) {
    return ['size-tier table must not be empty'];
  }

  let terminalCount = 0;
  for (const tier of keys) {
    const row = tiers[tier];
    if (!Number.isInteger(tier) || tier < 0) problems.push(`tier ${tier}: key must be a non-negative integer`);
    if (typeof row !== 'object' || row === null) {
      problems.push(`tier ${tier}: row must be an object`);
      continue;
    }
    if (!isFiniteNumber(row.radius) || row.radius <= 0) problems.push(`tier ${tier}: radius must be > 0`);
    if (!isFiniteNumber(row.health) || row.health <= 0) problems.push(`tier ${tier}: health must be > 0`);
    if (!isFiniteNumber(row.points) || row.points < 0) problems.push(`tier ${tier}: points must be >= 0`);
    if (!Number.isInteger(row.childCount) || row.childCount < 0) {
      problems.push(`tier ${tier}: childCount must be a non-negative integer`);
      continue;
    }
    if (row.childCount === 0) {
      terminalCount++;
    } else if (!(row.childTier in tiers)) {
      problems.push(`tier ${tier}: childTier ${row.childTier} is not in the table`);
    } else if (row.childTier >= tier) {
      problems.push(`tier ${tier}: childTier ${row.childTier} must be smaller`);
    }
  }

  if (terminalCount === 0) problems.push('size-tier table needs a terminal tier (childCount 0)');
  return problems;
}

export function validateFractureConfig(fracture: FractureConfig): string[] {
  const problems = validateSizeTierTable(fracture.tiers);
  if (!isRange(fracture.fragmentSpeedRange)) problems.push('fracture.fragmentSpeedRange must be [min, max] with 0 <= min <= max');
  if (!isRange(fracture.initialSpeedRange)) problems.push('fracture.initialSpeedRange must be [min, max] with 0 <= min <= max');
  if (!isFiniteNumber(fracture.scatterCone) || fracture.scatterCone < 0) problems.push('fracture.scatterCone must be >= 0');
  if (!isFiniteNumber(fracture.jitter) || fracture.jitter < 0) problems.push('fracture.jitter must be >= 0');
  if (!isFiniteNumber(fracture.spawnMargin) || fracture.spawnMargin < 0) problems.push('fracture.spawnMargin must be >= 0');
  if (!isFiniteNumber(fracture.safeZoneBuffer) || fracture.safeZoneBuffer < 0) problems.push('fracture.safeZoneBuffer must be >= 0');
  if (!Number.isInteger(fracture.placementAttempts) || fracture.placementAttempts < 1) {
    problems.push('fracture.placementAttempts must be a positive integer');
  }
  if (!(fracture.asteroidMaxVelocity > 0)) problems.push('fracture.asteroidMaxVelocity must be > 0');
  return problems;
}

export function validateWaveConfig(waves: WaveConfig, tiers: SizeTierTable): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(waves.baseCount) || waves.baseCount < 1) problems.push('waves.baseCount must be a positive integer');
  if (!Number.isInteger(waves.countStep) || waves.countStep < 0) problems.push('waves.countStep must be a non-negative integer');
  if (!Number.isInteger(waves.maxCount) || waves.maxCount < waves.baseCount) problems.push('waves.maxCount must be an integer >= baseCount');
  if (!isFiniteNumber(waves.speedStep) || waves.speedStep < 0) problems.push('waves.speedStep must be >= 0');
  if (!isFiniteNumber(waves.safeHavenRadius) || waves.safeHavenRadius < 0) problems.push('waves.safeHavenRadius must be >= 0');
  if (waves.tierPools.length === 0) problems.push('waves.tierPools must not be empty');
  waves.tierPools.forEach((pool, index) => {
    if (pool.length === 0) problems.push(`waves.tierPools[${index}] must not be empty`);
    for (const tier of pool) {
      if (!(tier in tiers)) problems.push(`waves.tierPools[${index}] references unknown tier ${tier}`);
    }
  });
  return problems;
}

export function validateSteeringConfig(steering: SteeringConfig): string[] {
  const problems: string[] = [];
  if (!isFiniteNumber(steering.seekWeight) || steering.seekWeight < 0) problems.push('steering.seekWeight must be >= 0');
  if (!isFiniteNumber(steering.avoidWeight) || steering.avoidWeight < 0) problems.push('steering.avoidWeight must be >= 0');
  if (!isFiniteNumber(steering.dangerRadius) || steering.dangerRadius <= 0) problems.push('steering.dangerRadius must be > 0');
  if (!isFiniteNumber(steering.turnRate) || steering.turnRate <= 0) problems.push('steering.turnRate must be > 0');
  if (!isFiniteNumber(steering.arrivalTolerance) || steering.arrivalTolerance < 0) {
    problems.push('steering.arrivalTolerance must be >= 0');
  }
  if (!(steering.maxSteerForce > 0)) problems.push('steering.maxSteerForce must be > 0');
  if (!Number.isInteger(steering.maneuverCooldownTicks) || steering.maneuverCooldownTicks < 0) {
    problems.push('steering.maneuverCooldownTicks must be a non-negative integer');
  }
  if (!isFiniteNumber(steering.waypointMargin) || steering.waypointMargin < 0) problems.push('steering.waypointMargin must be >= 0');
  if (!Number.isInteger(steering.waypointCandidates) || steering.waypointCandidates < 1) {
    problems.push('steering.waypointCandidates must be a positive integer');
  }
  return problems;
}
