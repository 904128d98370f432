/**
 * Platform-independent simulation types.
 *
 * Plain data shared by every system in the core. Nothing here depends on a
 * renderer, a clock or a host loop.
 */

import type { KineticEntity } from './KineticEntity';

// =============================================================================
// Geometry
// =============================================================================

export interface Vector2 {
  x: number;
  y: number;
}

/**
 * Toroidal wrap bounds. Positions live in [0, width) x [0, height).
 */
export interface Bounds {
  width: number;
  height: number;
}

/**
 * Anything the broad-phase can test: a centre and a radius.
 */
export interface Circle {
  position: Vector2;
  radius: number;
}

// =============================================================================
// Kinetic bodies
// =============================================================================

export interface KineticEntityOptions {
  position?: Vector2;
  velocity?: Vector2;
  /** Radians; wrapped into [0, 2π) */
  heading?: number;
  angularVelocity?: number;
  mass?: number;
  thrustPower?: number;
  /** Fraction of velocity removed on every update call (0 = no drag) */
  drag?: number;
  maxVelocity?: number;
  bounds: Bounds;
}

/**
 * Read-only copy of a body's state, safe to hand to renderers.
 */
export interface KineticSnapshot {
  position: Vector2;
  velocity: Vector2;
  heading: number;
  angularVelocity: number;
  speed: number;
}

// =============================================================================
// Projectiles
// =============================================================================

/**
 * A pooled projectile slot.
 *
 * The id changes every time the slot is fired; the slot index never does.
 */
export interface Projectile {
  /** Unique per shot, empty while pooled */
  id: string;

  /** Index of the pool slot backing this projectile */
  readonly slot: number;

  /** Exclusively owned body, reconfigured on every fire */
  readonly body: KineticEntity;

  ownerId: string;
  damage: number;
  spawnTime: number;
  lifetime: number;
  radius: number;
}

export type RecycleReason = 'impact' | 'expired' | 'despawn';

export interface ProjectileStats {
  capacity: number;
  active: number;
  pooled: number;
  fired: number;
  impacted: number;
  expired: number;
  rejected: number;
  /** Impacts as a percentage of shots fired */
  accuracy: number;
}

// =============================================================================
// Asteroids
// =============================================================================

/**
 * One row of the size-tier table.
 */
export interface SizeTier {
  readonly radius: number;
  readonly health: number;
  readonly points: number;
  /** Number of fragments spawned on fracture; 0 marks a terminal tier */
  readonly childCount: number;
  /** Tier of the spawned fragments, ignored when childCount is 0 */
  readonly childTier: number;
}

export type SizeTierTable = Readonly<Record<number, SizeTier>>;

export interface AsteroidFragment {
  readonly body: KineticEntity;
  tier: number;
  health: number;
  radius: number;
  points: number;
}

/**
 * Circular area kept free of spawns, usually centred on the player.
 */
export interface SafeZone {
  x: number;
  y: number;
  radius: number;
}

export interface WaveDifficulty {
  waveNumber: number;
  asteroidCount: number;
  speedMultiplier: number;
  /** Bag of tiers drawn from uniformly; repeats weight the draw */
  tierPool: number[];
}

export interface SpawnOptions {
  speedMultiplier?: number;
  tierPool?: number[];
}

// =============================================================================
// Ships & steering
// =============================================================================

export interface Ship {
  id: string;
  readonly body: KineticEntity;
  radius: number;
  /** Whether a SteeringPilot flies this ship */
  autonomous: boolean;
}

/**
 * Something a pilot steers away from. Positions are copies taken at the end
 * of the previous tick.
 */
export interface Threat {
  position: Vector2;
  radius: number;
}

export interface PilotTelemetry {
  ticksSurvived: number;
  avoidanceManeuvers: number;
  /** Closest surface distance to any threat seen so far; Infinity until one is seen */
  closestThreatDistance: number;
  waypointsReached: number;
  collisions: number;
  totalSteeringMagnitude: number;
}

// =============================================================================
// Collisions
// =============================================================================

export interface ShipHit {
  shipId: string;
  asteroidId: string;
}

export interface ProjectileHit {
  projectileId: string;
  asteroidId: string;
}

// =============================================================================
// Frames
// =============================================================================

export interface EntityFrame {
  id: string;
  x: number;
  y: number;
  heading: number;
  radius: number;
}

export interface AsteroidFrame extends EntityFrame {
  tier: number;
}

/**
 * Everything a renderer needs for one tick. Plain values only.
 */
export interface FrameSnapshot {
  tick: number;
  time: number;
  wave: number;
  ships: EntityFrame[];
  asteroids: AsteroidFrame[];
  projectiles: EntityFrame[];
}

export interface AsteroidDestroyedEvent {
  asteroidId: string;
  tier: number;
  points: number;
  /** Ids of the fragments that replaced it, empty at the terminal tier */
  fragmentIds: string[];
  /** Ship that fired the projectile */
  ownerId: string;
}

// =============================================================================
// Callback Types
// =============================================================================

/**
 * Callbacks for engine events.
 *
 * Scoring and rendering live outside the core and hook in here.
 */
export interface SimulationCallbacks {
  /** Called when an asteroid is destroyed by a projectile */
  onAsteroidDestroyed?: (event: AsteroidDestroyedEvent) => void;

  /** Called for every ship overlapping an asteroid this tick */
  onShipHit?: (hit: ShipHit) => void;

  /** Called when a projectile is fired */
  onProjectileFired?: (projectile: Projectile) => void;

  /** Called when a new wave has been spawned */
  onWaveStart?: (difficulty: WaveDifficulty) => void;

  /** Called once at the end of every tick */
  onFrame?: (frame: FrameSnapshot) => void;
}
