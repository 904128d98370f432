/**
 * FractureSystem - size-tier driven asteroid splitting
 *
 * Handles the classic 1 -> 2 -> 4 cascade:
 * - A non-terminal asteroid splits into `childCount` fragments of `childTier`
 * - Fragments inherit half the parent's momentum plus a scatter kick
 * - The terminal tier vanishes without fragments
 *
 * Also creates the initial asteroids of a wave and computes wave difficulty.
 *
 * The system keeps no entity storage. Fragments are returned as values and
 * the caller decides where they live. The only state is the tier table and
 * the injected random generator.
 */

import type {
  AsteroidFragment,
  Bounds,
  SafeZone,
  SizeTier,
  SizeTierTable,
  SpawnOptions,
  Vector2,
  WaveDifficulty,
} from './types';
import { KineticEntity } from './KineticEntity';
import { SeededRandom } from './random';
import { vec2FromAngle, vec2Scale } from './vector';
import {
  assertValid,
  DEFAULT_FRACTURE_CONFIG,
  DEFAULT_WAVE_CONFIG,
  FractureConfig,
  validateFractureConfig,
  validateWaveConfig,
  WaveConfig,
} from '../config';
import { createUnknownEntityError } from '../errors';
import { createLogger } from '../logger';
import { failureFrom, Result, success } from '../result';

const logger = createLogger('FractureSystem');

function copyTierTable(tiers: SizeTierTable): SizeTierTable {
  return Object.fromEntries(Object.entries(tiers).map(([tier, row]) => [tier, { ...row }]));
}

export class FractureSystem {
  private readonly config: FractureConfig;
  private readonly waves: WaveConfig;
  private readonly bounds: Bounds;
  private readonly rng: SeededRandom;
  private readonly defaultTierPool: number[];

  /**
   * @param rng - Shared generator for scatter, jitter and placement
   * @param bounds - World bounds new asteroids wrap in
   * @param config - Tier table and fragment physics
   * @param waves - Wave progression parameters
   */
  constructor(
    rng: SeededRandom,
    bounds: Bounds,
    config: Partial<FractureConfig> = {},
    waves: Partial<WaveConfig> = {}
  ) {
    this.rng = rng;
    this.bounds = { width: bounds.width, height: bounds.height };
    const merged = { ...DEFAULT_FRACTURE_CONFIG, ...config };
    this.waves = { ...DEFAULT_WAVE_CONFIG, ...waves };

    assertValid([
      ...validateFractureConfig(merged),
      ...validateWaveConfig(this.waves, merged.tiers),
    ]);

    // Own copy of every row; the caller keeps its table
    this.config = { ...merged, tiers: copyTierTable(merged.tiers) };

    this.defaultTierPool = this.buildDefaultTierPool();
  }

  /**
   * Look up a tier row.
   */
  getTier(tier: number): Result<SizeTier> {
    if (!(tier in this.config.tiers)) {
      return failureFrom(createUnknownEntityError('tier', tier));
    }
    return success({ ...this.config.tiers[tier] });
  }

  /** Tier numbers, largest first */
  getTiers(): number[] {
    return Object.keys(this.config.tiers).map(Number).sort((a, b) => b - a);
  }

  /**
   * Build an asteroid of the given tier with stats from the table.
   */
  createAsteroid(tier: number, position: Vector2, velocity: Vector2): Result<AsteroidFragment> {
    const row = this.getTier(tier);
    if (!row.ok) return row;

    return success({
      body: new KineticEntity({
        position,
        velocity,
        heading: this.rng.angle(),
        drag: 0,
        maxVelocity: this.config.asteroidMaxVelocity,
        bounds: this.bounds,
      }),
      tier,
      health: row.value.health,
      radius: row.value.radius,
      points: row.value.points,
    });
  }

  /**
   * Split an asteroid into the next tier.
   *
   * Fragment angles are spread evenly across the scatter cone centred on the
   * impact angle (or a random angle when none is given); each fragment gets a
   * random speed from fragmentSpeedRange on top of half the parent velocity.
   *
   * @param asteroid - The asteroid being destroyed
   * @param impactAngle - Heading of whatever hit it, radians
   * @returns New fragments; empty for a terminal tier
   */
  fractureAsteroid(asteroid: AsteroidFragment, impactAngle?: number): Result<AsteroidFragment[]> {
    const row = this.getTier(asteroid.tier);
    if (!row.ok) return row;

    const { childCount, childTier } = row.value;
    if (childCount === 0) {
      return success([]);
    }

    const baseAngle = impactAngle ?? this.rng.angle();
    const cone = this.config.scatterCone;
    const [minSpeed, maxSpeed] = this.config.fragmentSpeedRange;
    const jitter = this.config.jitter;
    const parentPosition = asteroid.body.position;
    const inherited = vec2Scale(asteroid.body.velocity, 0.5);

    const fragments: AsteroidFragment[] = [];
    for (let i = 0; i < childCount; i++) {
      const angle = baseAngle + ((i + 0.5) / childCount - 0.5) * cone;
      const scatter = vec2Scale(vec2FromAngle(angle), this.rng.range(minSpeed, maxSpeed));
      const position = {
        x: parentPosition.x + this.rng.range(-jitter, jitter),
        y: parentPosition.y + this.rng.range(-jitter, jitter),
      };
      const velocity = { x: inherited.x + scatter.x, y: inherited.y + scatter.y };

      const child = this.createAsteroid(childTier, position, velocity);
      if (!child.ok) return child;
      fragments.push(child.value);
    }

    logger.debug('Asteroid fractured', { tier: asteroid.tier, fragments: fragments.length });
    return success(fragments);
  }

  /**
   * Create the asteroids of a new wave.
   *
   * Placement avoids the safe zone for up to placementAttempts tries, then
   * falls back to a point on the spawn margin.
   *
   * @param count - Number of asteroids
   * @param safeZone - Area to keep clear, usually around the player
   */
  createInitialAsteroids(count: number, safeZone?: SafeZone, options: SpawnOptions = {}): AsteroidFragment[] {
    const speedMultiplier = options.speedMultiplier ?? 1;
    const tierPool = options.tierPool && options.tierPool.length > 0 ? options.tierPool : this.defaultTierPool;
    const [minSpeed, maxSpeed] = this.config.initialSpeedRange;

    const asteroids: AsteroidFragment[] = [];
    for (let i = 0; i < Math.max(0, Math.floor(count)); i++) {
      const position = safeZone ? this.findSafePosition(safeZone) : this.randomPosition();
      const speed = this.rng.range(minSpeed, maxSpeed) * speedMultiplier;
      const velocity = vec2Scale(vec2FromAngle(this.rng.angle()), speed);
      const tier = this.rng.pick(tierPool);

      const asteroid = this.createAsteroid(tier, position, velocity);
      if (asteroid.ok) {
        asteroids.push(asteroid.value);
      } else {
        logger.warn('Skipped spawn with unknown tier', asteroid.reason);
      }
    }

    return asteroids;
  }

  /**
   * Difficulty parameters for a 1-based wave number.
   *
   * Counts grow by countStep up to maxCount, speed by speedStep per wave, and
   * the tier pool moves to the next (smaller-biased) entry every two waves.
   */
  calculateWaveDifficulty(waveNumber: number): WaveDifficulty {
    const wave = Math.max(1, Math.floor(waveNumber));
    const { baseCount, countStep, maxCount, speedStep, tierPools } = this.waves;
    const poolIndex = Math.min(Math.floor((wave - 1) / 2), tierPools.length - 1);

    return {
      waveNumber: wave,
      asteroidCount: Math.min(baseCount + (wave - 1) * countStep, maxCount),
      speedMultiplier: 1 + (wave - 1) * speedStep,
      tierPool: [...tierPools[poolIndex]],
    };
  }

  /**
   * Reduce an asteroid's health.
   *
   * @returns true if the asteroid has no health left
   */
  damageAsteroid(asteroid: AsteroidFragment, damage: number): boolean {
    asteroid.health = Math.max(0, asteroid.health - damage);
    return asteroid.health <= 0;
  }

  getTotalPoints(asteroids: readonly AsteroidFragment[]): number {
    return asteroids.reduce((sum, asteroid) => sum + asteroid.points, 0);
  }

  /** Count of asteroids per tier, with every table tier present */
  getTierDistribution(asteroids: readonly AsteroidFragment[]): Record<number, number> {
    const distribution: Record<number, number> = {};
    this.getTiers().forEach((tier) => {
      distribution[tier] = 0;
    });
    asteroids.forEach((asteroid) => {
      distribution[asteroid.tier] = (distribution[asteroid.tier] ?? 0) + 1;
    });
    return distribution;
  }

  isWaveCleared(asteroids: readonly AsteroidFragment[]): boolean {
    return asteroids.length === 0;
  }

  get safeHavenRadius(): number {
    return this.waves.safeHavenRadius;
  }

  /**
   * Non-terminal tiers appear twice and terminal tiers once, which biases
   * a default spawn toward larger bodies.
   */
  private buildDefaultTierPool(): number[] {
    const pool: number[] = [];
    this.getTiers().forEach((tier) => {
      const copies = this.config.tiers[tier].childCount > 0 ? 2 : 1;
      for (let i = 0; i < copies; i++) pool.push(tier);
    });
    return pool;
  }

  private randomPosition(): Vector2 {
    const { x: minX, y: minY, maxX, maxY } = this.spawnArea();
    return {
      x: this.rng.range(minX, maxX),
      y: this.rng.range(minY, maxY),
    };
  }

  private findSafePosition(safeZone: SafeZone): Vector2 {
    const clearance = safeZone.radius + this.config.safeZoneBuffer;

    for (let attempt = 0; attempt < this.config.placementAttempts; attempt++) {
      const candidate = this.randomPosition();
      const dx = candidate.x - safeZone.x;
      const dy = candidate.y - safeZone.y;
      if (Math.sqrt(dx * dx + dy * dy) > clearance) {
        return candidate;
      }
    }

    // Retries exhausted: spawn on one of the four margin lines
    const { x: minX, y: minY, maxX, maxY } = this.spawnArea();
    const edges: Vector2[] = [
      { x: minX, y: this.rng.range(minY, maxY) },
      { x: maxX, y: this.rng.range(minY, maxY) },
      { x: this.rng.range(minX, maxX), y: minY },
      { x: this.rng.range(minX, maxX), y: maxY },
    ];
    return this.rng.pick(edges);
  }

  /** Spawn rectangle inset by spawnMargin, collapsing to the centre on tiny worlds */
  private spawnArea(): { x: number; y: number; maxX: number; maxY: number } {
    const margin = this.config.spawnMargin;
    const { width, height } = this.bounds;
    const insetX = Math.min(margin, width / 2);
    const insetY = Math.min(margin, height / 2);
    return { x: insetX, y: insetY, maxX: width - insetX, maxY: height - insetY };
  }
}
