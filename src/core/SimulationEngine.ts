/**
 * SimulationEngine - fixed-order tick orchestration
 *
 * The SimulationEngine is the integration point for all core systems. It owns
 * the projectile pool, the shared random generator, every ship, pilot and
 * asteroid, and advances them in a fixed order each tick:
 *
 * 1. Steering for autonomous ships, from positions frozen at the end of the
 *    previous tick
 * 2. Physics integration for ships, asteroids and projectiles
 * 3. Expired projectiles swept back to the pool
 * 4. Collision detection and resolution (fracture, recycling, wave advance)
 * 5. Frame output
 *
 * Scoring, lives and rendering live outside the core and hook in through
 * SimulationCallbacks.
 */

import type {
  AsteroidFragment,
  AsteroidFrame,
  Bounds,
  EntityFrame,
  FrameSnapshot,
  PilotTelemetry,
  Projectile,
  ProjectileHit,
  ProjectileStats,
  SafeZone,
  Ship,
  SimulationCallbacks,
  Threat,
  Vector2,
  WaveDifficulty,
} from './types';
import { CollisionSystem } from './CollisionSystem';
import { FractureSystem } from './FractureSystem';
import { KineticEntity } from './KineticEntity';
import { ProjectileSystem } from './ProjectileSystem';
import { SeededRandom } from './random';
import { SteeringPilot } from './SteeringPilot';
import { vec2Add, vec2Clone, vec2Scale, vec2Zero } from './vector';
import { createSimulationConfig, SimulationConfig, SimulationConfigOverrides } from '../config';
import { createUnknownEntityError } from '../errors';
import { createLogger } from '../logger';
import { failureFrom, Result, success } from '../result';

const logger = createLogger('SimulationEngine');

export interface SpawnShipOptions {
  heading?: number;
  velocity?: Vector2;
  /** Fly this ship with a SteeringPilot */
  autonomous?: boolean;
  /** Initial waypoint for an autonomous ship */
  waypoint?: Vector2;
}

/**
 * SimulationEngine manages the complete simulation lifecycle
 *
 * Usage:
 * 1. Create instance with optional callbacks and config overrides
 * 2. Spawn ships with spawnShip() and asteroids with startNextWave()
 * 3. Call tick(dt) from the host loop at a fixed rate
 * 4. Handle fire input via fire()
 * 5. Call destroy() when done
 */
export class SimulationEngine {
  private readonly config: SimulationConfig;
  private readonly callbacks: SimulationCallbacks;
  private readonly bounds: Bounds;
  private readonly rng: SeededRandom;
  private readonly projectiles: ProjectileSystem;
  private readonly fracture: FractureSystem;
  private readonly collisions: CollisionSystem;
  private readonly ships: Map<string, Ship> = new Map();
  private readonly pilots: Map<string, SteeringPilot> = new Map();
  private readonly asteroids: Map<string, AsteroidFragment> = new Map();
  private asteroidCounter = 0;
  private time = 0;
  private tickCount = 0;
  private wave = 0;

  /**
   * Create a new SimulationEngine instance
   *
   * @param callbacks - Optional callbacks for simulation events
   * @param overrides - Per-section configuration overrides; validated here
   */
  constructor(callbacks: SimulationCallbacks = {}, overrides: SimulationConfigOverrides = {}) {
    this.callbacks = callbacks;
    this.config = createSimulationConfig(overrides);
    this.bounds = { width: this.config.world.width, height: this.config.world.height };

    // Initialize systems
    this.rng = new SeededRandom(this.config.world.seed);
    this.projectiles = new ProjectileSystem(this.bounds, this.config.projectiles);
    this.fracture = new FractureSystem(this.rng, this.bounds, this.config.fracture, this.config.waves);
    this.collisions = new CollisionSystem(this.bounds);
  }

  getConfig(): SimulationConfig {
    return this.config;
  }

  getTime(): number {
    return this.time;
  }

  getTick(): number {
    return this.tickCount;
  }

  getWave(): number {
    return this.wave;
  }

  // ===========================================================================
  // Ships
  // ===========================================================================

  /**
   * Add a ship to the simulation. An existing ship with the same id is replaced.
   *
   * @param id - Unique identifier, also the projectile owner id
   * @param position - Spawn point, wrapped into the world
   * @returns The created Ship
   */
  spawnShip(id: string, position: Vector2, options: SpawnShipOptions = {}): Ship {
    if (this.ships.has(id)) {
      logger.warn('Replacing existing ship', { id });
      this.removeShip(id);
    }

    const shipConfig = this.config.ship;
    const ship: Ship = {
      id,
      body: new KineticEntity({
        position,
        velocity: options.velocity,
        heading: options.heading ?? 0,
        thrustPower: shipConfig.thrustPower,
        maxVelocity: shipConfig.maxVelocity,
        drag: shipConfig.drag,
        mass: shipConfig.mass,
        bounds: this.bounds,
      }),
      radius: shipConfig.radius,
      autonomous: options.autonomous ?? false,
    };
    this.ships.set(id, ship);

    if (ship.autonomous) {
      const pilot = new SteeringPilot(this.rng, this.config.steering);
      if (options.waypoint) {
        pilot.setWaypoint(options.waypoint);
      }
      this.pilots.set(id, pilot);
    }

    return ship;
  }

  /**
   * Remove a ship, its pilot and its fire cooldown.
   */
  removeShip(id: string): Result<Ship> {
    const ship = this.ships.get(id);
    if (!ship) {
      const error = createUnknownEntityError('ship', id);
      logger.warn(error.message);
      return failureFrom(error);
    }

    this.ships.delete(id);
    this.pilots.delete(id);
    this.projectiles.forgetOwner(id);
    return success(ship);
  }

  getShip(id: string): Result<Ship> {
    const ship = this.ships.get(id);
    if (!ship) {
      return failureFrom(createUnknownEntityError('ship', id));
    }
    return success(ship);
  }

  getPilotTelemetry(shipId: string): Result<PilotTelemetry> {
    const pilot = this.pilots.get(shipId);
    if (!pilot) {
      return failureFrom(createUnknownEntityError('pilot', shipId));
    }
    return success(pilot.getTelemetry());
  }

  // ===========================================================================
  // Input Handling
  // ===========================================================================

  /**
   * Fire a projectile from the ship's nose along its heading.
   *
   * @returns The projectile, UNKNOWN_ENTITY for a missing ship, or
   *          RESOURCE_EXHAUSTED when on cooldown or the pool is empty
   */
  fire(shipId: string): Result<Projectile> {
    const ship = this.ships.get(shipId);
    if (!ship) {
      return failureFrom(createUnknownEntityError('ship', shipId));
    }

    const origin = vec2Add(ship.body.position, vec2Scale(ship.body.forward(), ship.radius));
    const result = this.projectiles.fireProjectile(shipId, origin, ship.body.heading, this.time);
    if (result.ok) {
      this.callbacks.onProjectileFired?.(result.value);
    }
    return result;
  }

  getProjectileStats(): ProjectileStats {
    return this.projectiles.getStats();
  }

  getCooldownRemaining(shipId: string): number {
    return this.projectiles.getCooldownRemaining(shipId, this.time);
  }

  // ===========================================================================
  // Asteroids & Waves
  // ===========================================================================

  /**
   * Add a single asteroid of the given tier.
   *
   * @returns The new asteroid id, or UNKNOWN_ENTITY for a tier not in the table
   */
  spawnAsteroid(tier: number, position: Vector2, velocity: Vector2 = vec2Zero()): Result<string> {
    const asteroid = this.fracture.createAsteroid(tier, position, velocity);
    if (!asteroid.ok) return asteroid;
    return success(this.addAsteroid(asteroid.value));
  }

  despawnAsteroid(id: string): Result<AsteroidFragment> {
    const asteroid = this.asteroids.get(id);
    if (!asteroid) {
      const error = createUnknownEntityError('asteroid', id);
      logger.warn(error.message);
      return failureFrom(error);
    }
    this.asteroids.delete(id);
    return success(asteroid);
  }

  getAsteroid(id: string): Result<AsteroidFragment> {
    const asteroid = this.asteroids.get(id);
    if (!asteroid) {
      return failureFrom(createUnknownEntityError('asteroid', id));
    }
    return success(asteroid);
  }

  /** Asteroid ids in insertion order */
  getAsteroidIds(): string[] {
    return Array.from(this.asteroids.keys());
  }

  /**
   * Spawn the next wave around a safe zone.
   *
   * @param safeZoneCenter - Centre of the spawn-free circle; defaults to the first ship
   */
  startNextWave(safeZoneCenter?: Vector2): WaveDifficulty {
    this.wave++;
    const difficulty = this.fracture.calculateWaveDifficulty(this.wave);

    const center = safeZoneCenter ?? this.firstShipPosition();
    const safeZone: SafeZone | undefined = center
      ? { x: center.x, y: center.y, radius: this.fracture.safeHavenRadius }
      : undefined;

    this.fracture
      .createInitialAsteroids(difficulty.asteroidCount, safeZone, {
        speedMultiplier: difficulty.speedMultiplier,
        tierPool: difficulty.tierPool,
      })
      .forEach((asteroid) => this.addAsteroid(asteroid));

    logger.info('Wave started', {
      wave: difficulty.waveNumber,
      asteroids: difficulty.asteroidCount,
      speedMultiplier: difficulty.speedMultiplier,
    });
    this.callbacks.onWaveStart?.(difficulty);

    return difficulty;
  }

  // ===========================================================================
  // Game Loop
  // ===========================================================================

  /**
   * Advance the simulation by one fixed step.
   *
   * @param dt - Step length in seconds
   * @returns The frame emitted at the end of the tick
   */
  tick(dt: number): FrameSnapshot {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`tick dt must be a finite, non-negative number, got ${dt}`);
    }

    this.time += dt;
    this.tickCount++;

    this.steerAutonomousShips(dt);
    this.integrate(dt);
    this.projectiles.sweepExpired(this.time);
    this.resolveCollisions();

    const frame = this.getSnapshot();
    this.callbacks.onFrame?.(frame);
    return frame;
  }

  /**
   * Read-only view of every active entity.
   */
  getSnapshot(): FrameSnapshot {
    const ships: EntityFrame[] = [];
    this.ships.forEach((ship) => {
      ships.push(this.toFrame(ship.id, ship.body, ship.radius));
    });

    const asteroids: AsteroidFrame[] = [];
    this.asteroids.forEach((asteroid, id) => {
      asteroids.push({ ...this.toFrame(id, asteroid.body, asteroid.radius), tier: asteroid.tier });
    });

    const projectiles = this.projectiles
      .getActiveProjectiles()
      .map((projectile) => this.toFrame(projectile.id, projectile.body, projectile.radius));

    return {
      tick: this.tickCount,
      time: this.time,
      wave: this.wave,
      ships,
      asteroids,
      projectiles,
    };
  }

  /**
   * Steering reads asteroid positions copied before any body moves this tick,
   * and every steering vector is computed before any is applied.
   */
  private steerAutonomousShips(dt: number): void {
    if (this.pilots.size === 0) return;

    const threats: Threat[] = Array.from(this.asteroids.values()).map((asteroid) => ({
      position: vec2Clone(asteroid.body.position),
      radius: asteroid.radius,
    }));

    const intents: Array<{ ship: Ship; pilot: SteeringPilot; steering: Vector2 }> = [];
    this.pilots.forEach((pilot, shipId) => {
      const ship = this.ships.get(shipId);
      if (!ship) return;
      intents.push({ ship, pilot, steering: pilot.computeSteering(ship.body, threats, this.bounds) });
    });

    intents.forEach(({ ship, pilot, steering }) => {
      pilot.applyToShip(steering, ship.body, dt);
    });
  }

  private integrate(dt: number): void {
    this.ships.forEach((ship) => ship.body.update(dt));
    this.asteroids.forEach((asteroid) => asteroid.body.update(dt));
    this.projectiles.integrate(dt);
  }

  private resolveCollisions(): void {
    const shipHits = this.collisions.detectShipHits(this.ships.values(), this.asteroids);
    shipHits.forEach((hit) => {
      this.pilots.get(hit.shipId)?.recordCollision();
      this.callbacks.onShipHit?.(hit);
    });

    const projectileHits = this.collisions.detectProjectileHits(
      this.projectiles.getActiveProjectiles(),
      this.asteroids
    );
    projectileHits.forEach((hit) => this.resolveProjectileHit(hit));

    if (this.config.waves.autoAdvance && this.wave > 0 && this.asteroids.size === 0) {
      this.startNextWave();
    }
  }

  /**
   * Fracture the struck asteroid along the projectile's heading, recycle the
   * projectile and swap the asteroid for its fragments.
   */
  private resolveProjectileHit(hit: ProjectileHit): void {
    const asteroid = this.asteroids.get(hit.asteroidId);
    const projectile = this.projectiles.getProjectile(hit.projectileId);
    if (!asteroid || !projectile.ok) return;

    const ownerId = projectile.value.ownerId;
    const fragments = this.fracture.fractureAsteroid(asteroid, projectile.value.body.heading);

    this.projectiles.recycle(hit.projectileId, 'impact');
    this.asteroids.delete(hit.asteroidId);

    let fragmentIds: string[] = [];
    if (fragments.ok) {
      fragmentIds = fragments.value.map((fragment) => this.addAsteroid(fragment));
    } else {
      logger.warn('Asteroid removed without fragments', fragments.reason);
    }

    logger.debug('Asteroid destroyed', { id: hit.asteroidId, tier: asteroid.tier, fragments: fragmentIds.length });
    this.callbacks.onAsteroidDestroyed?.({
      asteroidId: hit.asteroidId,
      tier: asteroid.tier,
      points: asteroid.points,
      fragmentIds,
      ownerId,
    });
  }

  private addAsteroid(asteroid: AsteroidFragment): string {
    this.asteroidCounter++;
    const id = `asteroid_${this.asteroidCounter}`;
    this.asteroids.set(id, asteroid);
    return id;
  }

  private firstShipPosition(): Vector2 | undefined {
    for (const ship of this.ships.values()) {
      return vec2Clone(ship.body.position);
    }
    return undefined;
  }

  private toFrame(id: string, body: KineticEntity, radius: number): EntityFrame {
    return {
      id,
      x: body.position.x,
      y: body.position.y,
      heading: body.heading,
      radius,
    };
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Clean up resources
   *
   * Returns every projectile to the pool and drops all entities.
   */
  destroy(): void {
    this.projectiles.clear();
    this.pilots.clear();
    this.ships.clear();
    this.asteroids.clear();
  }
}
