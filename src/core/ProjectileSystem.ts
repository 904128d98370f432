import type { Bounds, Projectile, ProjectileStats, RecycleReason, Vector2 } from './types';
import { KineticEntity } from './KineticEntity';
import { vec2FromAngle, vec2Scale, vec2Zero } from './vector';
import { assertValid, DEFAULT_PROJECTILE_CONFIG, ProjectileConfig, validateProjectileConfig } from '../config';
import {
  createCooldownActiveError,
  createPoolExhaustedError,
  createUnknownEntityError,
} from '../errors';
import { createLogger } from '../logger';
import { failureFrom, Result, success } from '../result';

const logger = createLogger('ProjectileSystem');

/**
 * ProjectileSystem owns a fixed pool of projectile slots.
 *
 * Responsibilities:
 * - Preallocate every slot (and its body) at construction
 * - Gate firing on pool availability and a per-owner cooldown
 * - Integrate active projectiles and sweep expired ones back to the pool
 *
 * Every slot is always in exactly one of {pool, active}, so
 * pooledCount + activeCount === capacity.
 */
export class ProjectileSystem {
  private readonly config: ProjectileConfig;
  private readonly pool: Projectile[] = [];
  private readonly active: Map<string, Projectile> = new Map();
  /** Simulation time at which each owner may fire again */
  private readonly readyAt: Map<string, number> = new Map();
  private shotCounter = 0;
  private fired = 0;
  private impacted = 0;
  private expired = 0;
  private rejected = 0;

  /**
   * @param bounds - Wrap bounds for every projectile body
   * @param config - Pool size, cooldown and projectile defaults
   */
  constructor(bounds: Bounds, config: Partial<ProjectileConfig> = {}) {
    this.config = { ...DEFAULT_PROJECTILE_CONFIG, ...config };
    assertValid(validateProjectileConfig(this.config));

    for (let slot = 0; slot < this.config.poolSize; slot++) {
      this.pool.push({
        id: '',
        slot,
        body: new KineticEntity({ bounds, drag: 0 }),
        ownerId: '',
        damage: 0,
        spawnTime: 0,
        lifetime: this.config.lifetime,
        radius: this.config.radius,
      });
    }
  }

  get capacity(): number {
    return this.config.poolSize;
  }

  get activeCount(): number {
    return this.active.size;
  }

  get pooledCount(): number {
    return this.pool.length;
  }

  get cooldown(): number {
    return this.config.cooldown;
  }

  /**
   * Seconds until the owner may fire again. Never negative; exactly 0 from
   * lastFireTime + cooldown onwards, and 0 for owners that never fired.
   */
  getCooldownRemaining(ownerId: string, now: number): number {
    const readyAt = this.readyAt.get(ownerId);
    if (readyAt === undefined) return 0;
    return Math.max(0, readyAt - now);
  }

  canFire(ownerId: string, now: number): boolean {
    return this.pool.length > 0 && this.getCooldownRemaining(ownerId, now) === 0;
  }

  /**
   * Take a slot from the pool and launch it.
   *
   * @param angle - Launch direction in radians; also becomes the projectile heading
   * @returns The active projectile, or a RESOURCE_EXHAUSTED failure
   */
  fireProjectile(
    ownerId: string,
    origin: Vector2,
    angle: number,
    now: number,
    damage: number = this.config.damage,
    speed: number = this.config.speed
  ): Result<Projectile> {
    const remaining = this.getCooldownRemaining(ownerId, now);
    if (remaining > 0) {
      this.rejected++;
      return failureFrom(createCooldownActiveError(ownerId, remaining));
    }

    const projectile = this.pool.pop();
    if (!projectile) {
      this.rejected++;
      return failureFrom(createPoolExhaustedError(this.config.poolSize));
    }

    this.shotCounter++;
    projectile.id = `proj_${this.shotCounter}`;
    projectile.ownerId = ownerId;
    projectile.damage = damage;
    projectile.spawnTime = now;
    projectile.lifetime = this.config.lifetime;
    projectile.radius = this.config.radius;

    const body = projectile.body;
    body.teleport(origin);
    body.setHeading(angle);
    body.maxVelocity = speed;
    body.velocity = vec2Scale(vec2FromAngle(angle), speed);
    body.angularVelocity = 0;

    this.readyAt.set(ownerId, now + this.config.cooldown);
    this.active.set(projectile.id, projectile);
    this.fired++;

    logger.debug('Projectile fired', { id: projectile.id, ownerId, slot: projectile.slot });
    return success(projectile);
  }

  /**
   * Advance physics for every active projectile, then return expired ones
   * to the pool.
   *
   * @returns Ids of the projectiles that expired this call
   */
  update(dt: number, now: number): string[] {
    this.integrate(dt);
    return this.sweepExpired(now);
  }

  integrate(dt: number): void {
    this.active.forEach((projectile) => {
      projectile.body.update(dt);
    });
  }

  /**
   * Recycle every projectile with now - spawnTime > lifetime.
   */
  sweepExpired(now: number): string[] {
    const expiredIds: string[] = [];
    this.active.forEach((projectile, id) => {
      if (now - projectile.spawnTime > projectile.lifetime) {
        expiredIds.push(id);
      }
    });

    expiredIds.forEach((id) => this.recycle(id, 'expired'));
    return expiredIds;
  }

  /**
   * Move an active projectile back to the pool.
   */
  recycle(projectileId: string, reason: RecycleReason = 'despawn'): Result<Projectile> {
    const projectile = this.active.get(projectileId);
    if (!projectile) {
      return failureFrom(createUnknownEntityError('projectile', projectileId));
    }

    this.active.delete(projectileId);
    if (reason === 'impact') this.impacted++;
    if (reason === 'expired') this.expired++;

    projectile.id = '';
    projectile.ownerId = '';
    projectile.body.velocity = vec2Zero();
    this.pool.push(projectile);

    return success(projectile);
  }

  getProjectile(projectileId: string): Result<Projectile> {
    const projectile = this.active.get(projectileId);
    if (!projectile) {
      return failureFrom(createUnknownEntityError('projectile', projectileId));
    }
    return success(projectile);
  }

  /** Active projectiles in firing order */
  getActiveProjectiles(): Projectile[] {
    return Array.from(this.active.values());
  }

  isActive(projectileId: string): boolean {
    return this.active.has(projectileId);
  }

  /**
   * Drop an owner's cooldown record, e.g. when its ship is removed.
   */
  forgetOwner(ownerId: string): void {
    this.readyAt.delete(ownerId);
  }

  getStats(): ProjectileStats {
    return {
      capacity: this.capacity,
      active: this.activeCount,
      pooled: this.pooledCount,
      fired: this.fired,
      impacted: this.impacted,
      expired: this.expired,
      rejected: this.rejected,
      accuracy: this.fired > 0 ? (this.impacted / this.fired) * 100 : 0,
    };
  }

  /**
   * Return every active projectile to the pool and forget all cooldowns.
   */
  clear(): void {
    Array.from(this.active.keys()).forEach((id) => this.recycle(id, 'despawn'));
    this.readyAt.clear();
  }
}
