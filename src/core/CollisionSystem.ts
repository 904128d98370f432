import type {
  AsteroidFragment,
  Bounds,
  Circle,
  Projectile,
  ProjectileHit,
  Ship,
  ShipHit,
} from './types';
import { toroidalDelta, vec2LengthSq } from './vector';

/**
 * CollisionSystem runs the broad-phase: circle-circle overlap tests between
 * ships, projectiles and asteroids.
 *
 * Responsibilities:
 * - Test a single pair of circles
 * - Report every ship/asteroid overlap
 * - Pair each projectile with at most one asteroid per tick
 *
 * Detection only. What a hit means (fracture, recycling, lives) is decided by
 * the caller. Pairs come out in the iteration order of the inputs, so a replay
 * with the same inputs resolves identically.
 */
export class CollisionSystem {
  private readonly bounds?: Bounds;

  /**
   * @param bounds - When given, distances follow the shortest path across wrapped edges
   */
  constructor(bounds?: Bounds) {
    this.bounds = bounds ? { width: bounds.width, height: bounds.height } : undefined;
  }

  /**
   * Check if two circles touch or overlap.
   *
   * Collision when distance between centres <= sum of radii.
   */
  checkCollision(a: Circle, b: Circle): boolean {
    const delta = toroidalDelta(a.position, b.position, this.bounds);
    const reach = a.radius + b.radius;
    return vec2LengthSq(delta) <= reach * reach;
  }

  /**
   * Every (ship, asteroid) pair that overlaps.
   */
  detectShipHits(
    ships: Iterable<Ship>,
    asteroids: ReadonlyMap<string, AsteroidFragment>
  ): ShipHit[] {
    const hits: ShipHit[] = [];

    for (const ship of ships) {
      const shipCircle = { position: ship.body.position, radius: ship.radius };
      asteroids.forEach((asteroid, asteroidId) => {
        if (this.checkCollision(shipCircle, { position: asteroid.body.position, radius: asteroid.radius })) {
          hits.push({ shipId: ship.id, asteroidId });
        }
      });
    }

    return hits;
  }

  /**
   * Pair projectiles with the asteroids they struck.
   *
   * A projectile is consumed by the first asteroid it overlaps, and an
   * asteroid already claimed this tick is skipped by later projectiles.
   */
  detectProjectileHits(
    projectiles: Iterable<Projectile>,
    asteroids: ReadonlyMap<string, AsteroidFragment>
  ): ProjectileHit[] {
    const hits: ProjectileHit[] = [];
    const claimed = new Set<string>();

    for (const projectile of projectiles) {
      const projectileCircle = { position: projectile.body.position, radius: projectile.radius };

      for (const [asteroidId, asteroid] of asteroids) {
        if (claimed.has(asteroidId)) continue;
        if (this.checkCollision(projectileCircle, { position: asteroid.body.position, radius: asteroid.radius })) {
          hits.push({ projectileId: projectile.id, asteroidId });
          claimed.add(asteroidId);
          break;
        }
      }
    }

    return hits;
  }
}
