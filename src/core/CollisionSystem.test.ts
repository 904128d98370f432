/**
 * CollisionSystem Tests
 *
 * Circle overlap, wrapped distances and hit pairing.
 */

import { CollisionSystem } from './CollisionSystem';
import { KineticEntity } from './KineticEntity';
import { AsteroidFragment, Projectile, Ship, Vector2 } from './types';

describe('CollisionSystem', () => {
  const bounds = { width: 160, height: 144 };
  let collisions: CollisionSystem;

  function createShip(id: string, position: Vector2, radius = 3): Ship {
    return { id, body: new KineticEntity({ bounds, position }), radius, autonomous: false };
  }

  function createAsteroid(position: Vector2, radius = 4): AsteroidFragment {
    return { body: new KineticEntity({ bounds, position }), tier: 2, health: 2, radius, points: 50 };
  }

  function createProjectile(id: string, position: Vector2): Projectile {
    return {
      id,
      slot: 0,
      body: new KineticEntity({ bounds, position, drag: 0 }),
      ownerId: 'ship_1',
      damage: 1,
      spawnTime: 0,
      lifetime: 1.5,
      radius: 1,
    };
  }

  beforeEach(() => {
    collisions = new CollisionSystem(bounds);
  });

  describe('checkCollision', () => {
    it('should detect overlapping circles', () => {
      expect(collisions.checkCollision(
        { position: { x: 10, y: 10 }, radius: 3 },
        { position: { x: 14, y: 10 }, radius: 2 }
      )).toBe(true);
    });

    it('should count touching circles as a collision', () => {
      expect(collisions.checkCollision(
        { position: { x: 10, y: 10 }, radius: 3 },
        { position: { x: 15, y: 10 }, radius: 2 }
      )).toBe(true);
    });

    it('should not detect separated circles', () => {
      expect(collisions.checkCollision(
        { position: { x: 10, y: 10 }, radius: 3 },
        { position: { x: 15.1, y: 10 }, radius: 2 }
      )).toBe(false);
    });

    it('should detect overlap across the wrapped edge', () => {
      expect(collisions.checkCollision(
        { position: { x: 1, y: 72 }, radius: 2 },
        { position: { x: 158, y: 72 }, radius: 2 }
      )).toBe(true);
    });

    it('should use plain distance without bounds', () => {
      const flat = new CollisionSystem();

      expect(flat.checkCollision(
        { position: { x: 1, y: 72 }, radius: 2 },
        { position: { x: 158, y: 72 }, radius: 2 }
      )).toBe(false);
    });
  });

  describe('detectShipHits', () => {
    it('should report every overlapping ship and asteroid pair', () => {
      const ships = [createShip('a', { x: 20, y: 20 }), createShip('b', { x: 100, y: 100 })];
      const asteroids = new Map<string, AsteroidFragment>([
        ['asteroid_1', createAsteroid({ x: 24, y: 20 })],
        ['asteroid_2', createAsteroid({ x: 20, y: 25 })],
        ['asteroid_3', createAsteroid({ x: 60, y: 60 })],
      ]);

      expect(collisions.detectShipHits(ships, asteroids)).toEqual([
        { shipId: 'a', asteroidId: 'asteroid_1' },
        { shipId: 'a', asteroidId: 'asteroid_2' },
      ]);
    });

    it('should return nothing for an empty field', () => {
      expect(collisions.detectShipHits([createShip('a', { x: 20, y: 20 })], new Map())).toEqual([]);
    });
  });

  describe('detectProjectileHits', () => {
    it('should pair a projectile with the first asteroid it overlaps', () => {
      const projectiles = [createProjectile('proj_1', { x: 50, y: 50 })];
      const asteroids = new Map<string, AsteroidFragment>([
        ['asteroid_1', createAsteroid({ x: 53, y: 50 })],
        ['asteroid_2', createAsteroid({ x: 47, y: 50 })],
      ]);

      expect(collisions.detectProjectileHits(projectiles, asteroids)).toEqual([
        { projectileId: 'proj_1', asteroidId: 'asteroid_1' },
      ]);
    });

    it('should not let two projectiles claim the same asteroid', () => {
      const projectiles = [
        createProjectile('proj_1', { x: 50, y: 50 }),
        createProjectile('proj_2', { x: 51, y: 50 }),
      ];
      const asteroids = new Map<string, AsteroidFragment>([
        ['asteroid_1', createAsteroid({ x: 53, y: 50 })],
      ]);

      expect(collisions.detectProjectileHits(projectiles, asteroids)).toEqual([
        { projectileId: 'proj_1', asteroidId: 'asteroid_1' },
      ]);
    });

    it('should let a second projectile hit a different asteroid', () => {
      const projectiles = [
        createProjectile('proj_1', { x: 50, y: 50 }),
        createProjectile('proj_2', { x: 51, y: 50 }),
      ];
      const asteroids = new Map<string, AsteroidFragment>([
        ['asteroid_1', createAsteroid({ x: 53, y: 50 })],
        ['asteroid_2', createAsteroid({ x: 48, y: 50 })],
      ]);

      expect(collisions.detectProjectileHits(projectiles, asteroids)).toEqual([
        { projectileId: 'proj_1', asteroidId: 'asteroid_1' },
        { projectileId: 'proj_2', asteroidId: 'asteroid_2' },
      ]);
    });

    it('should ignore projectiles that miss', () => {
      const projectiles = [createProjectile('proj_1', { x: 10, y: 10 })];
      const asteroids = new Map<string, AsteroidFragment>([['asteroid_1', createAsteroid({ x: 80, y: 80 })]]);

      expect(collisions.detectProjectileHits(projectiles, asteroids)).toEqual([]);
    });
  });
});
