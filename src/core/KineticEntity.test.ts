/**
 * KineticEntity Tests
 *
 * Thrust, wrap-around, drag and velocity clamping for the shared body.
 */

import { KineticEntity } from './KineticEntity';
import { KineticEntityOptions } from './types';

describe('KineticEntity', () => {
  const bounds = { width: 160, height: 144 };

  function createEntity(overrides: Partial<KineticEntityOptions> = {}): KineticEntity {
    return new KineticEntity({ bounds, ...overrides });
  }

  describe('constructor', () => {
    it('should wrap the initial position into bounds', () => {
      const entity = createEntity({ position: { x: 170, y: -4 } });

      expect(entity.position).toEqual({ x: 10, y: 140 });
    });

    it('should clamp the initial velocity to max velocity', () => {
      const entity = createEntity({ velocity: { x: 30, y: 40 }, maxVelocity: 10 });

      expect(entity.velocity).toEqual({ x: 6, y: 8 });
    });

    it('should wrap the initial heading into [0, 2π)', () => {
      const entity = createEntity({ heading: -Math.PI / 2 });

      expect(entity.heading).toBeCloseTo((3 * Math.PI) / 2);
    });

    it('should use default drag and mass', () => {
      const entity = createEntity();

      expect(entity.drag).toBe(0.01);
      expect(entity.mass).toBe(1);
      expect(entity.maxVelocity).toBe(Infinity);
    });
  });

  describe('applyThrust', () => {
    it('should accelerate along the heading', () => {
      const entity = createEntity({ thrustPower: 10 });

      entity.applyThrust(1, 0.5);

      expect(entity.velocity).toEqual({ x: 5, y: 0 });
    });

    it('should scale by magnitude', () => {
      const entity = createEntity({ thrustPower: 10, heading: Math.PI / 2 });

      entity.applyThrust(0.5, 1);

      expect(entity.velocity.x).toBeCloseTo(0);
      expect(entity.velocity.y).toBeCloseTo(5);
    });

    it('should never exceed max velocity', () => {
      const entity = createEntity({ thrustPower: 100, maxVelocity: 20 });

      for (let i = 0; i < 10; i++) {
        entity.applyThrust(1, 1);
      }

      expect(entity.speed).toBeCloseTo(20);
      expect(entity.speed).toBeLessThanOrEqual(20);
    });
  });

  describe('applyImpulse', () => {
    it('should divide the impulse by mass', () => {
      const entity = createEntity({ mass: 2 });

      entity.applyImpulse({ x: 4, y: -2 });

      expect(entity.velocity).toEqual({ x: 2, y: -1 });
    });
  });

  describe('update', () => {
    it('should wrap position across the right edge', () => {
      const entity = createEntity({ position: { x: 159.5, y: 50 }, velocity: { x: 30, y: 0 }, drag: 0 });

      entity.update(1);

      expect(entity.position.x).toBeCloseTo(29.5);
      expect(entity.position.y).toBe(50);
    });

    it('should wrap position across the top edge', () => {
      const entity = createEntity({ position: { x: 20, y: 2 }, velocity: { x: 0, y: -10 }, drag: 0 });

      entity.update(0.5);

      expect(entity.position).toEqual({ x: 20, y: 141 });
    });

    it('should apply drag once per call', () => {
      const entity = createEntity({ velocity: { x: 10, y: 0 }, drag: 0.1 });

      entity.update(1);

      expect(entity.velocity.x).toBeCloseTo(9);
    });

    it('should snap tiny velocities to zero', () => {
      const entity = createEntity({ velocity: { x: 0.005, y: 0 }, drag: 0 });

      entity.update(1);

      expect(entity.velocity).toEqual({ x: 0, y: 0 });
    });

    it('should turn by angular velocity', () => {
      const entity = createEntity({ angularVelocity: 1, drag: 0 });

      entity.update(0.5);

      expect(entity.heading).toBeCloseTo(0.5);
      expect(entity.angularVelocity).toBe(1);
    });

    it('should keep the body inside bounds over many steps', () => {
      const entity = createEntity({ position: { x: 80, y: 72 }, velocity: { x: -73, y: 91 }, drag: 0 });

      for (let i = 0; i < 500; i++) {
        entity.update(1 / 60);
        expect(entity.position.x).toBeGreaterThanOrEqual(0);
        expect(entity.position.x).toBeLessThan(160);
        expect(entity.position.y).toBeGreaterThanOrEqual(0);
        expect(entity.position.y).toBeLessThan(144);
      }
    });
  });

  describe('heading', () => {
    it('should wrap rotations', () => {
      const entity = createEntity();

      entity.rotate(-0.5);

      expect(entity.heading).toBeCloseTo(Math.PI * 2 - 0.5);
    });

    it('should point forward along the heading', () => {
      const entity = createEntity({ heading: Math.PI });

      expect(entity.forward().x).toBeCloseTo(-1);
      expect(entity.forward().y).toBeCloseTo(0);
    });
  });

  describe('teleport and snapshot', () => {
    it('should wrap teleport targets', () => {
      const entity = createEntity();

      entity.teleport({ x: -10, y: 150 });

      expect(entity.position).toEqual({ x: 150, y: 6 });
    });

    it('should return copies in the snapshot', () => {
      const entity = createEntity({ position: { x: 1, y: 2 }, velocity: { x: 3, y: 4 } });

      const snapshot = entity.snapshot();
      snapshot.position.x = 99;

      expect(entity.position.x).toBe(1);
      expect(snapshot.speed).toBe(5);
    });
  });
});
