/**
 * SteeringPilot Tests
 *
 * Seek/avoid blending, waypoint handling, telemetry and steering application.
 */

import { applySteering, SteeringPilot } from './SteeringPilot';
import { KineticEntity } from './KineticEntity';
import { SeededRandom } from './random';
import { Threat, Vector2 } from './types';
import { vec2Length } from './vector';
import { SteeringConfig } from '../config';
import { SimulationError } from '../errors';

describe('SteeringPilot', () => {
  const bounds = { width: 160, height: 144 };

  function createShip(position: Vector2, heading = 0): KineticEntity {
    return new KineticEntity({ bounds, position, heading, thrustPower: 60, drag: 0 });
  }

  function createPilot(overrides: Partial<SteeringConfig> = {}, seed = 1): SteeringPilot {
    return new SteeringPilot(new SeededRandom(seed), overrides);
  }

  describe('computeSteering', () => {
    it('should seek the waypoint when no threat is near', () => {
      const pilot = createPilot({ avoidWeight: 0 });
      pilot.setWaypoint({ x: 100, y: 72 });

      const steering = pilot.computeSteering(createShip({ x: 80, y: 72 }), [], bounds);

      expect(steering).toEqual({ x: 0.8, y: 0 });
    });

    it('should let a close threat dominate the seek', () => {
      const pilot = createPilot({ seekWeight: 1, avoidWeight: 10, dangerRadius: 25 });
      pilot.setWaypoint({ x: 100, y: 72 });
      const threats: Threat[] = [{ position: { x: 60, y: 72 }, radius: 0 }];

      const steering = pilot.computeSteering(createShip({ x: 50, y: 72 }), threats, bounds);

      expect(steering).toEqual({ x: -24, y: 0 });
    });

    it('should ignore threats beyond the danger radius', () => {
      const pilot = createPilot({ seekWeight: 1 });
      pilot.setWaypoint({ x: 100, y: 72 });
      const threats: Threat[] = [{ position: { x: 50, y: 112 }, radius: 5 }];

      const steering = pilot.computeSteering(createShip({ x: 50, y: 72 }), threats, bounds);

      expect(steering).toEqual({ x: 1, y: 0 });
      expect(pilot.getTelemetry().avoidanceManeuvers).toBe(0);
      expect(pilot.getTelemetry().closestThreatDistance).toBe(35);
    });

    it('should clamp steering to the max steer force', () => {
      const pilot = createPilot({ maxSteerForce: 80 });
      pilot.setWaypoint({ x: 100, y: 72 });
      const threats: Threat[] = [{ position: { x: 50.05, y: 72 }, radius: 0 }];

      const steering = pilot.computeSteering(createShip({ x: 50, y: 72 }), threats, bounds);

      expect(vec2Length(steering)).toBeCloseTo(80);
      expect(steering.x).toBeLessThan(0);
    });

    it('should back away from a threat at the same position', () => {
      const pilot = createPilot({ seekWeight: 0 });
      pilot.setWaypoint({ x: 100, y: 72 });
      const threats: Threat[] = [{ position: { x: 50, y: 72 }, radius: 2 }];

      const steering = pilot.computeSteering(createShip({ x: 50, y: 72 }, 0), threats, bounds);

      expect(steering.x).toBeLessThan(0);
      expect(steering.y).toBeCloseTo(0);
    });

    it('should seek across the wrapped edge', () => {
      const pilot = createPilot();
      pilot.setWaypoint({ x: 5, y: 72 });

      const steering = pilot.computeSteering(createShip({ x: 155, y: 72 }), [], bounds);

      expect(steering).toEqual({ x: 0.8, y: 0 });
    });

    it('should count one maneuver per cooldown window', () => {
      const pilot = createPilot({ maneuverCooldownTicks: 15 });
      pilot.setWaypoint({ x: 100, y: 72 });
      const ship = createShip({ x: 50, y: 72 });
      const threats: Threat[] = [{ position: { x: 60, y: 72 }, radius: 2 }];

      for (let tick = 0; tick < 30; tick++) {
        pilot.computeSteering(ship, threats, bounds);
      }

      expect(pilot.getTelemetry().avoidanceManeuvers).toBe(2);
      expect(pilot.getTelemetry().ticksSurvived).toBe(30);
    });

    it('should pick a new waypoint on arrival', () => {
      const pilot = createPilot();
      pilot.setWaypoint({ x: 84, y: 72 });

      pilot.computeSteering(createShip({ x: 80, y: 72 }), [], bounds);

      const waypoint = pilot.getWaypoint();
      expect(pilot.getTelemetry().waypointsReached).toBe(1);
      expect(waypoint).not.toBeNull();
      if (waypoint) {
        expect(waypoint.x).toBeGreaterThanOrEqual(20);
        expect(waypoint.x).toBeLessThan(140);
        expect(waypoint.y).toBeGreaterThanOrEqual(20);
        expect(waypoint.y).toBeLessThan(124);
      }
    });

    it('should choose the same waypoint for the same seed', () => {
      const a = createPilot({}, 42);
      const b = createPilot({}, 42);
      const threats: Threat[] = [{ position: { x: 30, y: 30 }, radius: 8 }];

      a.computeSteering(createShip({ x: 80, y: 72 }), threats, bounds);
      b.computeSteering(createShip({ x: 80, y: 72 }), threats, bounds);

      expect(a.getWaypoint()).toEqual(b.getWaypoint());
    });
  });

  describe('telemetry', () => {
    it('should summarise a run', () => {
      const pilot = createPilot();
      pilot.setWaypoint({ x: 100, y: 72 });

      pilot.computeSteering(createShip({ x: 80, y: 72 }), [], bounds);
      pilot.recordCollision();

      expect(pilot.toJSON()).toEqual({
        ticksSurvived: 1,
        avoidanceManeuvers: 0,
        closestThreatDistance: null,
        waypointsReached: 0,
        collisions: 1,
        averageSteering: 0.8,
      });
    });

    it('should clear state on reset', () => {
      const pilot = createPilot();
      pilot.setWaypoint({ x: 100, y: 72 });
      pilot.computeSteering(createShip({ x: 80, y: 72 }), [], bounds);

      pilot.reset();

      expect(pilot.getWaypoint()).toBeNull();
      expect(pilot.getTelemetry().ticksSurvived).toBe(0);
    });
  });

  describe('configuration', () => {
    it('should reject a non-positive danger radius', () => {
      const consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();

      expect(() => createPilot({ dangerRadius: 0 })).toThrow(SimulationError);

      consoleErrorSpy.mockRestore();
    });
  });
});

describe('applySteering', () => {
  const bounds = { width: 160, height: 144 };

  function createShip(heading = 0): KineticEntity {
    return new KineticEntity({ bounds, position: { x: 80, y: 72 }, heading, thrustPower: 60, drag: 0 });
  }

  it('should leave the ship untouched for zero steering', () => {
    const ship = createShip(1);
    const heading = ship.heading;

    applySteering({ x: 0, y: 0 }, ship, 0.1, 6);

    expect(ship.heading).toBe(heading);
    expect(ship.velocity).toEqual({ x: 0, y: 0 });
  });

  it('should turn at most turnRate * dt per call', () => {
    const ship = createShip(0);

    applySteering({ x: 0, y: 1 }, ship, 0.1, 6);

    expect(ship.heading).toBeCloseTo(0.6);
    expect(ship.velocity.x).toBeCloseTo(6 * Math.cos(0.6));
    expect(ship.velocity.y).toBeCloseTo(6 * Math.sin(0.6));
  });

  it('should snap to the desired heading when within the turn limit', () => {
    const ship = createShip(0);

    applySteering({ x: 1, y: 0.1 }, ship, 0.1, 6);

    expect(ship.heading).toBeCloseTo(Math.atan2(0.1, 1));
  });

  it('should turn the short way round', () => {
    const ship = createShip(0.1);

    applySteering({ x: 0, y: -1 }, ship, 0.1, 6);

    expect(ship.heading).toBeCloseTo(Math.PI * 2 - 0.5);
  });

  it('should scale thrust by steering magnitude up to one', () => {
    const ship = createShip(0);

    applySteering({ x: 0.5, y: 0 }, ship, 0.1, 6);

    expect(ship.velocity.x).toBeCloseTo(3);
    expect(ship.velocity.y).toBeCloseTo(0);
  });
});
