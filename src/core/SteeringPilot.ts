/**
 * SteeringPilot - seek + avoid steering for autonomous ships
 *
 * Reynolds-style steering on top of KineticEntity:
 * - Seek: unit vector toward the current waypoint
 * - Avoid: repulsion from threats inside the danger radius, stronger when closer
 * - Wander: a fresh waypoint once the current one is reached
 *
 * computeSteering() is the control law and only touches pilot state
 * (waypoint, telemetry). applyToShip() turns a steering vector into heading
 * and thrust changes on a body. The two are kept apart so the law can be
 * tested without integrating physics.
 */

import type { Bounds, PilotTelemetry, Threat, Vector2 } from './types';
import { KineticEntity } from './KineticEntity';
import { SeededRandom } from './random';
import {
  angleDelta,
  toroidalDelta,
  vec2Add,
  vec2Angle,
  vec2ClampLength,
  vec2Clone,
  vec2Length,
  vec2LengthSq,
  vec2Normalize,
  vec2Scale,
  vec2Zero,
} from './vector';
import { assertValid, DEFAULT_STEERING_CONFIG, SteeringConfig, validateSteeringConfig } from '../config';
import { MIN_SURFACE_DISTANCE } from '../constants';

interface AvoidResult {
  force: Vector2;
  nearest: number;
  dodging: boolean;
}

function createTelemetry(): PilotTelemetry {
  return {
    ticksSurvived: 0,
    avoidanceManeuvers: 0,
    closestThreatDistance: Infinity,
    waypointsReached: 0,
    collisions: 0,
    totalSteeringMagnitude: 0,
  };
}

/**
 * Rotate a ship toward the steering direction and thrust along its heading.
 *
 * The heading moves by at most turnRate · dt per call. A zero steering
 * vector leaves the ship untouched, so it coasts.
 */
export function applySteering(steering: Vector2, ship: KineticEntity, dt: number, turnRate: number): void {
  if (steering.x === 0 && steering.y === 0) {
    return;
  }

  const desired = vec2Angle(steering);
  const diff = angleDelta(ship.heading, desired);
  const maxTurn = turnRate * dt;

  if (Math.abs(diff) <= maxTurn) {
    ship.setHeading(desired);
  } else {
    ship.rotate(diff > 0 ? maxTurn : -maxTurn);
  }

  ship.applyThrust(Math.min(1, vec2Length(steering)), dt);
}

export class SteeringPilot {
  private readonly config: SteeringConfig;
  private readonly rng: SeededRandom;
  private waypoint: Vector2 | null = null;
  private maneuverCooldown = 0;
  private telemetry: PilotTelemetry = createTelemetry();

  /**
   * @param rng - Generator used for waypoint candidates
   * @param config - Weights, radii and turn rate
   */
  constructor(rng: SeededRandom, config: Partial<SteeringConfig> = {}) {
    this.rng = rng;
    this.config = { ...DEFAULT_STEERING_CONFIG, ...config };
    assertValid(validateSteeringConfig(this.config));
  }

  /**
   * Blend seek and avoid into one steering vector for this tick.
   *
   * @param ship - Body being flown; read only
   * @param threats - Positions frozen at the end of the previous tick
   * @param bounds - World bounds, used for shortest-path vectors
   * @returns Steering vector, at most maxSteerForce long
   */
  computeSteering(ship: KineticEntity, threats: readonly Threat[], bounds: Bounds): Vector2 {
    if (this.maneuverCooldown > 0) {
      this.maneuverCooldown--;
    }

    let waypoint = this.waypoint ?? this.selectWaypoint(threats, bounds);
    let toWaypoint = toroidalDelta(ship.position, waypoint, bounds);
    if (vec2Length(toWaypoint) <= this.config.arrivalTolerance) {
      this.telemetry.waypointsReached++;
      waypoint = this.selectWaypoint(threats, bounds);
      toWaypoint = toroidalDelta(ship.position, waypoint, bounds);
    }
    this.waypoint = waypoint;

    const seek = vec2Scale(vec2Normalize(toWaypoint), this.config.seekWeight);
    const avoid = this.avoid(ship, threats, bounds);

    if (avoid.nearest < this.telemetry.closestThreatDistance) {
      this.telemetry.closestThreatDistance = avoid.nearest;
    }

    // Count a maneuver at most once per cooldown window
    if (avoid.dodging && this.maneuverCooldown === 0) {
      this.telemetry.avoidanceManeuvers++;
      this.maneuverCooldown = this.config.maneuverCooldownTicks;
    }

    const steering = vec2ClampLength(vec2Add(seek, avoid.force), this.config.maxSteerForce);

    this.telemetry.ticksSurvived++;
    this.telemetry.totalSteeringMagnitude += vec2Length(steering);

    return steering;
  }

  /**
   * Apply a steering vector with this pilot's turn rate.
   */
  applyToShip(steering: Vector2, ship: KineticEntity, dt: number): void {
    applySteering(steering, ship, dt, this.config.turnRate);
  }

  getWaypoint(): Vector2 | null {
    return this.waypoint ? vec2Clone(this.waypoint) : null;
  }

  setWaypoint(point: Vector2): void {
    this.waypoint = vec2Clone(point);
  }

  recordCollision(): void {
    this.telemetry.collisions++;
  }

  getTelemetry(): PilotTelemetry {
    return { ...this.telemetry };
  }

  /**
   * Summary of a survival run for logs and dashboards.
   */
  toJSON() {
    const { ticksSurvived, totalSteeringMagnitude, closestThreatDistance } = this.telemetry;
    return {
      ticksSurvived,
      avoidanceManeuvers: this.telemetry.avoidanceManeuvers,
      closestThreatDistance: Number.isFinite(closestThreatDistance)
        ? Math.round(closestThreatDistance * 100) / 100
        : null,
      waypointsReached: this.telemetry.waypointsReached,
      collisions: this.telemetry.collisions,
      averageSteering: Math.round((totalSteeringMagnitude / Math.max(ticksSurvived, 1)) * 1000) / 1000,
    };
  }

  reset(): void {
    this.waypoint = null;
    this.maneuverCooldown = 0;
    this.telemetry = createTelemetry();
  }

  /**
   * Repulsion from every threat whose surface is within the danger radius.
   * Strength is dangerRadius / distance, so a threat on the rim pushes with
   * one unit before weighting.
   */
  private avoid(ship: KineticEntity, threats: readonly Threat[], bounds: Bounds): AvoidResult {
    let force = vec2Zero();
    let nearest = Infinity;
    let dodging = false;
    const { dangerRadius, avoidWeight } = this.config;

    for (const threat of threats) {
      const away = toroidalDelta(threat.position, ship.position, bounds);
      const surface = Math.max(vec2Length(away) - threat.radius, MIN_SURFACE_DISTANCE);

      if (surface < nearest) {
        nearest = surface;
      }
      if (surface > dangerRadius) {
        continue;
      }

      // Centres coincide: back away along the reverse heading
      const direction = vec2LengthSq(away) > 0 ? vec2Normalize(away) : vec2Scale(ship.forward(), -1);
      force = vec2Add(force, vec2Scale(direction, (dangerRadius / surface) * avoidWeight));
      dodging = true;
    }

    return { force, nearest, dodging };
  }

  /**
   * Best of N random candidates inside the waypoint margin, scored by the
   * toroidal distance to the nearest threat.
   */
  private selectWaypoint(threats: readonly Threat[], bounds: Bounds): Vector2 {
    const margin = Math.min(this.config.waypointMargin, bounds.width / 2, bounds.height / 2);
    let best: Vector2 | null = null;
    let bestClearance = -1;

    for (let i = 0; i < this.config.waypointCandidates; i++) {
      const candidate = {
        x: this.rng.range(margin, bounds.width - margin),
        y: this.rng.range(margin, bounds.height - margin),
      };

      let clearance = Infinity;
      for (const threat of threats) {
        const distance = vec2Length(toroidalDelta(candidate, threat.position, bounds));
        if (distance < clearance) clearance = distance;
      }

      if (clearance > bestClearance) {
        bestClearance = clearance;
        best = candidate;
      }
    }

    return best ?? { x: bounds.width / 2, y: bounds.height / 2 };
  }
}
