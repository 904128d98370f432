import type { Bounds, KineticEntityOptions, KineticSnapshot, Vector2 } from './types';
import {
  vec2Clone,
  vec2ClampLength,
  vec2FromAngle,
  vec2Length,
  vec2Zero,
  wrapAngle,
  wrapScalar,
} from './vector';
import { DEFAULT_DRAG, DEFAULT_MASS, VELOCITY_EPSILON } from '../constants';

/**
 * KineticEntity is the rigid-body state shared by ships, projectiles and
 * asteroids.
 *
 * Responsibilities:
 * - Thrust along the heading, clamped to max velocity
 * - Heading changes wrapped into [0, 2π)
 * - Position integration with toroidal wrap on both axes
 * - Per-call drag and epsilon snapping so bodies come to rest
 *
 * Invariants after construction and after every update():
 * - 0 <= position.x < bounds.width and 0 <= position.y < bounds.height
 * - speed <= maxVelocity
 */
export class KineticEntity {
  position: Vector2;
  velocity: Vector2;
  angularVelocity: number;
  mass: number;
  thrustPower: number;
  drag: number;
  maxVelocity: number;
  readonly bounds: Bounds;
  private headingValue: number;

  constructor(options: KineticEntityOptions) {
    this.bounds = { width: options.bounds.width, height: options.bounds.height };
    this.position = this.wrapPosition(options.position ?? vec2Zero());
    this.velocity = options.velocity ? vec2Clone(options.velocity) : vec2Zero();
    this.headingValue = wrapAngle(options.heading ?? 0);
    this.angularVelocity = options.angularVelocity ?? 0;
    this.mass = options.mass ?? DEFAULT_MASS;
    this.thrustPower = options.thrustPower ?? 0;
    this.drag = options.drag ?? DEFAULT_DRAG;
    this.maxVelocity = options.maxVelocity ?? Infinity;
    this.clampVelocity();
  }

  get heading(): number {
    return this.headingValue;
  }

  get speed(): number {
    return vec2Length(this.velocity);
  }

  /** Unit vector along the current heading */
  forward(): Vector2 {
    return vec2FromAngle(this.headingValue);
  }

  setHeading(angle: number): void {
    this.headingValue = wrapAngle(angle);
  }

  rotate(delta: number): void {
    this.headingValue = wrapAngle(this.headingValue + delta);
  }

  /**
   * Accelerate along the heading by magnitude · thrustPower · dt.
   */
  applyThrust(magnitude: number, dt: number): void {
    const accel = magnitude * this.thrustPower * dt;
    const dir = this.forward();
    this.velocity.x += dir.x * accel;
    this.velocity.y += dir.y * accel;
    this.clampVelocity();
  }

  /**
   * Instantaneous change of momentum: Δv = impulse / mass.
   */
  applyImpulse(impulse: Vector2): void {
    this.velocity.x += impulse.x / this.mass;
    this.velocity.y += impulse.y / this.mass;
    this.clampVelocity();
  }

  /**
   * Advance the body by dt seconds.
   *
   * Drag is applied once per call, not scaled by dt, so a body at 30 Hz
   * slows half as fast per second as one at 60 Hz.
   */
  update(dt: number): void {
    this.position = this.wrapPosition({
      x: this.position.x + this.velocity.x * dt,
      y: this.position.y + this.velocity.y * dt,
    });

    if (this.angularVelocity !== 0) {
      this.headingValue = wrapAngle(this.headingValue + this.angularVelocity * dt);
    }

    const retain = 1 - this.drag;
    this.velocity.x *= retain;
    this.velocity.y *= retain;
    this.angularVelocity *= retain;

    this.clampVelocity();

    if (vec2Length(this.velocity) < VELOCITY_EPSILON) {
      this.velocity = vec2Zero();
    }
    if (Math.abs(this.angularVelocity) < VELOCITY_EPSILON) {
      this.angularVelocity = 0;
    }
  }

  /**
   * Place the body at a new position, wrapped into bounds.
   */
  teleport(position: Vector2): void {
    this.position = this.wrapPosition(position);
  }

  snapshot(): KineticSnapshot {
    return {
      position: vec2Clone(this.position),
      velocity: vec2Clone(this.velocity),
      heading: this.headingValue,
      angularVelocity: this.angularVelocity,
      speed: this.speed,
    };
  }

  private clampVelocity(): void {
    this.velocity = vec2ClampLength(this.velocity, this.maxVelocity);
  }

  private wrapPosition(position: Vector2): Vector2 {
    return {
      x: wrapScalar(position.x, this.bounds.width),
      y: wrapScalar(position.y, this.bounds.height),
    };
  }
}
