/**
 * 2D vector helpers. All functions are pure and return new objects.
 */

import { TWO_PI } from '../constants';
import type { Bounds, Vector2 } from './types';

export function vec2(x: number, y: number): Vector2 {
  return { x, y };
}

export function vec2Zero(): Vector2 {
  return { x: 0, y: 0 };
}

export function vec2Clone(v: Vector2): Vector2 {
  return { x: v.x, y: v.y };
}

export function vec2Add(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2Sub(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Scale(v: Vector2, s: number): Vector2 {
  return { x: v.x * s, y: v.y * s };
}

export function vec2LengthSq(v: Vector2): number {
  return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vector2): number {
  return Math.sqrt(vec2LengthSq(v));
}

export function vec2Normalize(v: Vector2): Vector2 {
  const len = vec2Length(v);
  if (len === 0) return vec2Zero();
  return { x: v.x / len, y: v.y / len };
}

/** Scale down to maxLength if longer; shorter vectors pass through. */
export function vec2ClampLength(v: Vector2, maxLength: number): Vector2 {
  const lenSq = vec2LengthSq(v);
  if (lenSq <= maxLength * maxLength) return vec2Clone(v);
  return vec2Scale(v, maxLength / Math.sqrt(lenSq));
}

/** Unit vector pointing along angle (radians, +x = 0, +y = π/2) */
export function vec2FromAngle(angle: number): Vector2 {
  return { x: Math.cos(angle), y: Math.sin(angle) };
}

export function vec2Angle(v: Vector2): number {
  return Math.atan2(v.y, v.x);
}

export function vec2Distance(a: Vector2, b: Vector2): number {
  return vec2Length(vec2Sub(b, a));
}

/**
 * Wrap a scalar into [0, size). Guards against the float case where
 * ((v % size) + size) % size rounds up to exactly size.
 */
export function wrapScalar(value: number, size: number): number {
  const wrapped = ((value % size) + size) % size;
  return wrapped >= size ? 0 : wrapped;
}

export function wrapAngle(angle: number): number {
  return wrapScalar(angle, TWO_PI);
}

/** Signed angular difference in [-π, π) from `from` to `to`. */
export function angleDelta(from: number, to: number): number {
  return wrapScalar(to - from + Math.PI, TWO_PI) - Math.PI;
}

/**
 * Shortest displacement from `from` to `to` on the torus.
 * Without bounds this is the plain difference.
 */
export function toroidalDelta(from: Vector2, to: Vector2, bounds?: Bounds): Vector2 {
  let dx = to.x - from.x;
  let dy = to.y - from.y;
  if (!bounds) return { x: dx, y: dy };

  const halfW = bounds.width / 2;
  const halfH = bounds.height / 2;
  if (dx > halfW) dx -= bounds.width;
  else if (dx < -halfW) dx += bounds.width;
  if (dy > halfH) dy -= bounds.height;
  else if (dy < -halfH) dy += bounds.height;

  return { x: dx, y: dy };
}

export function toroidalDistance(a: Vector2, b: Vector2, bounds?: Bounds): number {
  return vec2Length(toroidalDelta(a, b, bounds));
}
