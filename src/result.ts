/**
 * Tagged operation outcomes.
 *
 * Pool and lookup operations never throw for routine conditions (cooldown
 * active, pool empty, unknown id). They return a Failure the caller inspects
 * and skips on.
 */

import { SimulationError, SimulationErrorCode } from './errors';

export interface FailureReason {
  code: SimulationErrorCode;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  reason: FailureReason;
}

export type Result<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(
  code: SimulationErrorCode,
  message: string,
  metadata?: Record<string, unknown>
): Failure {
  return { ok: false, reason: { code, message, metadata } };
}

/** Convert a SimulationError into a Failure without throwing it. */
export function failureFrom(error: SimulationError): Failure {
  return failure(error.code, error.message, error.metadata);
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.ok;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.ok;
}

/**
 * Extract the value or throw the failure as a SimulationError.
 * Meant for hosts and tests where a failure is a programming error.
 */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new SimulationError(result.reason.message, result.reason.code, result.reason.metadata);
}
