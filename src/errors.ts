export enum SimulationErrorCode {
  // Setup errors, fatal at construction
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',

  // Routine runtime outcomes, reported as Failure values
  RESOURCE_EXHAUSTED = 'RESOURCE_EXHAUSTED',
  UNKNOWN_ENTITY = 'UNKNOWN_ENTITY',

  // Internal errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class SimulationError extends Error {
  public readonly code: SimulationErrorCode;
  public readonly metadata?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    message: string,
    code: SimulationErrorCode,
    metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SimulationError';
    this.code = code;
    this.metadata = metadata;
    this.timestamp = Date.now();
    Object.setPrototypeOf(this, SimulationError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      metadata: this.metadata,
      timestamp: this.timestamp,
    };
  }
}

// Factory functions for common errors
export function createInvalidConfigurationError(problems: string[]): SimulationError {
  return new SimulationError(
    `Invalid configuration: ${problems.join('; ')}`,
    SimulationErrorCode.INVALID_CONFIGURATION,
    { problems }
  );
}

export function createPoolExhaustedError(capacity: number): SimulationError {
  return new SimulationError(
    'Projectile pool is empty',
    SimulationErrorCode.RESOURCE_EXHAUSTED,
    { capacity }
  );
}

export function createCooldownActiveError(ownerId: string, remaining: number): SimulationError {
  return new SimulationError(
    `Owner ${ownerId} is still on cooldown`,
    SimulationErrorCode.RESOURCE_EXHAUSTED,
    { ownerId, remaining }
  );
}

export function createUnknownEntityError(kind: string, id: string | number): SimulationError {
  return new SimulationError(
    `Unknown ${kind}: ${id}`,
    SimulationErrorCode.UNKNOWN_ENTITY,
    { kind, id }
  );
}
