/**
 * Simulation Core Module
 *
 * Deterministic, host-independent simulation systems. A host loop drives
 * SimulationEngine.tick() and reads frames back through callbacks.
 */

// Types
export * from './types';

// Math
export * from './vector';
export { SeededRandom } from './random';

// Systems
export { KineticEntity } from './KineticEntity';
export { ProjectileSystem } from './ProjectileSystem';
export { FractureSystem } from './FractureSystem';
export { CollisionSystem } from './CollisionSystem';
export { SteeringPilot, applySteering } from './SteeringPilot';

// Main Engine
export { SimulationEngine, type SpawnShipOptions } from './SimulationEngine';
