/**
 * Ports Barrel Export
 *
 * All port interfaces are exported from here.
 * Handlers depend on these interfaces, adapters implement them.
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock, createFixedClock, isoTimestamp } from './clockPort.js';
export type { StorageTransportPort } from './storage-transport-port.js';
