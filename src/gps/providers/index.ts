export type { GpsProvider, LocationCallback, LocationErrorCallback } from './types';
export { MockGpsProvider } from './mock-provider';
export { SimulatedGpsProvider } from './simulated-provider';

import type { SimulationConfig } from '@/config';
import type { GpsProvider } from './types';
import { SimulatedGpsProvider } from './simulated-provider';

/**
 * Factory: the simulated loop is the only location source available
 * outside a device shell.
 */
export function createGpsProvider(simulation: SimulationConfig): GpsProvider {
  return new SimulatedGpsProvider(simulation);
}
