import type { LocationSample } from '@/types';

/** Callback invoked on each new location fix */
export type LocationCallback = (sample: LocationSample) => void;

/** Callback invoked when the location source fails */
export type LocationErrorCallback = (error: Error) => void;

/** Abstract location source */
export interface GpsProvider {
  /** Request location permissions. Returns true if granted. */
  requestPermissions(): Promise<boolean>;

  /** Start watching for fixes. Calls onSample for each one. */
  startWatching(onSample: LocationCallback, onError: LocationErrorCallback): void;

  /** Stop watching for fixes. */
  stopWatching(): void;
}
