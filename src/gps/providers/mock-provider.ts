import type { LocationSample } from '@/types';
import type { GpsProvider, LocationCallback, LocationErrorCallback } from './types';

/**
 * Mock location provider for unit tests.
 * Lets you push fixes programmatically.
 */
export class MockGpsProvider implements GpsProvider {
  private onSampleCb: LocationCallback | null = null;
  private onErrorCb: LocationErrorCallback | null = null;
  private _watching = false;

  permissionGranted = true;

  async requestPermissions(): Promise<boolean> {
    return this.permissionGranted;
  }

  startWatching(onSample: LocationCallback, onError: LocationErrorCallback): void {
    this.onSampleCb = onSample;
    this.onErrorCb = onError;
    this._watching = true;
  }

  stopWatching(): void {
    this.onSampleCb = null;
    this.onErrorCb = null;
    this._watching = false;
  }

  get isWatching(): boolean {
    return this._watching;
  }

  /** Simulate receiving a fix */
  pushSample(sample: LocationSample): void {
    if (this.onSampleCb) {
      this.onSampleCb(sample);
    }
  }

  /** Simulate a location error */
  pushError(error: Error): void {
    if (this.onErrorCb) {
      this.onErrorCb(error);
    }
  }
}
