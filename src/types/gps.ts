/** A single location fix from the device */
export interface LocationSample {
  latitude: number;
  longitude: number;
  altitude: number | null;
  horizontalAccuracy: number; // meters
  speed: number | null;       // m/s from device, may be null
  course: number | null;      // degrees from true north, may be null
  timestamp: number;          // epoch ms
}

/** A retained point of the workout route */
export interface RoutePoint {
  latitude: number;
  longitude: number;
}

/** Why the sample filter turned a fix down */
export type RejectReason = 'accuracy' | 'jitter' | 'route-spacing' | 'route-speed';

/** Outcome of running a fix through the sample filter */
export interface SampleDecision {
  accepted: boolean;
  appendToRoute: boolean;
  reason: RejectReason | null;
}

/** Tunable limits for the sample filter and distance accumulator */
export interface FilterThresholds {
  maxAccuracy: number;        // reject fixes less accurate than this (m)
  minSpacing: number;         // reject fixes closer than this to the previous one (m)
  minRouteSpacing: number;    // route points must be at least this far apart (m)
  minRouteSpeed: number;      // m/s
  maxRouteSpeed: number;      // m/s
  maxIncrement: number;       // distance increments at or above this are glitches (m)
}
