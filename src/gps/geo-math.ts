import type { LocationSample, RoutePoint } from '@/types';

const EARTH_RADIUS = 6371000; // meters

/**
 * Haversine distance between two lat/lng points in meters.
 */
export function haversineDistance(
  lat1: number, lng1: number,
  lat2: number, lng2: number
): number {
  const dLat = toRad(lat2 - lat1);
  const dLng = toRad(lng2 - lng1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance between two fixes or route points in meters. */
export function sampleDistance(a: RoutePoint, b: RoutePoint): number {
  return haversineDistance(a.latitude, a.longitude, b.latitude, b.longitude);
}

/** Seconds between two fixes (negative when b precedes a). */
export function elapsedBetween(a: LocationSample, b: LocationSample): number {
  return (b.timestamp - a.timestamp) / 1000;
}

/**
 * Calculate pace in sec/km from distance (m) and elapsed (sec).
 * Returns null if no distance has been covered yet.
 */
export function calculatePace(distanceMeters: number, elapsedSeconds: number): number | null {
  if (distanceMeters <= 0) return null;
  return elapsedSeconds / (distanceMeters / 1000);
}

/**
 * Calculate speed in m/s. Returns null before any time has elapsed.
 */
export function calculateSpeed(distanceMeters: number, elapsedSeconds: number): number | null {
  if (elapsedSeconds <= 0) return null;
  return distanceMeters / elapsedSeconds;
}

/**
 * Total distance of a route in meters.
 */
export function routeDistance(points: readonly RoutePoint[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += sampleDistance(points[i - 1], points[i]);
  }
  return total;
}
