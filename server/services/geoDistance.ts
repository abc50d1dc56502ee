/**
 * Great-circle distance and county centroid lookup.
 */

import type { CountyCentroid } from '@shared/schema';

export const EARTH_RADIUS_KM = 6371;

export interface LatLon {
  latitude: number;
  longitude: number;
}

export type CentroidIndex = ReadonlyMap<string, LatLon>;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Haversine distance in kilometres.
 */
export function haversineKm(a: LatLon, b: LatLon): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);

  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Lowercase, trimmed, trailing " county" removed.
 */
export function normalizeCountyName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/\s+county$/, '');
}

/**
 * Index centroids by both the raw lowercase name and the stripped name,
 * so "Andrews County" and "Andrews" resolve to the same point.
 */
export function buildCentroidIndex(rows: readonly CountyCentroid[]): CentroidIndex {
  const index = new Map<string, LatLon>();
  for (const row of rows) {
    const point = { latitude: row.latitude, longitude: row.longitude };
    const raw = row.county.trim().toLowerCase().replace(/\s+/g, ' ');
    index.set(raw, point);
    index.set(normalizeCountyName(row.county), point);
  }
  return index;
}

export function lookupCentroid(index: CentroidIndex, county: string): LatLon | null {
  return (
    index.get(county.trim().toLowerCase().replace(/\s+/g, ' ')) ??
    index.get(normalizeCountyName(county)) ??
    null
  );
}
