import type { Coordinate, MapRegion } from './types';

export function haversineMeters(a: Coordinate, b: Coordinate): number {
  const R = 6371e3;
  const toRad = (d: number) => (d * Math.PI) / 180;

  const lat1 = toRad(a.latitude);
  const lat2 = toRad(b.latitude);
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);

  const s1 = Math.sin(dLat / 2);
  const s2 = Math.sin(dLon / 2);
  const x = s1 * s1 + Math.cos(lat1) * Math.cos(lat2) * s2 * s2;
  const c = 2 * Math.atan2(Math.sqrt(x), Math.sqrt(1 - x));
  return R * c;
}

export function formatDistance(meters: number): string {
  if (meters < 1000) return `${Math.round(meters)} m`;
  return `${(meters / 1000).toFixed(2)} km`;
}

export function toLatLng(c: Coordinate): google.maps.LatLngLiteral {
  return { lat: c.latitude, lng: c.longitude };
}

const MIN_ZOOM = 1;
const MAX_ZOOM = 21;

// A Google map shows 360° of longitude at zoom 0 and halves the span per level.
export function regionToZoom(region: MapRegion): number {
  const span = Math.max(region.latitudeDelta, region.longitudeDelta);
  if (!Number.isFinite(span) || span <= 0) return MAX_ZOOM;
  const z = Math.round(Math.log2(360 / span));
  return Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, z));
}
