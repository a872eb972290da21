import type { Coordinate } from './types';

export const LOCATION_UNAVAILABLE_MESSAGE = 'Geolocation not available in this browser.';

export function describeLocationError(err: { code: number }): string {
  // PERMISSION_DENIED = 1, POSITION_UNAVAILABLE = 2, TIMEOUT = 3
  switch (err.code) {
    case 1:
      return 'Location permission denied. Allow location access in your browser settings to see lots near you.';
    case 2:
      return 'Location unavailable. Check your device location services.';
    case 3:
      return 'Location request timed out. Showing the default area.';
    default:
      return 'Could not access location. You can still use the map.';
  }
}

export type GeolocationLike = {
  watchPosition(
    success: (pos: { coords: Coordinate }) => void,
    failure?: (err: { code: number }) => void,
    options?: PositionOptions
  ): number;
  clearWatch(id: number): void;
};

/**
 * Starts following the device position. Returns a function that stops it.
 */
export function watchUserLocation(
  geolocation: GeolocationLike | undefined,
  onUpdate: (coordinate: Coordinate) => void,
  onError: (message: string) => void
): () => void {
  if (!geolocation) {
    onError(LOCATION_UNAVAILABLE_MESSAGE);
    return () => {};
  }

  const watchId = geolocation.watchPosition(
    (pos) => onUpdate({ latitude: pos.coords.latitude, longitude: pos.coords.longitude }),
    (err) => onError(describeLocationError(err)),
    { enableHighAccuracy: true, timeout: 20000, maximumAge: 60000 }
  );

  return () => geolocation.clearWatch(watchId);
}
