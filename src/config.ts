import { parkingLotsCollectionUrl } from './parkingLotsApi';

export type AppEnv = {
  VITE_GOOGLE_MAPS_API_KEY?: string;
  VITE_FIRESTORE_PROJECT_ID?: string;
  VITE_PARKING_LOTS_COLLECTION?: string;
  VITE_PARKING_LOTS_URL?: string;
};

export type AppConfig = {
  googleMapsApiKey: string | null;
  parkingLotsUrl: string | null;
};

const DEFAULT_COLLECTION = 'parkingLots';

function clean(v: string | undefined): string | null {
  const s = v?.trim();
  return s ? s : null;
}

export function readConfig(env: AppEnv): AppConfig {
  const explicitUrl = clean(env.VITE_PARKING_LOTS_URL);
  const projectId = clean(env.VITE_FIRESTORE_PROJECT_ID);
  const collection = clean(env.VITE_PARKING_LOTS_COLLECTION) ?? DEFAULT_COLLECTION;

  return {
    googleMapsApiKey: clean(env.VITE_GOOGLE_MAPS_API_KEY),
    parkingLotsUrl: explicitUrl ?? (projectId ? parkingLotsCollectionUrl(projectId, collection) : null)
  };
}

// Human-readable problems with the configuration, empty when it is usable.
export function configProblems(config: AppConfig): string[] {
  const out: string[] = [];
  if (!config.googleMapsApiKey) {
    out.push('Missing Google Maps API key. Set VITE_GOOGLE_MAPS_API_KEY in .env.local and restart the dev server.');
  }
  if (!config.parkingLotsUrl) {
    out.push('Missing parking lot source. Set VITE_FIRESTORE_PROJECT_ID (or VITE_PARKING_LOTS_URL) in .env.local.');
  }
  return out;
}
