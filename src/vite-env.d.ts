/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_GOOGLE_MAPS_API_KEY?: string;
  readonly VITE_FIRESTORE_PROJECT_ID?: string;
  readonly VITE_PARKING_LOTS_COLLECTION?: string;
  readonly VITE_PARKING_LOTS_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
