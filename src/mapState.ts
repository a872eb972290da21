import { filterParkingLots } from './availability';
import type { Coordinate, DecodeReport, MapRegion, ParkingLot } from './types';

export const DEFAULT_REGION: MapRegion = {
  center: { latitude: 4.6015, longitude: -74.0655 },
  latitudeDelta: 0.01,
  longitudeDelta: 0.01
};

export type FetchStatus = 'idle' | 'loading' | 'ready' | 'error';

export type MapState = {
  readonly lots: ParkingLot[];
  readonly showEVOnly: boolean;
  readonly region: MapRegion;
  readonly userLocation: Coordinate | null;
  readonly selectedLotId: string | null;
  readonly status: FetchStatus;
  readonly error: string | null;
  readonly lastReport: DecodeReport | null;
};

export type MapAction =
  | { type: 'fetch-started' }
  | { type: 'fetch-completed'; report: DecodeReport }
  | { type: 'fetch-failed'; message: string }
  | { type: 'filter-toggled'; showEVOnly: boolean }
  | { type: 'region-changed'; region: MapRegion }
  | { type: 'location-updated'; coordinate: Coordinate }
  | { type: 'lot-selected'; id: string | null };

export const initialMapState: MapState = {
  lots: [],
  showEVOnly: false,
  region: DEFAULT_REGION,
  userLocation: null,
  selectedLotId: null,
  status: 'idle',
  error: null,
  lastReport: null
};

function keepSelection(selectedLotId: string | null, visible: ParkingLot[]): string | null {
  if (!selectedLotId) return null;
  return visible.some((l) => l.id === selectedLotId) ? selectedLotId : null;
}

export function mapReducer(state: MapState, action: MapAction): MapState {
  switch (action.type) {
    case 'fetch-started':
      return { ...state, status: 'loading' };

    case 'fetch-completed': {
      // Each fetch replaces the collection; the latest completion wins.
      const lots = [...action.report.lots];
      return {
        ...state,
        lots,
        status: 'ready',
        error: null,
        lastReport: action.report,
        selectedLotId: keepSelection(state.selectedLotId, filterParkingLots(lots, state.showEVOnly))
      };
    }

    case 'fetch-failed':
      return { ...state, status: 'error', error: action.message };

    case 'filter-toggled':
      return {
        ...state,
        showEVOnly: action.showEVOnly,
        selectedLotId: keepSelection(state.selectedLotId, filterParkingLots(state.lots, action.showEVOnly))
      };

    case 'region-changed':
      return { ...state, region: action.region };

    case 'location-updated':
      return { ...state, userLocation: action.coordinate };

    case 'lot-selected':
      return { ...state, selectedLotId: action.id };
  }
}

export function selectVisibleLots(state: MapState): ParkingLot[] {
  return filterParkingLots(state.lots, state.showEVOnly);
}

export function selectSelectedLot(state: MapState): ParkingLot | null {
  if (!state.selectedLotId) return null;
  return selectVisibleLots(state).find((l) => l.id === state.selectedLotId) ?? null;
}

// One-line summary of a decode, or null when nothing was dropped or defaulted.
export function describeReport(report: DecodeReport): string | null {
  if (report.envelope === 'invalid-json') return 'Parking lot response was not valid JSON.';
  if (report.envelope === 'invalid-envelope') return 'Parking lot response had no document list.';

  const parts: string[] = [];
  if (report.dropped.length > 0) {
    parts.push(`${report.dropped.length} skipped (missing fields)`);
  }
  if (report.defaulted.length > 0) {
    parts.push(`${report.defaulted.length} values defaulted`);
  }
  return parts.length ? `Loaded ${report.lots.length} lots; ${parts.join(', ')}.` : null;
}
