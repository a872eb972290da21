import { describe, it, expect } from 'vitest';
import {
  DEFAULT_REGION,
  describeReport,
  initialMapState,
  mapReducer,
  selectSelectedLot,
  selectVisibleLots,
  type MapAction,
  type MapState
} from '../src/mapState';
import type { DecodeReport, ParkingLot } from '../src/types';

const createLot = (id: string, availableSpots: number, availableEVSpots: number): ParkingLot => ({
  id,
  name: `Lot ${id}`,
  coordinate: { latitude: 4.6, longitude: -74.06 },
  availableSpots,
  availableEVSpots,
  farePerDay: 0,
  openTime: 'N/A',
  closeTime: 'N/A'
});

const report = (lots: ParkingLot[], extra: Partial<DecodeReport> = {}): DecodeReport => ({
  lots,
  envelope: 'ok',
  dropped: [],
  defaulted: [],
  ...extra
});

const run = (actions: MapAction[], from: MapState = initialMapState) => actions.reduce(mapReducer, from);

describe('mapReducer', () => {
  it('starts centered on the default region with nothing loaded', () => {
    expect(initialMapState.region).toEqual(DEFAULT_REGION);
    expect(initialMapState.lots).toEqual([]);
    expect(initialMapState.status).toBe('idle');
  });

  it('marks a fetch in progress without clearing the current lots', () => {
    const loaded = run([{ type: 'fetch-completed', report: report([createLot('a', 1, 0)]) }]);
    const state = mapReducer(loaded, { type: 'fetch-started' });

    expect(state.status).toBe('loading');
    expect(state.lots).toBe(loaded.lots);
  });

  it('replaces the lots on completion instead of merging', () => {
    const first = report([createLot('a', 1, 0), createLot('b', 2, 1)]);
    const second = report([createLot('c', 3, 0)]);
    const state = run([
      { type: 'fetch-completed', report: first },
      { type: 'fetch-completed', report: second }
    ]);

    expect(state.lots.map((l) => l.id)).toEqual(['c']);
    expect(state.lastReport).toBe(second);
    expect(state.status).toBe('ready');
  });

  it('stores a new array rather than the report array', () => {
    const r = report([createLot('a', 1, 0)]);
    const state = mapReducer(initialMapState, { type: 'fetch-completed', report: r });

    expect(state.lots).not.toBe(r.lots);
    expect(state.lots).toEqual(r.lots);
  });

  it('keeps the previous lots when a fetch fails', () => {
    const loaded = run([{ type: 'fetch-completed', report: report([createLot('a', 1, 0)]) }]);
    const state = run([{ type: 'fetch-started' }, { type: 'fetch-failed', message: 'offline' }], loaded);

    expect(state.lots).toBe(loaded.lots);
    expect(state.status).toBe('error');
    expect(state.error).toBe('offline');
  });

  it('clears the error after a later success', () => {
    const state = run([
      { type: 'fetch-failed', message: 'offline' },
      { type: 'fetch-completed', report: report([]) }
    ]);

    expect(state.error).toBeNull();
    expect(state.status).toBe('ready');
  });

  it('does not mutate the previous state', () => {
    const before = run([{ type: 'fetch-completed', report: report([createLot('a', 1, 0)]) }]);
    const snapshot = { ...before, lots: [...before.lots] };
    mapReducer(before, { type: 'filter-toggled', showEVOnly: true });
    mapReducer(before, { type: 'fetch-completed', report: report([]) });

    expect(before).toEqual(snapshot);
  });

  describe('filter and selection', () => {
    const lots = [createLot('a', 10, 2), createLot('b', 5, 0), createLot('c', 0, 1)];
    const loaded = run([{ type: 'fetch-completed', report: report(lots) }]);

    it('shows every lot while the EV filter is off', () => {
      expect(selectVisibleLots(loaded).map((l) => l.id)).toEqual(['a', 'b', 'c']);
    });

    it('shows EV lots only when toggled on', () => {
      const state = mapReducer(loaded, { type: 'filter-toggled', showEVOnly: true });
      expect(state.showEVOnly).toBe(true);
      expect(selectVisibleLots(state).map((l) => l.id)).toEqual(['a', 'c']);
    });

    it('selects a visible lot', () => {
      const state = mapReducer(loaded, { type: 'lot-selected', id: 'b' });
      expect(selectSelectedLot(state)?.id).toBe('b');
    });

    it('drops the selection when the filter hides the lot', () => {
      const state = run([{ type: 'lot-selected', id: 'b' }, { type: 'filter-toggled', showEVOnly: true }], loaded);
      expect(state.selectedLotId).toBeNull();
      expect(selectSelectedLot(state)).toBeNull();
    });

    it('keeps the selection when the filter leaves the lot visible', () => {
      const state = run([{ type: 'lot-selected', id: 'a' }, { type: 'filter-toggled', showEVOnly: true }], loaded);
      expect(state.selectedLotId).toBe('a');
    });

    it('drops the selection when a new fetch no longer has the lot', () => {
      const state = run(
        [
          { type: 'lot-selected', id: 'b' },
          { type: 'fetch-completed', report: report([createLot('a', 1, 0)]) }
        ],
        loaded
      );
      expect(state.selectedLotId).toBeNull();
    });

    it('clears the selection explicitly', () => {
      const state = run([{ type: 'lot-selected', id: 'a' }, { type: 'lot-selected', id: null }], loaded);
      expect(selectSelectedLot(state)).toBeNull();
    });
  });

  it('tracks the region and the user location', () => {
    const region = { center: { latitude: 4.7, longitude: -74.1 }, latitudeDelta: 0.02, longitudeDelta: 0.03 };
    const state = run([
      { type: 'region-changed', region },
      { type: 'location-updated', coordinate: { latitude: 4.65, longitude: -74.05 } }
    ]);

    expect(state.region).toEqual(region);
    expect(state.userLocation).toEqual({ latitude: 4.65, longitude: -74.05 });
  });
});

describe('describeReport', () => {
  it('is silent for a clean decode', () => {
    expect(describeReport(report([createLot('a', 1, 0)]))).toBeNull();
  });

  it('summarizes dropped documents and defaulted values', () => {
    const r = report([createLot('a', 1, 0)], {
      dropped: [{ index: 1, reason: 'missing-wrapper', missing: ['available_ev_spots'] }],
      defaulted: [
        { index: 0, field: 'open_time' },
        { index: 0, field: 'close_time' }
      ]
    });
    expect(describeReport(r)).toBe('Loaded 1 lots; 1 skipped (missing fields), 2 values defaulted.');
  });

  it('reports envelope failures', () => {
    expect(describeReport(report([], { envelope: 'invalid-json' }))).toBe('Parking lot response was not valid JSON.');
    expect(describeReport(report([], { envelope: 'invalid-envelope' }))).toBe(
      'Parking lot response had no document list.'
    );
  });
});
