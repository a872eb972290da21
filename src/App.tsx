import { GoogleMap, InfoWindowF, MarkerF, useJsApiLoader } from '@react-google-maps/api';
import React, { useCallback, useEffect, useMemo, useReducer, useRef, useState } from 'react';
import { lotStatus, STATUS_COLORS } from './availability';
import { configProblems, readConfig } from './config';
import { regionToZoom, toLatLng } from './geo';
import { watchUserLocation } from './location';
import { LotDetails } from './LotDetails';
import { DEFAULT_REGION, describeReport, initialMapState, mapReducer, selectSelectedLot, selectVisibleLots } from './mapState';
import { MapLegend } from './MapLegend';
import { fetchParkingLots, ParkingLotsHttpError } from './parkingLotsApi';

const config = readConfig(import.meta.env);

export default function App() {
  const { isLoaded, loadError } = useJsApiLoader({
    id: 'parking-lot-map-google-maps',
    googleMapsApiKey: config.googleMapsApiKey ?? ''
  });

  const mapRef = useRef<google.maps.Map | null>(null);
  const [state, dispatch] = useReducer(mapReducer, initialMapState);
  const [statusMsg, setStatusMsg] = useState<string | null>(null);

  const visibleLots = useMemo(() => selectVisibleLots(state), [state.lots, state.showEVOnly]);
  const selectedLot = selectSelectedLot(state);

  const initialCenter = useMemo(() => toLatLng(DEFAULT_REGION.center), []);
  const initialZoom = useMemo(() => regionToZoom(DEFAULT_REGION), []);

  const loadParkingLots = useCallback(async () => {
    const url = config.parkingLotsUrl;
    if (!url) return;

    dispatch({ type: 'fetch-started' });
    try {
      const report = await fetchParkingLots(url);
      dispatch({ type: 'fetch-completed', report });

      const summary = describeReport(report);
      if (summary && import.meta.env.DEV) {
        console.warn(summary, { dropped: report.dropped, defaulted: report.defaulted });
      }
      setStatusMsg(summary ?? `Showing ${report.lots.length} parking lots.`);
    } catch (e) {
      const message =
        e instanceof ParkingLotsHttpError
          ? `Could not load parking lots (${e.status}): ${e.message}`
          : `Could not load parking lots: ${e instanceof Error ? e.message : String(e)}`;
      dispatch({ type: 'fetch-failed', message });
      setStatusMsg(message);
    }
  }, []);

  useEffect(() => {
    const problems = configProblems(config);
    if (problems.length > 0) setStatusMsg(problems.join(' '));
  }, []);

  useEffect(() => {
    void loadParkingLots();
  }, [loadParkingLots]);

  useEffect(() => {
    const geolocation = typeof navigator !== 'undefined' ? navigator.geolocation : undefined;
    return watchUserLocation(
      geolocation,
      (coordinate) => dispatch({ type: 'location-updated', coordinate }),
      (message) => setStatusMsg(message)
    );
  }, []);

  const onIdle = () => {
    const bounds = mapRef.current?.getBounds();
    if (!bounds) return;
    const center = bounds.getCenter();
    const span = bounds.toSpan();
    dispatch({
      type: 'region-changed',
      region: {
        center: { latitude: center.lat(), longitude: center.lng() },
        latitudeDelta: span.lat(),
        longitudeDelta: span.lng()
      }
    });
  };

  const ariaStatusId = 'app-status';

  return (
    <div className="container">
      <main className="main">
        <div className="banner">
          <h1>Find your parking spot</h1>
        </div>

        {loadError ? (
          <div className="toast" role="alert">
            <strong>Failed to load Google Maps</strong>
            <div className="help">Check your API key restrictions and billing, then reload.</div>
          </div>
        ) : null}

        {state.status === 'error' && state.error ? (
          <div className="toast" role="alert">
            <strong>Parking lots not updated</strong>
            <div className="help">{state.error}</div>
          </div>
        ) : null}

        <div className="map" role="application" aria-label="Parking lot map">
          {isLoaded && config.googleMapsApiKey ? (
            <GoogleMap
              mapContainerStyle={{ width: '100%', height: '100%' }}
              center={initialCenter}
              zoom={initialZoom}
              onLoad={(map) => {
                mapRef.current = map;
              }}
              onIdle={onIdle}
              onClick={() => dispatch({ type: 'lot-selected', id: null })}
              options={{
                clickableIcons: false,
                streetViewControl: false,
                mapTypeControl: false,
                fullscreenControl: false
              }}
            >
              {visibleLots.map((lot) => (
                <MarkerF
                  key={lot.id}
                  position={toLatLng(lot.coordinate)}
                  title={lot.name || 'Parking lot'}
                  icon={{
                    path: google.maps.SymbolPath.CIRCLE,
                    scale: 9,
                    fillColor: STATUS_COLORS[lotStatus(lot)],
                    fillOpacity: 1,
                    strokeColor: '#ffffff',
                    strokeOpacity: 1,
                    strokeWeight: 2
                  }}
                  label={{ text: '🚗', fontSize: '11px' }}
                  zIndex={10}
                  onClick={() => dispatch({ type: 'lot-selected', id: lot.id })}
                />
              ))}

              {state.userLocation ? (
                <MarkerF
                  key="user-location"
                  position={toLatLng(state.userLocation)}
                  title="Your location"
                  icon={{
                    path: google.maps.SymbolPath.CIRCLE,
                    scale: 6,
                    fillColor: '#0ea5e9',
                    fillOpacity: 1,
                    strokeColor: '#ffffff',
                    strokeOpacity: 1,
                    strokeWeight: 2
                  }}
                  zIndex={11}
                />
              ) : null}

              {selectedLot ? (
                <InfoWindowF
                  position={toLatLng(selectedLot.coordinate)}
                  onCloseClick={() => dispatch({ type: 'lot-selected', id: null })}
                >
                  <LotDetails lot={selectedLot} userLocation={state.userLocation} />
                </InfoWindowF>
              ) : null}
            </GoogleMap>
          ) : (
            <div className="toast">
              <strong>Loading map…</strong>
              <div className="help">If this doesn’t load, confirm the API key is set.</div>
            </div>
          )}
        </div>

        <div className="controls">
          <div className="card">
            <MapLegend />
          </div>

          <div className="card">
            <label className="toggle">
              <input
                type="checkbox"
                checked={state.showEVOnly}
                onChange={(e) => dispatch({ type: 'filter-toggled', showEVOnly: e.target.checked })}
              />
              EV Only
            </label>
            <button
              type="button"
              className="secondary"
              disabled={state.status === 'loading' || !config.parkingLotsUrl}
              onClick={() => void loadParkingLots()}
            >
              {state.status === 'loading' ? 'Loading…' : 'Refresh'}
            </button>
          </div>
        </div>

        <div id={ariaStatusId} className="status" role="status" aria-live="polite">
          {statusMsg}
        </div>
      </main>
    </div>
  );
}
