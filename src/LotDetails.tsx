import React from 'react';
import { formatFarePerDay, formatOpeningHours, lotStatus, STATUS_LABELS } from './availability';
import { formatDistance, haversineMeters } from './geo';
import type { Coordinate, ParkingLot } from './types';

type LotDetailsProps = {
  lot: ParkingLot;
  userLocation: Coordinate | null;
};

export function LotDetails({ lot, userLocation }: LotDetailsProps) {
  const distance = userLocation ? formatDistance(haversineMeters(userLocation, lot.coordinate)) : null;

  return (
    <div className="lotDetails">
      <div className="lotName">{lot.name || 'Parking lot'}</div>
      <div className="lotStatus">{STATUS_LABELS[lotStatus(lot)]}</div>
      <dl>
        <dt>Available spots</dt>
        <dd>{lot.availableSpots}</dd>
        <dt>EV spots</dt>
        <dd>{lot.availableEVSpots}</dd>
        <dt>Fare</dt>
        <dd>{formatFarePerDay(lot.farePerDay)}</dd>
        <dt>Hours</dt>
        <dd>{formatOpeningHours(lot)}</dd>
        {distance ? (
          <>
            <dt>Distance</dt>
            <dd>{distance}</dd>
          </>
        ) : null}
      </dl>
    </div>
  );
}
