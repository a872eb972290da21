import type { LotStatus, ParkingLot } from './types';

export const STATUS_COLORS: Record<LotStatus, string> = {
  ev: '#2563eb',
  available: '#16a34a',
  full: '#dc2626'
};

export const STATUS_LABELS: Record<LotStatus, string> = {
  ev: 'Available EV spots',
  available: 'Available spots',
  full: 'Full'
};

// Legend order.
export const LOT_STATUSES: readonly LotStatus[] = ['ev', 'available', 'full'];

export function lotStatus(lot: Pick<ParkingLot, 'availableSpots' | 'availableEVSpots'>): LotStatus {
  if (lot.availableEVSpots > 0) return 'ev';
  if (lot.availableSpots > 0) return 'available';
  return 'full';
}

export function filterParkingLots(lots: ParkingLot[], showEVOnly: boolean): ParkingLot[] {
  if (!showEVOnly) return lots;
  return lots.filter((l) => l.availableEVSpots > 0);
}

function groupThousands(n: number): string {
  return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

export function formatFarePerDay(fare: number): string {
  const sign = fare < 0 ? '-' : '';
  return `${sign}$${groupThousands(Math.abs(Math.trunc(fare)))} / day`;
}

export function formatOpeningHours(lot: Pick<ParkingLot, 'openTime' | 'closeTime'>): string {
  return `${lot.openTime} – ${lot.closeTime}`;
}
