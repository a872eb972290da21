export type Coordinate = {
  latitude: number;
  longitude: number;
};

export type ParkingLot = {
  readonly id: string;
  readonly name: string;
  readonly coordinate: Readonly<Coordinate>;
  readonly availableSpots: number;
  readonly availableEVSpots: number;
  readonly farePerDay: number; // smallest currency unit
  readonly openTime: string;
  readonly closeTime: string;
};

export type MapRegion = {
  center: Coordinate;
  latitudeDelta: number;
  longitudeDelta: number;
};

export type LotStatus = 'ev' | 'available' | 'full';

export type DropReason = 'missing-fields' | 'missing-wrapper';

export type DroppedDocument = {
  index: number;
  reason: DropReason;
  missing: string[];
};

export type DefaultedScalar = {
  index: number;
  field: string;
};

export type DecodeReport = {
  lots: ParkingLot[];
  envelope: 'ok' | 'invalid-json' | 'invalid-envelope';
  dropped: DroppedDocument[];
  defaulted: DefaultedScalar[];
};
