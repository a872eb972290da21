import type { DecodeReport, DefaultedScalar, DroppedDocument, ParkingLot } from './types';

// Firestore field names, in the order the documents are checked.
export const REQUIRED_FIELDS = [
  'name',
  'latitude',
  'longitude',
  'availableSpots',
  'available_ev_spots',
  'farePerDay',
  'open_time',
  'close_time'
] as const;

type RequiredField = (typeof REQUIRED_FIELDS)[number];

type Wrapper = Record<string, unknown>;

export type DecodeOptions = {
  generateId?: () => string;
};

const NOT_AVAILABLE = 'N/A';

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function toText(rawBody: string | Uint8Array): string {
  return typeof rawBody === 'string' ? rawBody : new TextDecoder().decode(rawBody);
}

function parseEnvelope(rawBody: string | Uint8Array): { documents: unknown[] } | 'invalid-json' | 'invalid-envelope' {
  let parsed: unknown;
  try {
    parsed = JSON.parse(toText(rawBody));
  } catch {
    return 'invalid-json';
  }

  if (!isRecord(parsed)) return 'invalid-envelope';
  const documents = parsed.documents;
  if (!Array.isArray(documents)) return 'invalid-envelope';
  return { documents };
}

function readString(w: Wrapper): string | undefined {
  const v = w.stringValue;
  return typeof v === 'string' ? v : undefined;
}

function readDouble(w: Wrapper): number | undefined {
  const v = w.doubleValue;
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

// Firestore sends int64 values as decimal strings.
function readInteger(w: Wrapper): number | undefined {
  const v = w.integerValue;
  if (typeof v !== 'string' || !/^[+-]?\d+$/.test(v)) return undefined;
  const n = Number.parseInt(v, 10);
  return Number.isSafeInteger(n) ? n : undefined;
}

function decodeDocument(
  doc: unknown,
  index: number,
  generateId: () => string,
  defaulted: DefaultedScalar[]
): ParkingLot | DroppedDocument {
  const fields = isRecord(doc) ? doc.fields : undefined;
  if (!isRecord(doc) || !isRecord(fields)) {
    return { index, reason: 'missing-fields', missing: ['fields'] };
  }

  const missing = REQUIRED_FIELDS.filter((f) => !isRecord(fields[f]));
  if (missing.length > 0) {
    return { index, reason: 'missing-wrapper', missing };
  }

  const wrapper = (f: RequiredField): Wrapper => {
    const w = fields[f];
    return isRecord(w) ? w : {};
  };

  const pick = <T>(f: RequiredField, value: T | undefined, fallback: T): T => {
    if (value !== undefined) return value;
    defaulted.push({ index, field: f });
    return fallback;
  };

  const ownName = doc.name;

  return {
    id: typeof ownName === 'string' ? ownName : generateId(),
    name: pick('name', readString(wrapper('name')), ''),
    coordinate: {
      latitude: pick('latitude', readDouble(wrapper('latitude')), 0),
      longitude: pick('longitude', readDouble(wrapper('longitude')), 0)
    },
    availableSpots: pick('availableSpots', readInteger(wrapper('availableSpots')), 0),
    availableEVSpots: pick('available_ev_spots', readInteger(wrapper('available_ev_spots')), 0),
    farePerDay: pick('farePerDay', readInteger(wrapper('farePerDay')), 0),
    openTime: pick('open_time', readString(wrapper('open_time')), NOT_AVAILABLE),
    closeTime: pick('close_time', readString(wrapper('close_time')), NOT_AVAILABLE)
  };
}

function isDropped(v: ParkingLot | DroppedDocument): v is DroppedDocument {
  return 'reason' in v;
}

/**
 * Decodes a Firestore `documents` listing into parking lots and records why
 * each document was dropped or which scalars fell back to their defaults.
 * Never throws.
 */
export function decodeParkingLotsWithReport(rawBody: string | Uint8Array, options: DecodeOptions = {}): DecodeReport {
  const generateId = options.generateId ?? (() => crypto.randomUUID());
  const envelope = parseEnvelope(rawBody);
  if (envelope === 'invalid-json' || envelope === 'invalid-envelope') {
    return { lots: [], envelope, dropped: [], defaulted: [] };
  }

  const lots: ParkingLot[] = [];
  const dropped: DroppedDocument[] = [];
  const defaulted: DefaultedScalar[] = [];

  envelope.documents.forEach((doc, index) => {
    const result = decodeDocument(doc, index, generateId, defaulted);
    if (isDropped(result)) {
      dropped.push(result);
    } else {
      lots.push(result);
    }
  });

  return { lots, envelope: 'ok', dropped, defaulted };
}

export function decodeParkingLots(rawBody: string | Uint8Array, options?: DecodeOptions): ParkingLot[] {
  return decodeParkingLotsWithReport(rawBody, options).lots;
}
