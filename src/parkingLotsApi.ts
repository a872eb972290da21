import { decodeParkingLotsWithReport, isRecord, type DecodeOptions } from './parkingLots';
import type { DecodeReport } from './types';

const FIRESTORE_BASE_URL = 'https://firestore.googleapis.com/v1';

export class ParkingLotsHttpError extends Error {
  status: number;
  body: unknown;

  constructor(message: string, status: number, body: unknown) {
    super(message);
    this.name = 'ParkingLotsHttpError';
    this.status = status;
    this.body = body;
  }
}

export function parkingLotsCollectionUrl(projectId: string, collection: string): string {
  return (
    `${FIRESTORE_BASE_URL}/projects/${encodeURIComponent(projectId)}` +
    `/databases/(default)/documents/${encodeURIComponent(collection)}`
  );
}

async function parseErrorBody(res: Response): Promise<unknown> {
  const ct = res.headers.get('content-type') ?? '';
  if (ct.includes('application/json')) {
    try {
      return await res.json();
    } catch {
      return null;
    }
  }
  try {
    return await res.text();
  } catch {
    return null;
  }
}

export function extractErrorMessage(body: unknown): string | null {
  if (!body) return null;
  if (typeof body === 'string') return body.trim() || null;
  if (!isRecord(body)) return null;

  const err = body.error;
  if (isRecord(err)) {
    const msg = err.message;
    if (typeof msg === 'string' && msg.trim()) return msg;
  }
  const detail = body.detail;
  if (typeof detail === 'string' && detail.trim()) return detail;
  const message = body.message;
  if (typeof message === 'string' && message.trim()) return message;

  return null;
}

/**
 * Reads the parking lot collection once. HTTP errors throw
 * `ParkingLotsHttpError`; network errors propagate as thrown by `fetch`.
 * A 2xx body that is not a document listing yields an empty report.
 */
export async function fetchParkingLots(
  url: string,
  init?: RequestInit & DecodeOptions
): Promise<DecodeReport> {
  const { generateId, ...requestInit } = init ?? {};
  const headers = new Headers(requestInit.headers);
  if (!headers.has('Accept')) headers.set('Accept', 'application/json');
  const res = await fetch(url, { ...requestInit, method: 'GET', headers });

  if (!res.ok) {
    const body = await parseErrorBody(res);
    const msg = extractErrorMessage(body);
    throw new ParkingLotsHttpError(msg ? msg : `Request failed (${res.status})`, res.status, body);
  }

  const text = await res.text();
  return decodeParkingLotsWithReport(text, { generateId });
}
