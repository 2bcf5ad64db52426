/**
 * Driving-distance lookups against the Google Distance Matrix API. One call
 * compares an origin against a batch of destinations and keeps the nearest.
 */

const DISTANCE_MATRIX_URL = 'https://maps.googleapis.com/maps/api/distancematrix/json';

export interface NearestMatch {
  address: string;
  distanceMeters: number;
  durationText: string;
}

export interface DistanceService {
  nearest(origin: string, destinations: string[]): Promise<NearestMatch | null>;
}

interface MatrixElement {
  status?: string;
  distance?: { value: number };
  duration?: { text: string };
}

interface MatrixResponse {
  status?: string;
  rows?: Array<{ elements?: MatrixElement[] }>;
}

export class DistanceMatrixClient implements DistanceService {
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(apiKey: string | undefined, timeoutMs = 20_000) {
    this.apiKey = apiKey;
    this.timeoutMs = timeoutMs;
  }

  async nearest(origin: string, destinations: string[]): Promise<NearestMatch | null> {
    if (!this.apiKey || destinations.length === 0) {
      return null;
    }

    const params = new URLSearchParams({
      origins: origin,
      destinations: destinations.join('|'),
      mode: 'driving',
      key: this.apiKey,
    });

    const response = await fetch(`${DISTANCE_MATRIX_URL}?${params.toString()}`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Distance Matrix error ${response.status}`);
    }

    const payload = (await response.json()) as MatrixResponse;
    if (payload.status !== 'OK') {
      return null;
    }
    return pickNearest(payload.rows?.[0]?.elements ?? [], destinations);
  }
}

export function pickNearest(elements: MatrixElement[], destinations: string[]): NearestMatch | null {
  let best: NearestMatch | null = null;
  for (let i = 0; i < elements.length; i++) {
    const element = elements[i];
    const address = destinations[i];
    if (!element || element.status !== 'OK' || !element.distance || address === undefined) {
      continue;
    }
    if (best === null || element.distance.value < best.distanceMeters) {
      best = {
        address,
        distanceMeters: element.distance.value,
        durationText: element.duration?.text ?? '',
      };
    }
  }
  return best;
}

export function metersToMiles(meters: number): number {
  return Math.round((meters / 1609.344) * 100) / 100;
}
