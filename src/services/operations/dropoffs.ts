import { existsSync, readFileSync, readdirSync } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import stateNeighbors from '../../../data/state-neighbors.json';
import { ToolResult, failure, success } from '../../models/toolResult';
import { isRecord } from '../../models/plan';
import { DistanceService, metersToMiles } from '../distance';
import { LogContext, errorMessage, logger } from '../../utils/logger';

export const ADDRESSES_PER_STATE = 25;

const NEIGHBORS: Record<string, readonly string[]> = stateNeighbors;

export type DropoffLayer = 'in_state' | 'neighbor' | 'national';

export interface DropoffCandidate {
  address: string;
  state: string;
  state_csv: string;
  distance_miles: number;
  duration_text: string;
}

export interface ClosestDropoff extends DropoffCandidate {
  layer: DropoffLayer;
  neighbors_checked: string[];
  threshold_exceeded: boolean;
}

export interface DropoffLocatorOptions {
  dir: string;
  maxMiles: number;
  distance: DistanceService;
}

function joinAddress(row: Record<string, unknown>): string {
  return ['address_street', 'city', 'state', 'zip']
    .map((column) => row[column])
    .filter((part): part is string => typeof part === 'string' && part.trim() !== '' && part.toLowerCase() !== 'nan')
    .join(', ');
}

/**
 * Finds the nearest drop-off location by driving distance, searching the
 * caller's state, then its bordering states, then everything else.
 */
export class DropoffLocator {
  private readonly dir: string;
  private readonly maxMiles: number;
  private readonly distance: DistanceService;

  constructor(options: DropoffLocatorOptions) {
    this.dir = options.dir;
    this.maxMiles = options.maxMiles;
    this.distance = options.distance;
  }

  availableStates(): string[] {
    if (!existsSync(this.dir)) {
      return [];
    }
    return readdirSync(this.dir)
      .filter((file) => /^[A-Za-z]{2}\.csv$/.test(file))
      .map((file) => file.slice(0, 2).toUpperCase())
      .sort();
  }

  stateAddresses(state: string, limit = ADDRESSES_PER_STATE): string[] {
    const content = readFileSync(this.csvPath(state), 'utf-8');
    const records: unknown = parse(content, { columns: true, skip_empty_lines: true, trim: true });
    if (!Array.isArray(records)) {
      return [];
    }

    const addresses: string[] = [];
    for (const record of records) {
      if (!isRecord(record)) continue;
      const full = joinAddress(record);
      if (full) addresses.push(full);
      if (addresses.length >= limit) break;
    }
    return addresses;
  }

  async findClosest(userAddress: string, stateRaw: string, ctx: LogContext = {}): Promise<ClosestDropoff | null> {
    const state = stateRaw.trim().toUpperCase();
    const available = this.availableStates();

    const inState = available.includes(state) ? await this.bestInState(userAddress, state, ctx) : null;
    const neighbors = (NEIGHBORS[state] ?? []).filter((s) => available.includes(s));
    const neighborBest = await this.bestAmong(userAddress, neighbors, ctx);

    const under = [inState, neighborBest].filter(
      (c): c is DropoffCandidate => c !== null && c.distance_miles <= this.maxMiles,
    );
    const nearUnder = nearest(under);
    if (nearUnder) {
      return {
        ...nearUnder,
        layer: nearUnder === neighborBest ? 'neighbor' : 'in_state',
        neighbors_checked: neighbors,
        threshold_exceeded: false,
      };
    }

    const excluded = new Set([state, ...neighbors]);
    const nationalBest = await this.bestAmong(
      userAddress,
      available.filter((s) => !excluded.has(s)),
      ctx,
    );

    const best = nearest([inState, neighborBest, nationalBest].filter((c): c is DropoffCandidate => c !== null));
    if (!best) {
      return null;
    }

    let layer: DropoffLayer = 'in_state';
    if (best === nationalBest) layer = 'national';
    else if (best === neighborBest) layer = 'neighbor';

    return {
      ...best,
      layer,
      neighbors_checked: neighbors,
      threshold_exceeded: best.distance_miles > this.maxMiles,
    };
  }

  private csvPath(state: string): string {
    return path.join(this.dir, `${state}.csv`);
  }

  private async bestInState(userAddress: string, state: string, ctx: LogContext): Promise<DropoffCandidate | null> {
    // Appending the state helps geocoding for bare street addresses.
    const origin = userAddress.toUpperCase().includes(state) ? userAddress : `${userAddress}, ${state}`;
    try {
      const destinations = this.stateAddresses(state);
      if (destinations.length === 0) {
        return null;
      }
      const match = await this.distance.nearest(origin, destinations);
      if (!match) {
        return null;
      }
      return {
        address: match.address,
        state,
        state_csv: this.csvPath(state),
        distance_miles: metersToMiles(match.distanceMeters),
        duration_text: match.durationText,
      };
    } catch (err) {
      logger.warn('Drop-off search failed for state', ctx, { state, error: errorMessage(err) });
      return null;
    }
  }

  private async bestAmong(userAddress: string, states: string[], ctx: LogContext): Promise<DropoffCandidate | null> {
    let overall: DropoffCandidate | null = null;
    for (const state of states) {
      const candidate = await this.bestInState(userAddress, state, ctx);
      if (candidate && (overall === null || candidate.distance_miles < overall.distance_miles)) {
        overall = candidate;
      }
    }
    return overall;
  }
}

function nearest(candidates: DropoffCandidate[]): DropoffCandidate | null {
  let best: DropoffCandidate | null = null;
  for (const candidate of candidates) {
    if (best === null || candidate.distance_miles < best.distance_miles) {
      best = candidate;
    }
  }
  return best;
}

export async function getClosest(
  locator: DropoffLocator,
  userAddress: unknown,
  state: unknown,
  ctx: LogContext = {},
): Promise<ToolResult> {
  if (typeof userAddress !== 'string' || userAddress.trim() === '') {
    return failure('INVALID_INPUT', 'Please provide the address to search from.', { received: userAddress ?? null });
  }
  if (typeof state !== 'string' || !/^[A-Za-z]{2}$/.test(state.trim())) {
    return failure('INVALID_INPUT', 'state must be a 2-letter state code.', { received: state ?? null });
  }

  const closest = await locator.findClosest(userAddress.trim(), state, ctx);
  if (!closest) {
    return failure('NOT_FOUND', 'No nearby locations found.');
  }

  const message = closest.threshold_exceeded
    ? `The nearest drop-off is ${closest.address}, about ${closest.distance_miles} miles away.`
    : `Closest drop-off: ${closest.address} (${closest.distance_miles} miles, ${closest.duration_text}).`;
  return success(message, { ...closest });
}
