import type { Coordinate, Flight } from "./types.js";

/** Resolves a stand id to an approximate [lat, lon]. */
export interface StandCoordinateResolver {
  resolve(standId: string): Coordinate | undefined;
}

export interface RandomStandOptions {
  baseLat: number;
  baseLon: number;
  jitterDeg: number;
  random?: () => number;
}

/**
 * Placeholder layout: every stand seen on a flight gets one random offset around the
 * reference point, drawn once and cached. Not derived from real apron geometry.
 */
export class RandomStandResolver implements StandCoordinateResolver {
  private coords: Map<string, Coordinate> = new Map();

  constructor(flights: Iterable<Flight>, options: RandomStandOptions) {
    const random = options.random ?? Math.random;
    const uniform = () => (random() * 2 - 1) * options.jitterDeg;

    for (const flight of flights) {
      if (flight.standId && !this.coords.has(flight.standId)) {
        this.coords.set(flight.standId, [options.baseLat + uniform(), options.baseLon + uniform()]);
      }
    }
  }

  resolve(standId: string): Coordinate | undefined {
    return this.coords.get(standId);
  }

  get size(): number {
    return this.coords.size;
  }
}

/** Fixed stand table, e.g. loaded from an airport's stand survey. */
export class StaticStandResolver implements StandCoordinateResolver {
  private coords: Map<string, Coordinate>;

  constructor(table: Record<string, Coordinate> | Map<string, Coordinate>) {
    this.coords = table instanceof Map ? new Map(table) : new Map(Object.entries(table));
  }

  resolve(standId: string): Coordinate | undefined {
    return this.coords.get(standId);
  }
}

/**
 * Deterministic PRNG (mulberry32) for reproducible stand layouts in tests and demos.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
