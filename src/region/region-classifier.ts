/**
 * Region membership rules. Everything here is a pure function of the prefix
 * set in a {@link RegionScope}; categories are never stored with the data.
 */

export interface RoutedFlight {
  departure: string;
  arrival: string;
}

export interface Positioned {
  callsign: string;
}

export type FlightCategory = 'domestic' | 'outgoing' | 'incoming' | 'unrelated';

export class RegionScope {
  readonly prefixes: readonly string[];

  constructor(prefixes: Iterable<string>) {
    this.prefixes = Object.freeze(
      Array.from(new Set(Array.from(prefixes, (p) => p.trim().toUpperCase()))).filter(
        (p) => p.length > 0,
      ),
    );
  }

  matches(code: string | null | undefined): boolean {
    if (!code) return false;
    const upper = code.toUpperCase();
    return this.prefixes.some((prefix) => upper.startsWith(prefix));
  }
}

export function isDomestic(scope: RegionScope, flight: RoutedFlight): boolean {
  return scope.matches(flight.departure) && scope.matches(flight.arrival);
}

export function isOutgoing(scope: RegionScope, flight: RoutedFlight): boolean {
  return scope.matches(flight.departure) && !scope.matches(flight.arrival);
}

export function isIncoming(scope: RegionScope, flight: RoutedFlight): boolean {
  return !scope.matches(flight.departure) && scope.matches(flight.arrival);
}

export function involvesRegion(scope: RegionScope, flight: RoutedFlight): boolean {
  return scope.matches(flight.departure) || scope.matches(flight.arrival);
}

export function isInScopeController(scope: RegionScope, session: Positioned): boolean {
  return scope.matches(session.callsign);
}

export function categorize(scope: RegionScope, flight: RoutedFlight): FlightCategory {
  if (isDomestic(scope, flight)) return 'domestic';
  if (isOutgoing(scope, flight)) return 'outgoing';
  if (isIncoming(scope, flight)) return 'incoming';
  return 'unrelated';
}
