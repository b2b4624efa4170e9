import { ParticipantFlight, ParticipantSession } from '../snapshots/types';
import { WhazzupData } from './types';

export const NO_ROUTE = 'No route';

const COORDINATE = /^(\d{2,4}[NS]\d{3,5}[EW]|\d{1,2}[NS]\d{1,3}[EW]|-?\d+(\.\d+)?,-?\d+(\.\d+)?)$/;
const RECORDED_AT = /\s*recorded at \d{4}z/gi;

/**
 * Drops DCT and coordinate waypoints and any /speed-level suffix, then keeps
 * the first and last two segments of long routes.
 */
export function cleanRoute(route: string): string {
  if (!route || route === NO_ROUTE) {
    return route;
  }

  const segments = route
    .split(/\s+/)
    .filter((segment) => segment.length > 0)
    .filter((segment) => {
      const upper = segment.toUpperCase();
      return upper.split('/', 1)[0] !== 'DCT' && !COORDINATE.test(upper);
    })
    .map((segment) => segment.split('/', 1)[0]);

  if (segments.length === 0) {
    return 'DCT';
  }
  if (segments.length > 4) {
    return `${segments.slice(0, 2).join(' ')}...${segments.slice(-2).join(' ')}`;
  }
  return segments.join(' ');
}

/** ATIS body without the header line and recording stamps, on one line. */
export function joinAtis(lines: unknown): string | null {
  if (!Array.isArray(lines) || lines.length < 2) {
    return null;
  }
  const joined = lines
    .slice(1)
    .filter((line): line is string => typeof line === 'string')
    .map((line) => line.replace(RECORDED_AT, '').trim())
    .filter((line) => line.length > 0)
    .join(' ');
  return joined.length > 0 ? joined : null;
}

export function parsePilot(raw: unknown): ParticipantFlight | null {
  if (!isObject(raw)) {
    return null;
  }
  const plan: Record<string, unknown> = isObject(raw.flightPlan) ? raw.flightPlan : {};
  const aircraft: Record<string, unknown> = isObject(plan.aircraft) ? plan.aircraft : {};

  return {
    subjectId: toSubjectId(raw.userId),
    callsign: text(raw.callsign).toUpperCase(),
    departure: text(plan.departureId).toUpperCase(),
    arrival: text(plan.arrivalId).toUpperCase(),
    route: cleanRoute(text(plan.route) || NO_ROUTE),
    seats: toSeats(plan.peopleOnBoard),
    aircraft: (text(aircraft.icaoCode) || 'UNKNOWN').toUpperCase(),
  };
}

export function parseAtc(raw: unknown): ParticipantSession | null {
  if (!isObject(raw)) {
    return null;
  }
  const callsign = text(raw.callsign).toUpperCase();
  if (!callsign) {
    return null;
  }

  const frequency = isObject(raw.atcSession) ? raw.atcSession.frequency : raw.frequency;
  return {
    subjectId: toSubjectId(raw.userId),
    callsign,
    frequency: typeof frequency === 'number' && Number.isFinite(frequency) ? frequency : null,
    status: joinAtis(isObject(raw.atis) ? raw.atis.lines : null),
  };
}

export function parseWhazzup(data: WhazzupData | null | undefined): {
  flights: ParticipantFlight[];
  sessions: ParticipantSession[];
} {
  const clients = data?.clients;
  const pilots = clients && Array.isArray(clients.pilots) ? clients.pilots : [];
  const atcs = clients && Array.isArray(clients.atcs) ? clients.atcs : [];
  return {
    flights: pilots.map(parsePilot).filter((f): f is ParticipantFlight => f !== null),
    sessions: atcs.map(parseAtc).filter((s): s is ParticipantSession => s !== null),
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function toSubjectId(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim()) return value.trim();
  return null;
}

function toSeats(value: unknown): number {
  const seats = typeof value === 'string' ? Number.parseInt(value, 10) : value;
  return typeof seats === 'number' && Number.isFinite(seats) && seats > 0 ? Math.floor(seats) : 0;
}
