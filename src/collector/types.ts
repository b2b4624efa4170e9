/**
 * Public network status document, as far as the collector reads it. Client
 * entries are left untyped and validated field by field when parsed:
 *
 * pilots: `{ userId, callsign, flightPlan: { departureId, arrivalId,
 * peopleOnBoard, route, aircraft: { icaoCode } } }`
 *
 * atcs: `{ userId, callsign, atcSession: { frequency }, atis: { lines } }`
 */
export interface WhazzupData {
  updatedAt?: string;
  clients?: {
    pilots?: unknown[];
    atcs?: unknown[];
  };
}
