export interface ParticipantFlight {
  subjectId: string | null;
  callsign: string;
  departure: string;
  arrival: string;
  route: string;
  seats: number;
  aircraft: string;
}

export interface ParticipantSession {
  subjectId: string | null;
  callsign: string;
  frequency: number | null;
  status: string | null;
}

export interface Sample {
  timestamp: Date;
  flights: ParticipantFlight[];
  sessions: ParticipantSession[];
}

/** A sample as read back from a partition. */
export interface StoredSample extends Sample {
  id: number;
}

export interface StoreResult {
  success: boolean;
  partitions: Record<Partition, boolean>;
}

export interface SessionHistoryRow {
  callsign: string;
  sampleId: number;
  timestamp: Date;
}

export interface SampleCountPoint {
  sampleId: number;
  timestamp: Date;
  flights: number;
  sessions: number;
}

export interface DayCountPoint {
  /** YYYY-MM-DD (UTC) */
  day: string;
  pilots: number;
  controllers: number;
}

export const PARTITIONS = ['short', 'medium', 'long'] as const;

export type Partition = (typeof PARTITIONS)[number];

export function isPartition(value: unknown): value is Partition {
  return typeof value === 'string' && (PARTITIONS as readonly string[]).includes(value);
}
