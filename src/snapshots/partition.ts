import { Partition } from './types';

export interface PartitionTables {
  samples: string;
  flights: string;
  sessions: string;
}

export const PARTITION_TABLES: Record<Partition, PartitionTables> = {
  short: {
    samples: 'samples_short',
    flights: 'flight_records_short',
    sessions: 'session_records_short',
  },
  medium: {
    samples: 'samples_medium',
    flights: 'flight_records_medium',
    sessions: 'session_records_medium',
  },
  long: {
    samples: 'samples_long',
    flights: 'flight_records_long',
    sessions: 'session_records_long',
  },
};
