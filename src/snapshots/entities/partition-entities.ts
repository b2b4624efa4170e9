import { Partition } from '../types';
import {
  FlightRecordColumns,
  LongFlightRecord,
  MediumFlightRecord,
  ShortFlightRecord,
} from './flight-record.entity';
import { LongSample, MediumSample, SampleColumns, ShortSample } from './sample.entity';
import {
  LongSessionRecord,
  MediumSessionRecord,
  SessionRecordColumns,
  ShortSessionRecord,
} from './session-record.entity';

export interface PartitionEntities {
  sample: new () => SampleColumns;
  flight: new () => FlightRecordColumns;
  session: new () => SessionRecordColumns;
}

export const PARTITION_ENTITIES: Record<Partition, PartitionEntities> = {
  short: { sample: ShortSample, flight: ShortFlightRecord, session: ShortSessionRecord },
  medium: { sample: MediumSample, flight: MediumFlightRecord, session: MediumSessionRecord },
  long: { sample: LongSample, flight: LongFlightRecord, session: LongSessionRecord },
};
