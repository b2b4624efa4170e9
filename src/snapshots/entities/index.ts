import { LongSample, MediumSample, ShortSample } from './sample.entity';
import { LongFlightRecord, MediumFlightRecord, ShortFlightRecord } from './flight-record.entity';
import {
  LongSessionRecord,
  MediumSessionRecord,
  ShortSessionRecord,
} from './session-record.entity';

export * from './sample.entity';
export * from './flight-record.entity';
export * from './session-record.entity';
export * from './partition-entities';

export const SNAPSHOT_ENTITIES = [
  ShortSample,
  MediumSample,
  LongSample,
  ShortFlightRecord,
  MediumFlightRecord,
  LongFlightRecord,
  ShortSessionRecord,
  MediumSessionRecord,
  LongSessionRecord,
];
