import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { Mutex } from 'async-mutex';
import {
  Between,
  DataSource,
  EntityManager,
  FindOperator,
  LessThan,
  LessThanOrEqual,
  MoreThanOrEqual,
} from 'typeorm';
import { errorMessage } from '../common/utils/errors';
import {
  FlightRecordColumns,
  PARTITION_ENTITIES,
  SampleColumns,
  SessionRecordColumns,
} from './entities';
import {
  DayCountPoint,
  ParticipantFlight,
  ParticipantSession,
  Partition,
  PARTITIONS,
  SampleCountPoint,
  SessionHistoryRow,
  StoredSample,
  StoreResult,
  Sample,
} from './types';

// Keeps multi-row inserts well under sqlite's bound-variable limit
const INSERT_CHUNK_SIZE = 100;

type FlightRow = Omit<FlightRecordColumns, 'id'>;
type SessionRow = Omit<SessionRecordColumns, 'id'>;

/** `date()` of an epoch-ms column, the UTC calendar day as YYYY-MM-DD */
const utcDay = (column: string) => `date(${column} / 1000, 'unixepoch')`;

/**
 * Append-only sample log replicated into three partitions. Each partition is
 * written in its own transaction so one failing copy never blocks the others
 * and never leaves a sample row without its records.
 *
 * All partitions share one sqlite connection, so every write (sample
 * inserts, prunes, resets) goes through a single mutex.
 */
@Injectable()
export class SnapshotStoreService {
  private readonly logger = new Logger(SnapshotStoreService.name);

  private readonly writeMutex = new Mutex();

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async store(sample: Sample): Promise<StoreResult> {
    const partitions: Record<Partition, boolean> = { short: false, medium: false, long: false };

    for (const partition of PARTITIONS) {
      try {
        await this.writeMutex.runExclusive(() =>
          this.dataSource.transaction((manager) => this.writePartition(manager, partition, sample)),
        );
        partitions[partition] = true;
      } catch (error) {
        this.logger.error(
          `[STORE] Failed to write sample to ${partition} partition: ${errorMessage(error)}`,
        );
      }
    }

    return {
      success: PARTITIONS.every((partition) => partitions[partition]),
      partitions,
    };
  }

  async latest(partition: Partition): Promise<StoredSample | null> {
    const samples = await this.dataSource.getRepository(PARTITION_ENTITIES[partition].sample).find({
      order: { id: 'DESC' },
      take: 1,
    });
    if (samples.length === 0) {
      return null;
    }
    const [sample] = await this.hydrate(partition, samples);
    return sample;
  }

  /**
   * Samples with `from <= timestamp <= to`, ascending by insertion id.
   * Either bound may be omitted.
   */
  async range(partition: Partition, from?: Date, to?: Date): Promise<StoredSample[]> {
    const bounds = timestampBounds(from, to);
    const samples = await this.dataSource.getRepository(PARTITION_ENTITIES[partition].sample).find({
      where: bounds ? { timestamp: bounds } : {},
      order: { id: 'ASC' },
    });
    return this.hydrate(partition, samples);
  }

  countSince(partition: Partition, from: Date): Promise<number> {
    return this.dataSource.getRepository(PARTITION_ENTITIES[partition].sample).count({
      where: { timestamp: MoreThanOrEqual(from.getTime()) },
    });
  }

  /**
   * Deletes samples strictly older than `olderThan` together with their
   * records. Returns the number of samples removed.
   */
  prune(partition: Partition, olderThan: Date): Promise<number> {
    const where = { timestamp: LessThan(olderThan.getTime()) };

    return this.writeMutex.runExclusive(() =>
      this.dataSource.transaction(async (manager) => {
        const samples = manager.getRepository(PARTITION_ENTITIES[partition].sample);
        const stale = await samples.count({ where });
        if (stale > 0) {
          // records go with their sample (ON DELETE CASCADE)
          await samples.delete(where);
        }
        return stale;
      }),
    );
  }

  async reset(partition: Partition): Promise<void> {
    const entities = PARTITION_ENTITIES[partition];
    await this.writeMutex.runExclusive(() =>
      this.dataSource.transaction(async (manager) => {
        await manager.getRepository(entities.flight).clear();
        await manager.getRepository(entities.session).clear();
        await manager.getRepository(entities.sample).clear();
      }),
    );
  }

  /**
   * (callsign, sample id, timestamp) for every sample since `since` in which
   * one of the callsigns was on position, grouped by callsign, newest first.
   */
  async sessionHistory(
    partition: Partition,
    callsigns: string[],
    since: Date,
  ): Promise<SessionHistoryRow[]> {
    if (callsigns.length === 0) {
      return [];
    }
    const entities = PARTITION_ENTITIES[partition];
    const rows = await this.dataSource
      .getRepository(entities.session)
      .createQueryBuilder('a')
      .innerJoin(entities.sample, 's', 's.id = a.sample_id')
      .select('a.callsign', 'callsign')
      .addSelect('s.id', 'sampleId')
      .addSelect('s.timestamp', 'timestamp')
      .where('a.callsign IN (:...callsigns)', { callsigns })
      .andWhere('s.timestamp >= :since', { since: since.getTime() })
      .orderBy('a.callsign', 'ASC')
      .addOrderBy('s.id', 'DESC')
      .getRawMany<{ callsign: string; sampleId: number; timestamp: number }>();

    return rows.map((row) => ({
      callsign: row.callsign,
      sampleId: Number(row.sampleId),
      timestamp: new Date(Number(row.timestamp)),
    }));
  }

  /** Flight and session record counts of every sample in range, by id. */
  async perSampleCounts(partition: Partition, from?: Date, to?: Date): Promise<SampleCountPoint[]> {
    const entities = PARTITION_ENTITIES[partition];
    const query = this.dataSource
      .getRepository(entities.sample)
      .createQueryBuilder('s')
      .select('s.id', 'sampleId')
      .addSelect('s.timestamp', 'timestamp')
      .addSelect(
        (sub) => sub.select('COUNT(*)').from(entities.flight, 'f').where('f.sample_id = s.id'),
        'flights',
      )
      .addSelect(
        (sub) => sub.select('COUNT(*)').from(entities.session, 'a').where('a.sample_id = s.id'),
        'sessions',
      )
      .orderBy('s.id', 'ASC');
    if (from) {
      query.andWhere('s.timestamp >= :from', { from: from.getTime() });
    }
    if (to) {
      query.andWhere('s.timestamp <= :to', { to: to.getTime() });
    }

    const rows = await query.getRawMany<{
      sampleId: number;
      timestamp: number;
      flights: number;
      sessions: number;
    }>();
    return rows.map((row) => ({
      sampleId: Number(row.sampleId),
      timestamp: new Date(Number(row.timestamp)),
      flights: Number(row.flights),
      sessions: Number(row.sessions),
    }));
  }

  /** Distinct pilots and controllers per UTC calendar day since `from`. */
  async perDayCounts(partition: Partition, from: Date): Promise<DayCountPoint[]> {
    const entities = PARTITION_ENTITIES[partition];
    const since = from.getTime();

    const days = await this.dataSource
      .getRepository(entities.sample)
      .createQueryBuilder('s')
      .select(utcDay('s.timestamp'), 'day')
      .distinct(true)
      .where('s.timestamp >= :since', { since })
      .orderBy('day', 'ASC')
      .getRawMany<{ day: string }>();

    const pilots = await this.dataSource
      .getRepository(entities.flight)
      .createQueryBuilder('f')
      .innerJoin(entities.sample, 's', 's.id = f.sample_id')
      .select(utcDay('s.timestamp'), 'day')
      .addSelect('COUNT(DISTINCT COALESCE(f.user_id, f.callsign))', 'count')
      .where('s.timestamp >= :since', { since })
      .groupBy('day')
      .getRawMany<{ day: string; count: number }>();

    const controllers = await this.dataSource
      .getRepository(entities.session)
      .createQueryBuilder('a')
      .innerJoin(entities.sample, 's', 's.id = a.sample_id')
      .select(utcDay('s.timestamp'), 'day')
      .addSelect('COUNT(DISTINCT COALESCE(a.user_id, a.callsign))', 'count')
      .where('s.timestamp >= :since', { since })
      .groupBy('day')
      .getRawMany<{ day: string; count: number }>();

    const pilotsByDay = new Map(pilots.map((row) => [row.day, Number(row.count)]));
    const controllersByDay = new Map(controllers.map((row) => [row.day, Number(row.count)]));
    return days.map(({ day }) => ({
      day,
      pilots: pilotsByDay.get(day) ?? 0,
      controllers: controllersByDay.get(day) ?? 0,
    }));
  }

  private async writePartition(
    manager: EntityManager,
    partition: Partition,
    sample: Sample,
  ): Promise<void> {
    const entities = PARTITION_ENTITIES[partition];
    const saved = await manager
      .getRepository(entities.sample)
      .save({ timestamp: sample.timestamp.getTime() });

    const flights = sample.flights.map((flight) => toFlightRow(saved.id, flight));
    for (let i = 0; i < flights.length; i += INSERT_CHUNK_SIZE) {
      await manager.insert(entities.flight, flights.slice(i, i + INSERT_CHUNK_SIZE));
    }

    const sessions = sample.sessions.map((session) => toSessionRow(saved.id, session));
    for (let i = 0; i < sessions.length; i += INSERT_CHUNK_SIZE) {
      await manager.insert(entities.session, sessions.slice(i, i + INSERT_CHUNK_SIZE));
    }
  }

  private async hydrate(partition: Partition, samples: SampleColumns[]): Promise<StoredSample[]> {
    if (samples.length === 0) {
      return [];
    }
    const entities = PARTITION_ENTITIES[partition];
    const ids = samples.map((sample) => Number(sample.id));
    const sampleIds = Between(Math.min(...ids), Math.max(...ids));

    const flightRows = await this.dataSource.getRepository(entities.flight).find({
      where: { sample_id: sampleIds },
      order: { id: 'ASC' },
    });
    const sessionRows = await this.dataSource.getRepository(entities.session).find({
      where: { sample_id: sampleIds },
      order: { id: 'ASC' },
    });

    const byId = new Map<number, StoredSample>();
    for (const sample of samples) {
      byId.set(Number(sample.id), {
        id: Number(sample.id),
        timestamp: new Date(Number(sample.timestamp)),
        flights: [],
        sessions: [],
      });
    }
    for (const row of flightRows) {
      byId.get(Number(row.sample_id))?.flights.push(fromFlightRow(row));
    }
    for (const row of sessionRows) {
      byId.get(Number(row.sample_id))?.sessions.push(fromSessionRow(row));
    }
    return ids.map((id) => byId.get(id)).filter((s): s is StoredSample => s !== undefined);
  }
}

function timestampBounds(from?: Date, to?: Date): FindOperator<number> | undefined {
  if (from && to) return Between(from.getTime(), to.getTime());
  if (from) return MoreThanOrEqual(from.getTime());
  if (to) return LessThanOrEqual(to.getTime());
  return undefined;
}

function toFlightRow(sampleId: number, flight: ParticipantFlight): FlightRow {
  return {
    sample_id: sampleId,
    user_id: flight.subjectId,
    callsign: flight.callsign,
    departure: flight.departure,
    arrival: flight.arrival,
    route: flight.route,
    seats: flight.seats,
    aircraft: flight.aircraft,
  };
}

function toSessionRow(sampleId: number, session: ParticipantSession): SessionRow {
  return {
    sample_id: sampleId,
    user_id: session.subjectId,
    callsign: session.callsign,
    frequency: session.frequency,
    status: session.status,
  };
}

function fromFlightRow(row: FlightRow): ParticipantFlight {
  return {
    subjectId: row.user_id,
    callsign: row.callsign,
    departure: row.departure,
    arrival: row.arrival,
    route: row.route,
    seats: Number(row.seats),
    aircraft: row.aircraft,
  };
}

function fromSessionRow(row: SessionRow): ParticipantSession {
  return {
    subjectId: row.user_id,
    callsign: row.callsign,
    frequency: row.frequency === null ? null : Number(row.frequency),
    status: row.status,
  };
}
