import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { Brackets, DataSource, WhereExpressionBuilder } from 'typeorm';
import { MINUTE_MS, truncateToMinute } from '../common/utils/time';
import {
  categorize,
  involvesRegion,
  isInScopeController,
  RegionScope,
  RoutedFlight,
} from '../region/region-classifier';
import { PARTITION_ENTITIES, PartitionEntities } from '../snapshots/entities';
import { SnapshotStoreService } from '../snapshots/snapshot-store.service';
import { Partition, StoredSample } from '../snapshots/types';
import {
  ActiveController,
  ActiveFlight,
  AirportRanking,
  LeaderboardEntry,
  Statistics,
} from './statistics';

export const DEFAULT_LEADERBOARD_SIZE = 3;

// Minute bucket of a sample row, epoch ms truncated to the minute
const MINUTE_KEY = 's.timestamp - (s.timestamp % 60000)';

/** One flight of the window: a distinct (subject, departure, arrival, route). */
interface FlightLegRow {
  subject: string;
  departure: string;
  arrival: string;
  route: string;
  maxSeats: number;
}

interface SubjectMinutesRow {
  subject: string;
  minutes: number;
}

/**
 * Window aggregates computed in sqlite over one partition. Region prefixes
 * come in with every call as a {@link RegionScope}; nothing here holds them.
 */
@Injectable()
export class StatisticsAggregatorService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly store: SnapshotStoreService,
  ) {}

  /**
   * Aggregates every sample at or after `windowStart`. Returns null when the
   * window holds no samples.
   */
  async aggregate(
    partition: Partition,
    windowStart: Date,
    scope: RegionScope,
    leaderboardSize = DEFAULT_LEADERBOARD_SIZE,
  ): Promise<Statistics | null> {
    const sampleCount = await this.store.countSince(partition, windowStart);
    if (sampleCount === 0) {
      return null;
    }

    const entities = PARTITION_ENTITIES[partition];
    const start = windowStart.getTime();

    const legs = await this.flightLegs(entities, start, scope);
    const counts = { domestic: 0, outgoing: 0, incoming: 0 };
    for (const leg of legs) {
      const category = categorize(scope, leg);
      if (category !== 'unrelated') counts[category] += 1;
    }

    // Flight time starts with the window's second minute bucket
    const pilots = await this.pilotMinutes(entities, truncateToMinute(start) + MINUTE_MS, scope);
    const controllers = await this.controllerMinutes(entities, start, scope);

    return new Statistics({
      totalFlights: legs.length,
      domesticFlights: counts.domestic,
      outgoingFlights: counts.outgoing,
      incomingFlights: counts.incoming,
      uniquePilots: new Set(legs.map((leg) => leg.subject)).size,
      peopleOnBoard: legs.reduce((sum, leg) => sum + leg.maxSeats, 0),
      flightMinutes: totalMinutes(pilots),
      controlMinutes: totalMinutes(controllers),
      controllerCount: await this.controllerCount(entities, start, scope),
      topAirports: rankAirports(legs, scope, leaderboardSize),
      topPilots: leaderboard(pilots, leaderboardSize),
      topControllers: leaderboard(controllers, leaderboardSize),
    });
  }

  /**
   * Live view of one sample. Counts come from the sample itself; minutes and
   * person leaderboards are taken from the day aggregate when there is one.
   */
  composeLive(sample: StoredSample, scope: RegionScope, day: Statistics | null): Statistics {
    const seen = new Set<string>();
    const activeFlights: ActiveFlight[] = [];
    const subjects = new Set<string>();
    const counts = { domestic: 0, outgoing: 0, incoming: 0 };
    let peopleOnBoard = 0;

    for (const flight of sample.flights) {
      if (!involvesRegion(scope, flight)) continue;
      const key = [
        flight.callsign,
        flight.departure,
        flight.arrival,
        flight.route,
        flight.seats,
        flight.aircraft,
      ].join('|');
      if (seen.has(key)) continue;
      seen.add(key);

      activeFlights.push({
        callsign: flight.callsign,
        departure: flight.departure,
        arrival: flight.arrival,
        route: flight.route,
        seats: flight.seats,
        aircraft: flight.aircraft,
      });
      subjects.add(flight.subjectId ?? flight.callsign);
      peopleOnBoard += flight.seats;

      const category = categorize(scope, flight);
      if (category !== 'unrelated') counts[category] += 1;
    }

    const controllers = new Map<string, ActiveController>();
    for (const session of sample.sessions) {
      if (!isInScopeController(scope, session) || controllers.has(session.callsign)) continue;
      controllers.set(session.callsign, {
        callsign: session.callsign,
        frequency: session.frequency,
        status: session.status,
      });
    }

    return new Statistics({
      totalFlights: activeFlights.length,
      domesticFlights: counts.domestic,
      outgoingFlights: counts.outgoing,
      incomingFlights: counts.incoming,
      uniquePilots: subjects.size,
      peopleOnBoard,
      flightMinutes: day?.flightMinutes ?? 0,
      controlMinutes: day?.controlMinutes ?? 0,
      controllerCount: controllers.size,
      activeFlights,
      activeControllers: Array.from(controllers.values()),
      topAirports: rankAirports(activeFlights, scope, DEFAULT_LEADERBOARD_SIZE),
      topPilots: day?.topPilots?.slice(),
      topControllers: day?.topControllers?.slice(),
    });
  }

  /** In-region flights of the window with the highest seat count each one filed. */
  private async flightLegs(
    entities: PartitionEntities,
    start: number,
    scope: RegionScope,
  ): Promise<FlightLegRow[]> {
    const rows = await this.dataSource
      .getRepository(entities.flight)
      .createQueryBuilder('f')
      .innerJoin(entities.sample, 's', 's.id = f.sample_id')
      .select('COALESCE(f.user_id, f.callsign)', 'subject')
      .addSelect('f.departure', 'departure')
      .addSelect('f.arrival', 'arrival')
      .addSelect('f.route', 'route')
      .addSelect('MAX(f.seats)', 'maxSeats')
      .where('s.timestamp >= :start', { start })
      .andWhere(involvesRegionWhere('f', scope))
      .groupBy('subject')
      .addGroupBy('f.departure')
      .addGroupBy('f.arrival')
      .addGroupBy('f.route')
      .getRawMany<FlightLegRow>();

    return rows.map((row) => ({
      subject: String(row.subject),
      departure: row.departure,
      arrival: row.arrival,
      route: row.route,
      maxSeats: Number(row.maxSeats),
    }));
  }

  /** Distinct minute buckets per subject of in-region flights since `from`. */
  private async pilotMinutes(
    entities: PartitionEntities,
    from: number,
    scope: RegionScope,
  ): Promise<SubjectMinutesRow[]> {
    const rows = await this.dataSource
      .getRepository(entities.flight)
      .createQueryBuilder('f')
      .innerJoin(entities.sample, 's', 's.id = f.sample_id')
      .select('COALESCE(f.user_id, f.callsign)', 'subject')
      .addSelect(`COUNT(DISTINCT ${MINUTE_KEY})`, 'minutes')
      .where('s.timestamp >= :from', { from })
      .andWhere(involvesRegionWhere('f', scope))
      .groupBy('subject')
      .getRawMany<SubjectMinutesRow>();
    return rows.map(toSubjectMinutes);
  }

  /** Distinct minute buckets per subject of in-scope controllers. */
  private async controllerMinutes(
    entities: PartitionEntities,
    start: number,
    scope: RegionScope,
  ): Promise<SubjectMinutesRow[]> {
    const rows = await this.dataSource
      .getRepository(entities.session)
      .createQueryBuilder('a')
      .innerJoin(entities.sample, 's', 's.id = a.sample_id')
      .select('COALESCE(a.user_id, a.callsign)', 'subject')
      .addSelect(`COUNT(DISTINCT ${MINUTE_KEY})`, 'minutes')
      .where('s.timestamp >= :start', { start })
      .andWhere(prefixWhere('a.callsign', scope))
      .groupBy('subject')
      .getRawMany<SubjectMinutesRow>();
    return rows.map(toSubjectMinutes);
  }

  private async controllerCount(
    entities: PartitionEntities,
    start: number,
    scope: RegionScope,
  ): Promise<number> {
    const row = await this.dataSource
      .getRepository(entities.session)
      .createQueryBuilder('a')
      .innerJoin(entities.sample, 's', 's.id = a.sample_id')
      .select('COUNT(DISTINCT a.callsign)', 'count')
      .where('s.timestamp >= :start', { start })
      .andWhere(prefixWhere('a.callsign', scope))
      .getRawOne<{ count: number }>();
    return Number(row?.count ?? 0);
  }
}

/**
 * `column` starts with one of the scope's prefixes. An empty prefix set
 * matches nothing.
 */
function prefixWhere(column: string, scope: RegionScope): Brackets {
  return new Brackets((qb: WhereExpressionBuilder) => {
    if (scope.prefixes.length === 0) {
      qb.where('1 = 0');
      return;
    }
    scope.prefixes.forEach((prefix, i) => {
      qb.orWhere(`substr(${column}, 1, ${prefix.length}) = :regionPrefix${i}`, {
        [`regionPrefix${i}`]: prefix,
      });
    });
  });
}

function involvesRegionWhere(alias: string, scope: RegionScope): Brackets {
  return new Brackets((qb: WhereExpressionBuilder) => {
    qb.where(prefixWhere(`${alias}.departure`, scope)).orWhere(
      prefixWhere(`${alias}.arrival`, scope),
    );
  });
}

function toSubjectMinutes(row: SubjectMinutesRow): SubjectMinutesRow {
  return { subject: String(row.subject), minutes: Number(row.minutes) };
}

function totalMinutes(rows: SubjectMinutesRow[]): number {
  return rows.reduce((sum, row) => sum + row.minutes, 0);
}

/** Most minutes first, ties by subject. */
function leaderboard(rows: SubjectMinutesRow[], limit: number): LeaderboardEntry[] {
  return rows
    .slice()
    .sort((a, b) => b.minutes - a.minutes || compareCodes(a.subject, b.subject))
    .slice(0, limit)
    .map((row, index) => ({ rank: index + 1, subject: row.subject, minutes: row.minutes }));
}

function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Movements per in-region airport (4-character codes only), most movements
 * first, ties by airport code.
 */
export function rankAirports(
  flights: readonly RoutedFlight[],
  scope: RegionScope,
  limit = DEFAULT_LEADERBOARD_SIZE,
): AirportRanking[] {
  const byAirport = new Map<string, AirportRanking>();
  const entry = (airport: string) => {
    let ranking = byAirport.get(airport);
    if (!ranking) {
      ranking = { airport, departures: 0, arrivals: 0 };
      byAirport.set(airport, ranking);
    }
    return ranking;
  };

  for (const flight of flights) {
    if (flight.departure.length === 4 && scope.matches(flight.departure)) {
      entry(flight.departure).departures += 1;
    }
    if (flight.arrival.length === 4 && scope.matches(flight.arrival)) {
      entry(flight.arrival).arrivals += 1;
    }
  }

  return Array.from(byAirport.values())
    .sort(
      (a, b) =>
        b.departures + b.arrivals - (a.departures + a.arrivals) ||
        compareCodes(a.airport, b.airport),
    )
    .slice(0, limit);
}
