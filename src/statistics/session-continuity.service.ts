import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../common/utils/errors';
import { HOUR_MS, MINUTE_MS } from '../common/utils/time';
import { SnapshotStoreService } from '../snapshots/snapshot-store.service';

export interface HistoryEntry {
  sampleId: number;
  timestamp: Date;
}

/**
 * Start of the unbroken run that ends at `entries[0]` (entries newest
 * first). A run continues while sample ids are adjacent; a jump in wall-clock
 * time between adjacent samples does not break it.
 */
export function reconstructSessionStart(entries: readonly HistoryEntry[]): HistoryEntry | null {
  if (entries.length === 0) {
    return null;
  }
  let start = entries[0];
  for (let i = 1; i < entries.length; i++) {
    if (start.sampleId - entries[i].sampleId > 1) {
      break;
    }
    start = entries[i];
  }
  return start;
}

export function sessionMinutes(start: Date, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - start.getTime()) / MINUTE_MS)) + 1;
}

@Injectable()
export class SessionContinuityService {
  private readonly logger = new Logger(SessionContinuityService.name);

  constructor(
    private readonly store: SnapshotStoreService,
    private readonly config: ConfigService,
  ) {}

  /**
   * Minutes each controller has been continuously on position as of `now`,
   * keyed by uppercased callsign. Never throws: a failed lookup reports zero
   * for every callsign.
   */
  async getSessionMinutes(callsigns: string[], now: Date = new Date()): Promise<Record<string, number>> {
    const keys = Array.from(new Set(callsigns.map((c) => c.trim().toUpperCase()))).filter(Boolean);
    const result: Record<string, number> = {};
    for (const key of keys) {
      result[key] = 0;
    }
    if (keys.length === 0) {
      return result;
    }

    const lookbackHours = this.config.get<number>('sessions.lookback_hours') ?? 24;
    const since = new Date(now.getTime() - lookbackHours * HOUR_MS);

    try {
      const rows = await this.store.sessionHistory('short', keys, since);
      const byCallsign = new Map<string, HistoryEntry[]>();
      for (const row of rows) {
        const entries = byCallsign.get(row.callsign) ?? [];
        entries.push({ sampleId: row.sampleId, timestamp: row.timestamp });
        byCallsign.set(row.callsign, entries);
      }

      for (const [callsign, entries] of byCallsign) {
        const start = reconstructSessionStart(entries);
        if (start) {
          result[callsign] = sessionMinutes(start.timestamp, now);
        }
      }
    } catch (error) {
      this.logger.error(`[SESSIONS] History lookup failed: ${errorMessage(error)}`);
      for (const key of keys) {
        result[key] = 0;
      }
    }

    return result;
  }
}
