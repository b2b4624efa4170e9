import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import * as fs from 'fs';
import { regionSchema } from '../config/config.schema';
import { configPath, readConfigFile } from '../common/utils/app.config';
import { errorMessage } from '../common/utils/errors';
import { RegionScope } from './region-classifier';

const RELOAD_CHECK_INTERVAL_MS = 60 * 1000;

/**
 * Owns the current region prefix set. Callers take a {@link RegionScope}
 * snapshot per query; the set is swapped when config.yaml changes on disk.
 */
@Injectable()
export class RegionService {
  private readonly logger = new Logger(RegionService.name);
  private scope: RegionScope;
  private lastMtimeMs = 0;

  constructor(private readonly config: ConfigService) {
    this.scope = new RegionScope(this.config.get<string[]>('region.prefixes') ?? []);
    this.lastMtimeMs = this.readMtime() ?? 0;
  }

  current(): RegionScope {
    return this.scope;
  }

  @Interval(RELOAD_CHECK_INTERVAL_MS)
  checkForUpdates(): boolean {
    const mtime = this.readMtime();
    if (mtime === null || mtime <= this.lastMtimeMs) {
      return false;
    }
    this.lastMtimeMs = mtime;

    let parsed: unknown;
    try {
      parsed = readConfigFile(configPath());
    } catch (error) {
      this.logger.error(`[CONFIG] Reload failed: ${errorMessage(error)}`);
      return false;
    }

    const section = isRecord(parsed) ? parsed.region : undefined;
    const { error, value } = regionSchema.validate(section);
    if (error) {
      this.logger.warn(`[CONFIG] Invalid region section, keeping previous prefixes: ${error.message}`);
      return false;
    }

    const next = new RegionScope(value.prefixes);
    if (next.prefixes.join(',') === this.scope.prefixes.join(',')) {
      return false;
    }

    this.logger.log(
      `[CONFIG] Region prefixes: ${this.scope.prefixes.join(',')} -> ${next.prefixes.join(',')}`,
    );
    this.scope = next;
    return true;
  }

  private readMtime(): number | null {
    try {
      return fs.statSync(configPath()).mtimeMs;
    } catch (error) {
      return null;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
