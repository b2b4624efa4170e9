import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';

interface MetarResponse {
  raw?: string | null;
}

interface CachedMetar {
  metar: string | null;
  fetchedAt: number;
}

const REQUEST_TIMEOUT_MS = 10000;

/**
 * Raw METAR text per station, refreshed at most once per
 * `metar.refresh_seconds`. Without a token nothing is fetched.
 */
@Injectable()
export class MetarService {
  private readonly logger = new Logger(MetarService.name);
  private readonly cache = new Map<string, CachedMetar>();

  constructor(
    private readonly httpService: HttpService,
    private readonly config: ConfigService,
  ) {}

  async getMetar(station?: string): Promise<string | null> {
    const icao = (station ?? this.config.get<string>('metar.station') ?? '').toUpperCase();
    if (!icao) {
      return null;
    }

    const refreshMs = (this.config.get<number>('metar.refresh_seconds') ?? 300) * 1000;
    const cached = this.cache.get(icao);
    if (cached && Date.now() - cached.fetchedAt < refreshMs) {
      return cached.metar;
    }

    const metar = await this.fetch(icao);
    this.cache.set(icao, { metar, fetchedAt: Date.now() });
    return metar;
  }

  private async fetch(icao: string): Promise<string | null> {
    const token = this.config.get<string>('metar.token');
    if (!token) {
      return null;
    }

    const baseUrl = this.config.get<string>('metar.url');
    try {
      const response = await firstValueFrom(
        this.httpService.get<MetarResponse>(`${baseUrl}/${icao}`, {
          params: { options: 'info' },
          headers: { Authorization: `Bearer ${token}` },
          timeout: REQUEST_TIMEOUT_MS,
        }),
      );
      const raw = response.data?.raw;
      this.logger.debug(`[METAR] ${raw}`);
      return typeof raw === 'string' && raw.length > 0 ? raw : null;
    } catch (err) {
      if (isAxiosError(err) && err.response?.status === 404) {
        this.logger.warn(`[METAR] Station ${icao} not found`);
      } else {
        this.logger.error(
          `[METAR] Error fetching ${icao}`,
          err instanceof Error ? err.message : JSON.stringify(err),
        );
      }
      return null;
    }
  }
}
