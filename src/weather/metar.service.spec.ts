import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders } from 'axios';
import { of, throwError } from 'rxjs';
import { MetarService } from './metar.service';

describe('MetarService', () => {
  let service: MetarService;
  let settings: Record<string, unknown>;
  let now: number;

  const mockHttpService = {
    get: jest.fn(),
  };

  const mockConfigService = {
    get: jest.fn((key: string) => settings[key]),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    now = Date.UTC(2024, 4, 6, 12, 0, 0);
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    settings = {
      'metar.url': 'https://metar.example.test/api/metar',
      'metar.station': 'scel',
      'metar.token': 'test-token',
      'metar.refresh_seconds': 300,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MetarService,
        { provide: HttpService, useValue: mockHttpService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<MetarService>(MetarService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should fetch the configured station with the bearer token', async () => {
    mockHttpService.get.mockReturnValue(of({ data: { raw: 'SCEL 061200Z 18005KT CAVOK 15/05 Q1020' } }));

    const metar = await service.getMetar();

    expect(metar).toBe('SCEL 061200Z 18005KT CAVOK 15/05 Q1020');
    expect(mockHttpService.get).toHaveBeenCalledWith(
      'https://metar.example.test/api/metar/SCEL',
      expect.objectContaining({
        params: { options: 'info' },
        headers: { Authorization: 'Bearer test-token' },
      }),
    );
  });

  it('should reuse the cached report until the refresh interval passes', async () => {
    mockHttpService.get.mockReturnValue(of({ data: { raw: 'SCEL 061200Z CAVOK' } }));

    await service.getMetar();
    now += 299 * 1000;
    await service.getMetar();
    expect(mockHttpService.get).toHaveBeenCalledTimes(1);

    now += 1000;
    await service.getMetar();
    expect(mockHttpService.get).toHaveBeenCalledTimes(2);
  });

  it('should not fetch without a token', async () => {
    settings['metar.token'] = '';

    expect(await service.getMetar()).toBeNull();
    expect(mockHttpService.get).not.toHaveBeenCalled();
  });

  it('should return null when the station is unknown', async () => {
    const error = new AxiosError('Not Found', 'ERR_BAD_REQUEST', undefined, undefined, {
      status: 404,
      statusText: 'Not Found',
      headers: {},
      config: { headers: new AxiosHeaders() },
      data: {},
    });
    mockHttpService.get.mockReturnValue(throwError(() => error));

    expect(await service.getMetar('XXXX')).toBeNull();
  });

  it('should return null on network errors', async () => {
    mockHttpService.get.mockReturnValue(throwError(() => new Error('socket hang up')));

    expect(await service.getMetar()).toBeNull();
  });
});
