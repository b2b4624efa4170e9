import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ConsolidationService } from './consolidation.service';
import { RetentionService } from './retention.service';

describe('RetentionService', () => {
  let service: RetentionService;
  let enabled: boolean | undefined;

  const mockConsolidation = {
    pruneShortWindow: jest.fn(),
    resetMediumWindow: jest.fn(),
    resetLongWindow: jest.fn(),
  };

  const mockConfigService = {
    get: jest.fn(() => enabled),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    enabled = undefined;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RetentionService,
        { provide: ConsolidationService, useValue: mockConsolidation },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<RetentionService>(RetentionService);
  });

  it('should run each window job against the facade', async () => {
    mockConsolidation.pruneShortWindow.mockResolvedValue(3);
    mockConsolidation.resetMediumWindow.mockResolvedValue(undefined);
    mockConsolidation.resetLongWindow.mockResolvedValue(undefined);

    await service.pruneShortWindow();
    await service.resetMediumWindow();
    await service.resetLongWindow();

    expect(mockConsolidation.pruneShortWindow).toHaveBeenCalledTimes(1);
    expect(mockConsolidation.resetMediumWindow).toHaveBeenCalledTimes(1);
    expect(mockConsolidation.resetLongWindow).toHaveBeenCalledTimes(1);
  });

  it('should skip every job when retention is disabled', async () => {
    enabled = false;

    await service.pruneShortWindow();
    await service.resetLongWindow();

    expect(mockConfigService.get).toHaveBeenCalledWith('retention.enabled');
    expect(mockConsolidation.pruneShortWindow).not.toHaveBeenCalled();
    expect(mockConsolidation.resetLongWindow).not.toHaveBeenCalled();
  });

  it('should not throw when a job fails', async () => {
    mockConsolidation.resetMediumWindow.mockRejectedValue(new Error('SQLITE_BUSY'));

    await expect(service.resetMediumWindow()).resolves.toBeUndefined();
  });
});
