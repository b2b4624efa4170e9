import { CanActivate, ExecutionContext, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

@Injectable()
export class ApiEnabledGuard implements CanActivate {
  private readonly logger = new Logger(ApiEnabledGuard.name);

  constructor(private configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const apiEnabled = this.configService.get<boolean>('api.enabled') || false;
    if (!apiEnabled) {
      const req: Request = context.switchToHttp().getRequest();
      this.logger.warn(`API call blocked: ${req.method} ${req.url}`);
      throw new NotFoundException();
    }
    return apiEnabled;
  }
}
