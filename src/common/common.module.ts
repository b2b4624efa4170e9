import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ApiExceptionFilter } from './filters/api-exception.filter';
import { ApiEnabledGuard } from './guards/api-enabled.guard';

@Module({
  imports: [ConfigModule],
  providers: [ApiEnabledGuard, ApiExceptionFilter],
  exports: [ApiEnabledGuard, ApiExceptionFilter],
})
export class CommonModule {}
