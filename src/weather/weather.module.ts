import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { MetarService } from './metar.service';

@Module({
  imports: [HttpModule],
  providers: [MetarService],
  exports: [MetarService],
})
export class WeatherModule {}
