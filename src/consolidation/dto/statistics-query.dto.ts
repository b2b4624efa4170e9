import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { CHART_WINDOWS, ChartWindow } from '../../charts/chart.constants';
import { Partition, PARTITIONS } from '../../snapshots/types';
import { REPORT_WINDOWS, ReportWindow } from '../consolidation.service';

export class LiveQueryDto {
  @ApiPropertyOptional({ enum: PARTITIONS, default: 'short' })
  @IsOptional()
  @IsIn(PARTITIONS, { message: `partition must be one of ${PARTITIONS.join(', ')}` })
  partition?: Partition;
}

export class ReportQueryDto {
  @ApiProperty({ enum: REPORT_WINDOWS })
  @IsIn(REPORT_WINDOWS, { message: `window must be one of ${REPORT_WINDOWS.join(', ')}` })
  window!: ReportWindow;
}

export class ChartQueryDto {
  @ApiProperty({ enum: CHART_WINDOWS })
  @IsIn(CHART_WINDOWS, { message: `window must be one of ${CHART_WINDOWS.join(', ')}` })
  window!: ChartWindow;
}

export class SessionsQueryDto {
  @ApiProperty({ description: 'Comma-separated controller callsigns', example: 'SCEL_TWR,SCEL_APP' })
  @IsString()
  @MaxLength(1024)
  @Matches(/^[A-Za-z0-9_\-]+(,[A-Za-z0-9_\-]+)*$/, {
    message: 'callsigns must be a comma-separated list of callsigns',
  })
  callsigns!: string;
}

const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/;

export class ChartArtifactQueryDto extends ChartQueryDto {
  @ApiProperty({ description: 'Artifact file name without extension', example: 'daily-chart' })
  @Matches(/^[A-Za-z0-9_-]{1,64}$/, { message: 'name must be 1-64 letters, digits, dashes or underscores' })
  name!: string;

  @ApiPropertyOptional({ example: '#1f77b4' })
  @IsOptional()
  @Matches(HEX_COLOR, { message: 'primary must be a #rrggbb color' })
  primary?: string;

  @ApiPropertyOptional({ example: '#ff7f0e' })
  @IsOptional()
  @Matches(HEX_COLOR, { message: 'secondary must be a #rrggbb color' })
  secondary?: string;
}
