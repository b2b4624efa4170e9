import { Injectable } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { ChartColors, ChartWindow } from './chart.constants';

export interface ChartSeries {
  labels: string[];
  participantCounts: number[];
  controllerCounts: number[];
}

export interface ChartRenderRequest {
  window: ChartWindow;
  series: ChartSeries;
  colors: ChartColors;
  output: string;
}

/**
 * Turns a series into an artifact file at `request.output`. Implementations
 * are not expected to be safe for concurrent use.
 */
export interface ChartRenderer {
  readonly extension: string;
  render(request: ChartRenderRequest): Promise<void>;
}

/** Writes the series and colors as a JSON document for an external plotter. */
@Injectable()
export class JsonChartRenderer implements ChartRenderer {
  readonly extension = '.json';

  async render(request: ChartRenderRequest): Promise<void> {
    await fs.promises.mkdir(path.dirname(request.output), { recursive: true });
    await fs.promises.writeFile(
      request.output,
      JSON.stringify(
        {
          window: request.window,
          colors: request.colors,
          labels: request.series.labels,
          participants: request.series.participantCounts,
          controllers: request.series.controllerCounts,
        },
        null,
        2,
      ),
    );
  }
}
