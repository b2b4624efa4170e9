export const CHART_WINDOWS = ['realtime', 'daily', 'weekly', 'monthly'] as const;

export type ChartWindow = (typeof CHART_WINDOWS)[number];

export function isChartWindow(value: unknown): value is ChartWindow {
  return typeof value === 'string' && (CHART_WINDOWS as readonly string[]).includes(value);
}

export const CHART_RENDERER = 'CHART_RENDERER';

export const REALTIME_LOOKBACK_HOURS = 26;

export interface ChartColors {
  primary: string;
  secondary: string;
}

export const CHART_COLORS = {
  realtimeControllersActive: { primary: '#2FFF9A', secondary: '#A0FFD1' },
  realtimeNoControllers: { primary: '#FF5250', secondary: '#FFA5A3' },
  daily: { primary: '#007BFF', secondary: '#80DFFF' },
  weekly: { primary: '#8000FF', secondary: '#D580FF' },
  monthly: { primary: '#AAAAAA', secondary: '#FFFFFF' },
} satisfies Record<string, ChartColors>;
