import type { ExportOptions } from './htmlExport';

export interface ChartOptions extends ExportOptions {
  /** Year used for ongoing roles and the "Today" marker; defaults to now */
  currentYear?: number;
}

export function currentYearOf(options: ChartOptions): number {
  return options.currentYear ?? new Date().getFullYear();
}
