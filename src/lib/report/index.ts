/**
 * Crawl Report
 * Main export file for report aggregation and sinks
 */

import { JsonReportSink } from './sinks/json.sink';
import { SqliteReportSink } from './sinks/sqlite.sink';
import { ReportSink } from './report.types';

export * from './report.types';
export * from './result-aggregator';
export { JsonReportSink, SqliteReportSink };

export type OutputFormat = 'json' | 'sqlite' | 'both';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'sqlite', 'both'];

export function createReportSinks(format: OutputFormat): ReportSink[] {
  switch (format) {
    case 'json':
      return [new JsonReportSink()];
    case 'sqlite':
      return [new SqliteReportSink()];
    case 'both':
      return [new JsonReportSink(), new SqliteReportSink()];
  }
}

/**
 * Output path for one sink: `report` -> `report.json` / `report.db`
 */
export function sinkOutputPath(outputFile: string, format: ReportSink['format']): string {
  const extension = format === 'json' ? '.json' : '.db';
  const stem = outputFile.replace(/\.(json|db|sqlite)$/i, '');
  return `${stem}${extension}`;
}
