/**
 * JSON Report Sink
 */

import { promises as fs } from 'fs';
import path from 'path';
import { CrawlReport, ReportSink } from '../report.types';

export class JsonReportSink implements ReportSink {
  readonly format = 'json' as const;

  async write(report: CrawlReport, filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(report, null, 2), 'utf-8');
  }
}
