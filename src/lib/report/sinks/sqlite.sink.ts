/**
 * SQLite Report Sink
 * Appends one crawl per write; rows of every table carry the crawl's id
 */

import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import path from 'path';
import { classifyEndpoint } from '../../extraction/endpoint-heuristics';
import { CrawlReport, ReportSink } from '../report.types';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS crawl_summary (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    base_url TEXT NOT NULL,
    total_pages INTEGER NOT NULL,
    total_forms INTEGER NOT NULL,
    total_endpoints INTEGER NOT NULL,
    total_js_files INTEGER NOT NULL,
    total_failures INTEGER NOT NULL,
    total_denials INTEGER NOT NULL,
    max_depth INTEGER NOT NULL,
    cancelled INTEGER NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS forms (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    crawl_id INTEGER NOT NULL REFERENCES crawl_summary(id),
    action TEXT NOT NULL,
    method TEXT NOT NULL,
    fields TEXT NOT NULL,
    csrf_token TEXT,
    page_url TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS api_endpoints (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    crawl_id INTEGER NOT NULL REFERENCES crawl_summary(id),
    endpoint TEXT NOT NULL,
    type TEXT NOT NULL,
    source TEXT NOT NULL,
    method TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS pages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    crawl_id INTEGER NOT NULL REFERENCES crawl_summary(id),
    url TEXT NOT NULL,
    status_code INTEGER NOT NULL,
    content_type TEXT NOT NULL,
    title TEXT,
    depth INTEGER NOT NULL,
    kind TEXT NOT NULL,
    fetched_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS hidden_files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    crawl_id INTEGER NOT NULL REFERENCES crawl_summary(id),
    url TEXT NOT NULL,
    status_code INTEGER NOT NULL,
    sensitivity INTEGER NOT NULL
  );
`;

export class SqliteReportSink implements ReportSink {
  readonly format = 'sqlite' as const;

  async write(report: CrawlReport, filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });

    const db = new Database(filePath);
    try {
      db.exec(SCHEMA);
      this.insert(db, report);
    } finally {
      db.close();
    }
  }

  private insert(db: Database.Database, report: CrawlReport): void {
    const insertSummary = db.prepare(`
      INSERT INTO crawl_summary
        (base_url, total_pages, total_forms, total_endpoints, total_js_files,
         total_failures, total_denials, max_depth, cancelled, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertForm = db.prepare(
      'INSERT INTO forms (crawl_id, action, method, fields, csrf_token, page_url) VALUES (?, ?, ?, ?, ?, ?)'
    );
    const insertEndpoint = db.prepare(
      'INSERT INTO api_endpoints (crawl_id, endpoint, type, source, method) VALUES (?, ?, ?, ?, ?)'
    );
    const insertPage = db.prepare(
      'INSERT INTO pages (crawl_id, url, status_code, content_type, title, depth, kind, fetched_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?)'
    );
    const insertHiddenFile = db.prepare(
      'INSERT INTO hidden_files (crawl_id, url, status_code, sensitivity) VALUES (?, ?, ?, ?)'
    );

    const writeAll = db.transaction((data: CrawlReport) => {
      const { summary } = data;
      const { lastInsertRowid: crawlId } = insertSummary.run(
        summary.baseUrl,
        summary.totalPages,
        summary.totalForms,
        summary.totalEndpoints,
        summary.totalJsFiles,
        summary.totalFailures,
        summary.totalDenials,
        summary.crawlDepthReached,
        summary.cancelled ? 1 : 0,
        summary.startedAt,
        summary.finishedAt
      );

      for (const form of data.forms.all) {
        insertForm.run(crawlId, form.action, form.method, JSON.stringify(form.fields), form.csrfToken, form.pageUrl);
      }

      for (const endpoint of data.apiEndpoints.all) {
        insertEndpoint.run(crawlId, endpoint.url, classifyEndpoint(endpoint.url), endpoint.source, endpoint.httpMethodGuess);
      }

      for (const page of data.pages) {
        insertPage.run(crawlId, page.url, page.statusCode, page.contentType, page.title, page.depth, page.kind, page.fetchedAt);
      }

      for (const hit of data.hiddenFiles) {
        insertHiddenFile.run(crawlId, hit.url, hit.statusCode, hit.sensitivity);
      }
    });

    writeAll(report);
  }
}
