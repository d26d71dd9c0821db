import http from 'http';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EtlLogger, LogMeta } from '../src/core/logger';
import { EtlPhase, PipelineSummary } from '../src/core/types';
import { isEtlError } from '../src/core/errors';

export interface LogEntry {
  level: 'info' | 'warn' | 'error';
  message: string;
  meta?: LogMeta;
}

export class RecordingLogger implements EtlLogger {
  public entries: LogEntry[] = [];

  info(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'info', message, meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'warn', message, meta });
  }

  logPhaseStart(phase: EtlPhase): void {
    this.info(`Phase started: ${phase}`);
  }

  logPhaseEnd(phase: EtlPhase, recordCount?: number): void {
    this.info(`Phase completed: ${phase}`, { records: recordCount });
  }

  logError(error: Error, context?: LogMeta): void {
    this.entries.push({
      level: 'error',
      message: error.message,
      meta: { ...context, kind: isEtlError(error) ? error.kind : error.name }
    });
  }

  logSummary(summary: PipelineSummary): void {
    this.info('ETL process completed', { ...summary });
  }

  messages(level?: LogEntry['level']): string[] {
    return this.entries.filter(e => !level || e.level === level).map(e => e.message);
  }
}

export interface TestServer {
  url: string;
  close(): Promise<void>;
}

export async function startServer(handler: http.RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(err => (err ? reject(err) : resolve()));
      })
  };
}

export function sendJson(res: http.ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(body);
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'users-etl-'));
}
