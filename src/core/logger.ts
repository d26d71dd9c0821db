import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { EtlPhase, PipelineSummary } from './types';
import { isEtlError } from './errors';

export type LogMeta = Record<string, unknown>;

/**
 * Logging capability handed to every pipeline stage.
 */
export interface EtlLogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  logPhaseStart(phase: EtlPhase): void;
  logPhaseEnd(phase: EtlPhase, recordCount?: number): void;
  logError(error: Error, context?: LogMeta): void;
  logSummary(summary: PipelineSummary): void;
}

export interface PipelineLoggerOptions {
  level?: string;
  logDir?: string;
  console?: boolean;
  transports?: winston.transport[];
}

const RESERVED_KEYS = new Set(['level', 'message', 'timestamp']);

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatLine(info: winston.Logform.TransformableInfo): string {
  const meta = Object.entries(info)
    .filter(([key, value]) => !RESERVED_KEYS.has(key) && value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
  const line = `${String(info.timestamp)} - ${info.level} - ${String(info.message)}`;
  return meta ? `${line} ${meta}` : line;
}

export class PipelineLogger implements EtlLogger {
  private logger: winston.Logger;
  private phaseStarts = new Map<EtlPhase, number>();

  constructor(options: PipelineLoggerOptions = {}) {
    const transports: winston.transport[] = [...(options.transports ?? [])];

    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      const logFile = path.join(options.logDir, 'etl_process.log');
      transports.push(new winston.transports.File({ filename: logFile }));
    }

    if (options.console ?? true) {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(formatLine)
          )
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(formatLine)
      ),
      transports
    });
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public logPhaseStart(phase: EtlPhase): void {
    this.phaseStarts.set(phase, Date.now());
    this.logger.info(`Phase started: ${phase}`);
  }

  public logPhaseEnd(phase: EtlPhase, recordCount?: number): void {
    const startedAt = this.phaseStarts.get(phase) ?? Date.now();
    const duration = Date.now() - startedAt;
    this.logger.info(`Phase completed: ${phase}`, {
      records: recordCount,
      duration_ms: duration
    });
  }

  public logError(error: Error, context?: LogMeta): void {
    this.logger.error(error.message, {
      ...context,
      kind: isEtlError(error) ? error.kind : error.name
    });
    if (error.stack) {
      this.logger.debug(error.stack);
    }
  }

  public logSummary(summary: PipelineSummary): void {
    this.logger.info('ETL process completed', {
      extracted: summary.extracted,
      malformed: summary.malformed,
      invalid_email: summary.invalid_email,
      duplicates_removed: summary.duplicates_removed,
      rows_written: summary.rows_written,
      output_path: summary.output_path,
      duration_ms: summary.duration_ms
    });
  }

  public async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}
