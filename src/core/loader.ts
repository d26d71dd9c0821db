import * as fs from 'fs';
import { FileHandle } from 'fs/promises';
import * as path from 'path';
import * as csvWriter from 'csv-writer';
import csv from 'csv-parser';
import { EtlLogger } from './logger';
import { CleanUserRecord, CSV_FIELDS } from './types';
import { OutputValidationError, WriteError } from './errors';

interface CsvContents {
  headers: string[];
  rows: Record<string, string>[];
}

export class CsvLoader {
  private headerStringifier = csvWriter.createObjectCsvStringifier({
    header: CSV_FIELDS.map(field => ({ id: field, title: field }))
  });
  // Minimal quoting leaves a bare \r unquoted, which readers take for a CRLF ending
  private rowStringifier = csvWriter.createObjectCsvStringifier({
    header: CSV_FIELDS.map(field => ({ id: field, title: field })),
    alwaysQuote: true
  });

  constructor(private logger: EtlLogger) {}

  public async load(records: readonly CleanUserRecord[], outputPath: string): Promise<number> {
    if (records.length === 0) {
      this.logger.warn('No users data provided for loading, writing header only');
    }

    await this.ensureOutputDirectory(outputPath);
    this.logger.info(`Saving ${records.length} users to ${outputPath}`);

    let handle: FileHandle | undefined;
    try {
      handle = await fs.promises.open(outputPath, 'w');
      const header = this.headerStringifier.getHeaderString() ?? '';
      // stringifyRecords([]) yields a lone record delimiter
      const body = records.length > 0 ? this.rowStringifier.stringifyRecords(records.map(toCsvRow)) : '';
      await handle.writeFile(header + body, 'utf8');
    } catch (error) {
      throw this.writeError(`Failed to write to file ${outputPath}`, outputPath, error);
    } finally {
      if (handle) {
        await handle.close().catch((error: unknown) => {
          throw this.writeError(`Failed to close file ${outputPath}`, outputPath, error);
        });
      }
    }

    this.logger.info(`Successfully saved data to ${outputPath}`);
    return records.length;
  }

  public async readRecords(filePath: string): Promise<CleanUserRecord[]> {
    const { rows } = await readCsv(filePath);
    return rows.map(row => ({
      id: Number(row.id),
      name: row.name ?? '',
      email: row.email ?? '',
      full_address: row.full_address ?? ''
    }));
  }

  /**
   * Re-reads a written file and checks the header and row count.
   */
  public async validate(filePath: string, expectedRows: number): Promise<number> {
    if (!fs.existsSync(filePath)) {
      throw new OutputValidationError(`CSV file does not exist: ${filePath}`);
    }

    const { headers, rows } = await readCsv(filePath);
    if (headers.join(',') !== CSV_FIELDS.join(',')) {
      throw new OutputValidationError(
        `CSV has incorrect fields. Expected: ${CSV_FIELDS.join(',')}, Got: ${headers.join(',')}`
      );
    }
    if (rows.length !== expectedRows) {
      throw new OutputValidationError(
        `CSV has ${rows.length} data rows, expected ${expectedRows}`
      );
    }

    this.logger.info(`CSV validation successful. File has ${rows.length} data rows`);
    return rows.length;
  }

  private async ensureOutputDirectory(outputPath: string): Promise<void> {
    const directory = path.dirname(outputPath);
    if (fs.existsSync(directory)) return;

    try {
      await fs.promises.mkdir(directory, { recursive: true });
    } catch (error) {
      throw this.writeError(`Failed to create output directory ${directory}`, outputPath, error);
    }
    this.logger.info(`Created output directory: ${directory}`);
  }

  private writeError(message: string, outputPath: string, cause: unknown): WriteError {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    return new WriteError(`${message}${reason}`, outputPath, cause);
  }
}

function toCsvRow(record: CleanUserRecord) {
  return {
    id: record.id,
    name: record.name,
    email: record.email,
    full_address: record.full_address
  };
}

function readCsv(filePath: string): Promise<CsvContents> {
  return new Promise((resolve, reject) => {
    const contents: CsvContents = { headers: [], rows: [] };

    fs.createReadStream(filePath, { encoding: 'utf8' })
      .on('error', reject)
      .pipe(csv())
      .on('headers', (headers: string[]) => {
        contents.headers = headers;
      })
      .on('data', (row: Record<string, string>) => {
        contents.rows.push(row);
      })
      .on('error', reject)
      .on('end', () => resolve(contents));
  });
}
