import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { UserEtlPipeline } from '../src/pipeline/user-etl-pipeline';
import { UserExtractor } from '../src/core/extractor';
import { HttpError, WriteError } from '../src/core/errors';
import { RecordingLogger, TestServer, makeTempDir, sendJson, startServer } from './helpers';

const address = { street: 'Main', suite: '1', city: 'X', zipcode: '000' };

const rawUsers = [
  { id: 1, name: 'ana', email: 'ana@x.com', address },
  { id: 1, name: 'dup', email: 'dup@x.com', address },
  { id: 2, name: 'bob', email: 'not-an-email', address },
  { id: 3, name: 'cy', email: 'cy@x.com', address: { city: 'Y' } },
  'not a record'
];

describe('UserEtlPipeline', () => {
  let server: TestServer;
  let tempDir: string;
  let logger: RecordingLogger;

  beforeAll(async () => {
    server = await startServer((req, res) => {
      if (req.url === '/users') return sendJson(res, 200, JSON.stringify(rawUsers));
      if (req.url === '/empty') return sendJson(res, 200, '[]');
      return sendJson(res, 500, '{"error":"internal"}');
    });
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    tempDir = makeTempDir();
    logger = new RecordingLogger();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function pipelineFor(route: string, outputPath: string): UserEtlPipeline {
    return new UserEtlPipeline(
      { sourceUrl: `${server.url}${route}`, outputPath },
      { logger, extractor: new UserExtractor(logger, { timeoutMs: 1000 }) }
    );
  }

  it('extracts, cleans and writes users to CSV', async () => {
    const outputPath = path.join(tempDir, 'out', 'users.csv');

    const summary = await pipelineFor('/users', outputPath).execute();

    expect(summary).toMatchObject({
      extracted: 5,
      malformed: 1,
      invalid_email: 1,
      duplicates_removed: 1,
      rows_written: 2,
      output_path: outputPath
    });
    expect(fs.readFileSync(outputPath, 'utf8')).toBe(
      'id,name,email,full_address\n' +
      '"1","ANA","ana@x.com","Main, 1, X, 000"\n' +
      '"3","CY","cy@x.com","Y"\n'
    );
  });

  it('logs each phase in order and a final summary', async () => {
    await pipelineFor('/users', path.join(tempDir, 'users.csv')).execute();

    const phases = logger.messages().filter(m => m.startsWith('Phase'));
    expect(phases).toEqual([
      'Phase started: extract',
      'Phase completed: extract',
      'Phase started: transform',
      'Phase completed: transform',
      'Phase started: load',
      'Phase completed: load',
      'Phase started: validate',
      'Phase completed: validate'
    ]);
    const summary = logger.entries.find(e => e.message === 'ETL process completed');
    expect(summary?.meta).toMatchObject({ extracted: 5, rows_written: 2 });
    expect(logger.messages().slice(-2)).toEqual(['ETL Process Ended', '='.repeat(50)]);
  });

  it('writes a header-only CSV for an empty response', async () => {
    const outputPath = path.join(tempDir, 'users.csv');

    const summary = await pipelineFor('/empty', outputPath).execute();

    expect(summary.extracted).toBe(0);
    expect(summary.rows_written).toBe(0);
    expect(fs.readFileSync(outputPath, 'utf8')).toBe('id,name,email,full_address\n');
    expect(logger.messages('warn')).toContain('No users remaining after transformation');
  });

  it('stops after a failed extract and writes nothing', async () => {
    const outputPath = path.join(tempDir, 'users.csv');

    const error = await pipelineFor('/fail', outputPath).execute().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(500);
    }
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(logger.messages()).not.toContain('Phase started: transform');
    expect(logger.entries.filter(e => e.level === 'error').map(e => e.meta)).toEqual([
      { stage: 'extract', kind: 'HttpError' }
    ]);
  });

  it('surfaces a load failure with its stage', async () => {
    const outputPath = path.join(tempDir, 'taken');
    fs.mkdirSync(outputPath);

    await expect(pipelineFor('/users', outputPath).execute()).rejects.toBeInstanceOf(WriteError);

    expect(logger.messages()).not.toContain('Phase started: validate');
    expect(logger.entries.filter(e => e.level === 'error').map(e => e.meta)).toEqual([
      { stage: 'load', kind: 'WriteError' }
    ]);
  });
});
