import axios, { AxiosInstance } from 'axios';
import { EtlLogger } from './logger';
import {
  ConnectionError,
  DecodeError,
  EtlError,
  HttpError,
  SchemaError,
  TimeoutError
} from './errors';

export interface ExtractorOptions {
  timeoutMs: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class UserExtractor {
  private httpClient: AxiosInstance;
  private timeoutMs: number;

  constructor(private logger: EtlLogger, options: ExtractorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.httpClient = axios.create({
      headers: { Accept: 'application/json' },
      timeout: this.timeoutMs,
      responseType: 'text',
      // Decoding happens below so a bad body maps to DecodeError
      transformResponse: [(data: unknown) => data]
    });
  }

  public async extract(url: string): Promise<unknown[]> {
    this.logger.info(`Fetching user data from ${url}`);

    try {
      const body = await this.fetchBody(url);
      const users = this.decode(body);

      this.logger.info(`Successfully extracted ${users.length} users`);
      return users;
    } catch (error) {
      if (error instanceof EtlError) {
        this.logger.warn(`Extraction failed: ${error.kind}`, { url });
      }
      throw error;
    }
  }

  private async fetchBody(url: string): Promise<string> {
    try {
      const response = await this.httpClient.get<string>(url, { timeout: this.timeoutMs });
      return response.data;
    } catch (error) {
      throw this.toTransportError(error, url);
    }
  }

  private decode(body: string): unknown[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DecodeError(`Invalid JSON response: ${reason}`, error);
    }

    if (!Array.isArray(parsed)) {
      const shape = parsed === null ? 'null' : typeof parsed;
      throw new SchemaError(`Expected API response to be a list, got ${shape}`);
    }
    return parsed;
  }

  private toTransportError(error: unknown, url: string): unknown {
    if (!axios.isAxiosError(error)) {
      return error;
    }

    if (error.response) {
      const status = error.response.status;
      return new HttpError(`HTTP error occurred: ${status} for ${url}`, status, error);
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(`Request timed out after ${this.timeoutMs}ms`, this.timeoutMs, error);
    }
    return new ConnectionError(`Connection error occurred: ${error.code ?? error.message}`, error);
  }
}
