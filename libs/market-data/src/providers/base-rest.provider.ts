import { Logger } from '@nestjs/common';
import { AxiosInstance, AxiosRequestConfig, isAxiosError } from 'axios';
import { errorMessage } from '@libs/core';
import { extractRecords, parseRecords } from '../normalizers';
import { SourceSnapshot } from '../models';

/**
 * Shared plumbing for REST sources: one GET per call, errors turned into an
 * empty result and counted.
 */
export abstract class BaseRestProvider {
  readonly source: string;
  protected readonly logger: Logger;
  protected requests = 0;
  protected failures = 0;
  protected droppedRecords = 0;
  protected lastError: string | null = null;
  protected lastSuccessTs: number | null = null;

  protected constructor(
    source: string,
    protected readonly http: AxiosInstance,
  ) {
    this.source = source;
    this.logger = new Logger(`${source}-provider`);
  }

  /** Returns the parsed rows of `path`, or an empty list when the request fails. */
  protected async fetchRows<T>(
    label: string,
    path: string,
    params: AxiosRequestConfig['params'],
    normalize: (record: unknown) => T | null,
  ): Promise<T[]> {
    this.requests += 1;
    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(path, { params });
      payload = response.data;
    } catch (error) {
      this.recordFailure(label, error);
      return [];
    }

    const { items, dropped } = parseRecords(extractRecords(payload), normalize);
    if (dropped > 0) {
      this.droppedRecords += dropped;
      this.logger.warn(`${label}: dropped ${dropped} malformed record(s)`);
    }
    this.lastSuccessTs = Date.now();
    return items;
  }

  getSnapshot(): SourceSnapshot {
    return {
      source: this.source,
      requests: this.requests,
      failures: this.failures,
      droppedRecords: this.droppedRecords,
      lastError: this.lastError,
      lastSuccessTs: this.lastSuccessTs,
    };
  }

  private recordFailure(label: string, error: unknown): void {
    this.failures += 1;
    const status = isAxiosError(error) ? error.response?.status : undefined;
    const reason = status ? `HTTP ${status}` : errorMessage(error);
    this.lastError = `${label}: ${reason}`;
    this.logger.warn(`${label} request failed (${reason})`);
  }
}
