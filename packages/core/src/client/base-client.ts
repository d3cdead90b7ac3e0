import { createLogger } from '@rest-engine/logger';
import type { ExecutorConfig } from '../config/executor-config.js';
import { InvalidRequestError } from '../errors.js';
import { RequestExecutor } from '../executor/request-executor.js';
import { formBody, type FormInput } from '../normalize/form.js';
import { jsonBody, type EngineLogger, type HttpMethod, type JsonValue, type Request, type Response } from '../types.js';
import { joinUrl, type QueryParams } from '../utils/url.js';
import { extractRecords, finalizeResults, toFailedRecord, type ResultOptions, type Results } from './results.js';

/** One endpoint call, as plugin code describes it. */
type ApiRecord = {
  method: HttpMethod;
  endpoint: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  json?: JsonValue;
  form?: FormInput;
  /** Defaults to true for GET, PUT and DELETE. */
  idempotent?: boolean;
  timeoutMs?: number;
  /** Key of the response object that holds the records. */
  responseKey?: string;
};

type BaseApiClientOptions = {
  baseUrl: string;
  headers?: Record<string, string>;
  config?: Partial<ExecutorConfig>;
  /** Shared executor; the client then leaves closing it to the caller. */
  executor?: RequestExecutor;
  concurrency?: number;
  logger?: EngineLogger;
};

const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'PUT', 'DELETE']);

/**
 * Base for API-specific clients. Subclasses describe endpoints as
 * `ApiRecord`s; the client builds requests, runs them through the executor
 * and sorts outcomes into success and failure lists.
 */
export class BaseApiClient {
  readonly baseUrl: string;
  protected readonly executor: RequestExecutor;
  protected readonly headers: Record<string, string>;
  protected readonly concurrency: number;
  protected readonly logger: EngineLogger;
  private readonly ownsExecutor: boolean;

  constructor(options: BaseApiClientOptions) {
    const concurrency = options.concurrency ?? 5;

    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    this.baseUrl = options.baseUrl;
    this.headers = { ...options.headers };
    this.concurrency = concurrency;
    this.logger = options.logger ?? createLogger('BaseApiClient');
    this.ownsExecutor = options.executor === undefined;
    this.executor = options.executor ?? new RequestExecutor({ config: options.config });
  }

  buildRequest(record: ApiRecord): Request {
    if (record.json !== undefined && record.form !== undefined) {
      throw new InvalidRequestError([`${record.method} ${record.endpoint}: json and form bodies are mutually exclusive`]);
    }

    const body =
      record.json !== undefined ? jsonBody(record.json) : record.form !== undefined ? formBody(record.form) : undefined;

    return {
      method: record.method,
      url: joinUrl(this.baseUrl, record.endpoint, record.query),
      headers: { ...this.headers, ...record.headers },
      idempotent: record.idempotent ?? IDEMPOTENT_METHODS.has(record.method),
      ...(body === undefined ? {} : { body }),
      ...(record.timeoutMs === undefined ? {} : { timeoutMs: record.timeoutMs }),
    };
  }

  /** Rejects, never throws, when the record cannot be turned into a request. */
  async request(record: ApiRecord): Promise<Response> {
    return this.executor.execute(this.buildRequest(record));
  }

  /**
   * Runs every record with at most `concurrency` in flight. Never rejects:
   * each record lands in `success` (its extracted records) or `failure`.
   */
  async requestAll(records: readonly ApiRecord[], options: ResultOptions = {}): Promise<Results> {
    const results: Results = { success: [], failure: [] };
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < records.length) {
        const record = records[next];
        next += 1;

        try {
          const response = await this.request(record);
          results.success.push(...extractRecords(response, record.responseKey));
        } catch (error) {
          results.failure.push(toFailedRecord(record.method, record.endpoint, error));
        }
      }
    };

    const workerCount = Math.min(this.concurrency, Math.max(records.length, 1));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    this.logger.info(
      `Completed ${records.length} requests: ${results.success.length} records, ${results.failure.length} failures`,
    );
    this.executor.logMetrics();

    return finalizeResults(results, options);
  }

  close(): void {
    if (this.ownsExecutor) {
      this.executor.close();
    }
  }
}

export type { ApiRecord, BaseApiClientOptions };
