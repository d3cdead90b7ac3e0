export * from './types.js';
export * from './errors.js';

export { RateLimiter } from './rate-limit/rate-limiter.js';
export type * from './rate-limit/types.js';

export { RetryPolicy } from './retry/retry-policy.js';
export { classifyNetworkError, classifyStatus, parseRetryAfter } from './retry/failure-classifier.js';
export type * from './retry/types.js';

export { Connection, hostKeyFor, type ConnectionFactory } from './connection/connection.js';
export { ConnectionPool, ConnectionHandle } from './connection/connection-pool.js';
export {
  AxiosConnection,
  axiosConnectionFactory,
  proxyFromUrl,
  type AxiosConnectionOptions,
  type TlsOptions,
} from './connection/axios-connection.js';
export type * from './connection/types.js';

export { ResponseNormalizer, type NormalizeResult } from './normalize/response-normalizer.js';
export { parseContentType, bodyFormatFor } from './normalize/content-type.js';
export { encodeForm, decodeForm, formBody, type FormInput } from './normalize/form.js';
export { parseXml } from './normalize/xml.js';
export { canonicalToJson } from './normalize/canonical.js';

export { RequestExecutor } from './executor/request-executor.js';
export type { ExecutorState, StateChangeListener, RequestExecutorOptions } from './executor/types.js';

export { ExecutorMetrics, type MetricSnapshot } from './observability/metrics.js';
export { describeExchange } from './observability/request-debug.js';

export { executorConfigSchema, loadExecutorConfig, type ExecutorConfig } from './config/executor-config.js';

export { BaseApiClient, type ApiRecord, type BaseApiClientOptions } from './client/base-client.js';
export type { FailedRecord, Results, ResultOptions } from './client/results.js';

export { joinUrl, isValidUrl, type QueryParams } from './utils/url.js';
export { formatJson, cleanupRecord, sortRecords } from './utils/json.js';
