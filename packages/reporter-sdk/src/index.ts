import { ReportingClient } from './client.js';

export { ReportingClient, type ReportingClientOptions } from './client.js';
export { AsyncDispatcher, WorkerPool, type AsyncDispatcherOptions, type Task } from './dispatcher.js';
export { Transmitter, classifyResponse, type TransmitterOptions } from './transmitter.js';
export {
  HttpCredentialValidator,
  TestCredentialValidator,
  type CredentialValidator,
} from './credential-validator.js';
export {
  FetchTransport,
  type FetchTransportOptions,
  type Transport,
  type TransportResponse,
} from './transport.js';
export { sanitizePayload } from './sanitize.js';
export { urlJoin } from './url.js';
export { renderSummary, formatTimestamp, type SummaryInfo } from './summary.js';
export {
  loadConfig,
  parseSettings,
  ReportingClientOptionsSchema,
  type EnvConfig,
  type ReportingSettings,
  type ReportingSettingsInput,
} from './config.js';
export { ReporterConfigError } from './errors.js';
export { createLogger, createChildLogger, setLogLevel, logger, type LoggerConfig, type LogLevel } from './logger.js';
export {
  OUTCOME,
  DEFAULT_BASE_URL,
  DEFAULT_DEBOUNCE_INTERVAL,
  ENDPOINTS,
  EXCLUDED_FIELDS,
  TEST_CREDENTIALS,
} from './constants.js';
export type {
  InfoType,
  Outcome,
  Payload,
  ReportingConfigSnapshot,
  SendDisposition,
  UpdateRequestBody,
} from '@tuner-cloud/shared-types';

export default ReportingClient;
