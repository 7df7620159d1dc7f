export type {
  InfoType,
  Outcome,
  Payload,
  ReportingConfigSnapshot,
  SendDisposition,
  UpdateErrorResponse,
  UpdateRequestBody,
} from './reporting.js';
