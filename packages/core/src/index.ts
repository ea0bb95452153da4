export {
  createLogger,
  withCorrelationId,
  redactObject,
  scrubSecrets,
  REDACTED,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  InvalidArgumentError,
  ExternalServiceError,
  RemoteRequestError,
  NotFoundError,
  MalformedResponseError,
  NotImplementedError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
  type RemoteRequestInfo,
} from './errors.js';

export {
  validateEnv,
  ClientEnvSchema,
  type ClientEnv,
} from './env.js';
