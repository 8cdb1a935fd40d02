export * from './schemas/index'

export {
  FairnessCheckError,
  SchemaError,
  EndpointError,
  ResponseFormatError,
  ConfigurationError,
  DatasetError,
  type EndpointFailureReason,
} from './errors'

export {
  createLogger,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogFields,
  type LogSink,
} from './logger'
