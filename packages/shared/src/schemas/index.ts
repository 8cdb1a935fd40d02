export {
  endpointConfigSchema,
  datasetConfigSchema,
  fairnessConfigSchema,
  configSchema,
  type EndpointConfig,
  type DatasetConfig,
  type FairnessConfig,
  type Config,
  type ConfigInput,
} from './config'

export {
  jsonValueSchema,
  inferenceRequestSchema,
  inferenceResponseSchema,
  type InferenceRequest,
  type InferenceResponse,
} from './wire'
