export {
  HttpInferenceClient,
  createInferenceClient,
  systemErrorCode,
  type InferenceClient,
  type FetchLike,
  type HttpInferenceClientOptions,
} from './client'
export { buildHeaders, buildRequest, appendFeaturesQuery, FEATURES_KEY, type PreparedRequest } from './request'
export {
  coerceLabel,
  extractLabel,
  parseInferenceResponse,
  LABEL_KEYS,
  type LabelKey,
} from './response'
