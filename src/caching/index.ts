export {
  STEP_SOURCE_PARAMETER_NAME,
  MATERIALIZER_SOURCE_SUFFIX,
  computeCachingParameters,
  hashSourceCode,
} from './fingerprint.js';
export type { FingerprintRequest, SourceObject } from './fingerprint.js';
