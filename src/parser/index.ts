export {
  EMPTY_PAYLOAD,
  extractJson,
  isExactHit,
  memoryCandidate,
  mergeMemory,
  parseConfidence,
  parseResponse
} from './response-parser.js';
