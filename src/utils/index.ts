export { Logger, createLogger, formatLogEntry } from './Logger.js';
export type { ILogger, LogEntry } from './Logger.js';

export {
  detectImageFormat,
  matchesSignature,
  IMAGE_SIGNATURES,
  type DetectedFormat,
} from './ImageSignature.js';
