export {
  InputValidator,
  type Payload,
  type SecurityEventLogger,
  type ValidationSchema,
  type ValidatorOptions,
} from "./validator.js";
export { sanitizeString, sanitizeValue, isPlainObject, DEFAULT_MAX_STRING_LENGTH } from "./sanitize.js";
export { detectThreat, XSS_SIGNATURES, SQL_SIGNATURES, type ThreatMatch } from "./patterns.js";
