/**
 * ICS codec
 */

export { encode, PRODUCT_ID, ALL_DAY_MARKER } from './ics-encoder.js';
export { decode, parseDateProperty } from './ics-decoder.js';
export type { DecodeOptions, DecodeResult } from './ics-decoder.js';
export {
  getTimezoneDefinition,
  isKnownTimezone,
  renderTimezone,
  RULE_REFERENCE_YEAR,
} from './timezone-definition.js';
export type { TimezoneDefinition, TimezoneObservance } from './timezone-definition.js';
