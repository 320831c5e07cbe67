/**
 * Output module exports
 */

export {
  formatType,
  formatConstraint,
  formatError,
  formatResultJSON,
} from './formatter.js';

export type { FormatOptions } from './formatter.js';
