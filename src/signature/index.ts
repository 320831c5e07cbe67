/**
 * Signature module exports
 */

export { scheme, dataInput, instantiate } from './scheme.js';
export type { Scheme, SchemeOptions, Instance } from './scheme.js';

export { SignatureTable, SignatureTableBuilder } from './table.js';

export {
  buildSignatureTable,
  loadSignatureTable,
  SignatureConfigSchema,
  SignatureEntrySchema,
  OperatorSchema,
  ConstraintSchema,
} from './config.js';
export type { SignatureConfig, SignatureEntry, OperatorSpec, ConstraintSpec } from './config.js';
