export { runConformance, loadConformanceCases, ConformanceCaseSchema, ExpectationSchema } from './batch.js';
export type { ConformanceCase, Expectation, CaseOutcome, ConformanceReport } from './batch.js';
