/**
 * Pipeline barrel export
 */

export { processFile } from './pipeline.js';
export { memoizeExtractor } from './page-text-cache.js';
export {
  processRunJob,
  createRunWorker,
  closeRunWorker,
  readSourceDocument,
  summarizeRun,
  InputFileError,
} from './run-worker.js';
export type {
  DecisionRecord,
  FileError,
  FileOutcome,
  FileStatus,
  PipelineDeps,
  PipelineOptions,
  RunJobData,
  RunResult,
  RunSession,
  UnitStatus,
  UnitStatusCounts,
} from './types.js';
