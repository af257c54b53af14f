/**
 * Versioned Mutation Pipeline - Main Export
 */

export {
  VersionedPipeline,
  type PipelineStatus,
  type VersionHandle,
  type Extracted,
  type PipelineOrigin,
  type MutationStep,
  type UpdateFn,
  type StepEvent,
  type PipelineOptions,
  type StepRecord,
  type PipelineResult,
} from './pipeline.js';
export { ReferenceSet, type ReferenceReader } from './references.js';
export { FileArtifactSink, MemoryArtifactSink, type ArtifactSink } from './artifacts.js';
