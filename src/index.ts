/**
 * refcache - genome reference bases served from memory
 *
 * Callers hand over a contig catalog and the sequences to cache; the
 * reference answers base queries by coordinate range and scans its records
 * in catalog order, without touching the filesystem.
 */

// Error types
export {
  type ErrorCode,
  getErrorSuggestion,
  InvalidArgumentError,
  LivenessError,
  NotFoundError,
  RefCacheError,
} from "./errors";
// References
export {
  createReferenceService,
  findContig,
  formatRange,
  type GenomeReference,
  InMemoryReference,
  isValidInterval,
  LivenessToken,
  type RecordIterable,
  ReferenceService,
  type ReferenceServiceShape,
} from "./reference";
// Core types and schemas
export type {
  AbstractSequence,
  ContigInfo,
  InMemoryReferenceOptions,
  Range,
  ReferenceRecord,
  ReferenceSequence,
} from "./types";
export {
  AbstractSequenceSchema,
  ContigInfoSchema,
  InMemoryReferenceOptionsSchema,
  RangeSchema,
  ReferenceSequenceSchema,
} from "./types";
