/**
 * Genome references: the shared interface and its in-memory implementation
 */

export {
  findContig,
  type GenomeReference,
  isValidInterval,
  LivenessToken,
  type RecordIterable,
} from "./genome-reference";
export { InMemoryReference } from "./in-memory";
export { createReferenceService, ReferenceService, type ReferenceServiceShape } from "./service";
export { formatRange } from "./text-format";
