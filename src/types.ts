/**
 * Core type definitions for in-memory genome references
 *
 * Coordinates are 0-based and half-open throughout: a range `[start, end)`
 * on a contig covers `end - start` bases.
 */

import { type } from "arktype";

/**
 * Catalog entry describing an entire contig (chromosome, scaffold)
 *
 * Describes the whole contig even when only part of its bases is cached.
 */
export interface ContigInfo {
  readonly name: string;
  readonly description?: string;
  /** Full length of the contig; absent when the catalog does not bound it */
  readonly nBases?: number;
  /** Position of the contig in its source FASTA, if known */
  readonly posInFasta?: number;
  /** Other names the contig is known by (e.g. "1" for "chr1") */
  readonly altNames?: readonly string[];
}

/**
 * Half-open, 0-based interval on a named contig
 */
export interface Range {
  readonly referenceName: string;
  readonly start: number;
  readonly end: number;
}

/**
 * A contiguous cached span of a contig and the exact bases covering it
 */
export interface ReferenceSequence {
  readonly region: Range;
  readonly bases: string;
}

/**
 * One item of a full scan over a reference: a contig name and all its cached bases
 */
export interface ReferenceRecord {
  readonly name: string;
  readonly bases: string;
}

/**
 * Minimal FASTA-style sequence record
 */
export interface AbstractSequence {
  /** Sequence identifier, used as the contig name */
  readonly id: string;
  /** Optional description/comment line */
  readonly description?: string;
  /** The actual sequence data */
  readonly sequence: string;
  /** Sequence length; must equal sequence.length when given */
  readonly length?: number;
}

/**
 * Options accepted by InMemoryReference.create
 */
export interface InMemoryReferenceOptions {
  /** Report contigs without sequences and sequences without contigs (default: true) */
  readonly warnOnCatalogMismatch?: boolean;
  /** Warning sink (default: console.warn) */
  readonly onWarning?: (warning: string) => void;
}

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * Shape of a Range. Coordinate sanity is checked by the store, which
 * reports it with its own messages.
 */
export const RangeSchema = type({
  referenceName: "string",
  start: "number",
  end: "number",
});

export const ContigInfoSchema = type({
  name: "string",
  "description?": "string | undefined",
  "nBases?": "number.integer>=0 | undefined",
  "posInFasta?": "number.integer>=0 | undefined",
  "altNames?": "string[] | undefined",
});

export const ReferenceSequenceSchema = type({
  region: RangeSchema,
  bases: "string",
});

export const AbstractSequenceSchema = type({
  id: "string>0",
  "description?": "string | undefined",
  sequence: "string",
  "length?": "number.integer>=0 | undefined",
});

/**
 * Serializable part of InMemoryReferenceOptions; onWarning is checked separately
 */
export const InMemoryReferenceOptionsSchema = type({
  "warnOnCatalogMismatch?": "boolean | undefined",
});
