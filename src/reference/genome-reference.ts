/**
 * Shared reference abstraction
 *
 * The interface every genome reference implements, whether its bases live in
 * memory or behind an indexed file, plus the liveness handling that lets a
 * reference invalidate the iterators it handed out.
 *
 * @module reference/genome-reference
 */

import { LivenessError } from "../errors";
import type { ContigInfo, Range, ReferenceRecord } from "../types";

/**
 * Cursor over the records of a reference
 *
 * `next()` returns `undefined` once there are no more records. Instances are
 * single-pass; ask the reference for a new one to scan again.
 */
export interface RecordIterable<T> extends Iterable<T> {
  next(): T | undefined;
  /** Detach from the reference; later calls to next() fail */
  release(): void;
}

/**
 * Random and sequential access to the bases of a genome
 */
export interface GenomeReference {
  /** Contig catalog in canonical order */
  readonly contigs: readonly ContigInfo[];
  readonly nContigs: number;
  readonly isAlive: boolean;

  contigNames(): string[];
  hasContig(name: string): boolean;
  /** @throws {NotFoundError} When no contig has that name or alias */
  getContig(name: string): ContigInfo;
  isValidInterval(range: Range): boolean;
  getBases(range: Range): string;
  iterate(): RecordIterable<ReferenceRecord>;
  close(): void;
}

/**
 * Find a contig by name, falling back to its alternative names
 *
 * The first matching catalog entry wins.
 */
export function findContig(contigs: readonly ContigInfo[], name: string): ContigInfo | undefined {
  return (
    contigs.find((contig) => contig.name === name) ??
    contigs.find((contig) => contig.altNames?.includes(name) === true)
  );
}

/**
 * Check a range against the catalog entry of its contig
 *
 * Valid when the contig exists, both coordinates are non-negative integers,
 * the range is not inverted and, for contigs with a known length, it starts
 * before the end of the contig and ends within it.
 */
export function isValidInterval(range: Range, contig: ContigInfo | undefined): boolean {
  if (contig === undefined) return false;
  const { start, end } = range;
  if (!Number.isInteger(start) || !Number.isInteger(end)) return false;
  if (start < 0 || end < 0 || start > end) return false;
  if (contig.nBases !== undefined && (start >= contig.nBases || end > contig.nBases)) {
    return false;
  }
  return true;
}

/**
 * Shared handle between a reference and the iterators it created
 *
 * The reference kills the token on close; iterators check it before every
 * access to the reference.
 */
export class LivenessToken {
  private alive = true;

  get isAlive(): boolean {
    return this.alive;
  }

  kill(): void {
    this.alive = false;
  }

  /**
   * @throws {LivenessError} If the owning reference has been closed
   */
  checkIsAlive(): void {
    if (!this.alive) {
      throw new LivenessError("Reference has been closed");
    }
  }
}
