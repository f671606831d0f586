/**
 * Genome reference backed by sequences held in memory
 *
 * Lets tests, small references and synthetic genomes provide reference
 * bases directly instead of through an indexed FASTA file. Only a single
 * cached ReferenceSequence per contig is supported.
 *
 * @example
 * ```typescript
 * const ref = InMemoryReference.create(
 *   [{ name: "chr1" }, { name: "chr2" }],
 *   [
 *     { region: { referenceName: "chr1", start: 0, end: 4 }, bases: "ACGT" },
 *     { region: { referenceName: "chr2", start: 0, end: 3 }, bases: "TTT" },
 *   ]
 * );
 *
 * ref.getBases({ referenceName: "chr1", start: 1, end: 3 }); // "CG"
 * for (const { name, bases } of ref.iterate()) {
 *   console.log(name, bases);
 * }
 * ```
 *
 * @module reference/in-memory
 */

import { type } from "arktype";
import { InvalidArgumentError, LivenessError, NotFoundError } from "../errors";
import {
  type AbstractSequence,
  AbstractSequenceSchema,
  type ContigInfo,
  ContigInfoSchema,
  type InMemoryReferenceOptions,
  InMemoryReferenceOptionsSchema,
  type Range,
  type ReferenceRecord,
  type ReferenceSequence,
  ReferenceSequenceSchema,
} from "../types";
import {
  findContig,
  type GenomeReference,
  isValidInterval,
  LivenessToken,
  type RecordIterable,
} from "./genome-reference";
import { formatRange } from "./text-format";

interface ResolvedOptions {
  readonly warnOnCatalogMismatch: boolean;
  readonly onWarning: (warning: string) => void;
}

function resolveOptions(options: InMemoryReferenceOptions | undefined): ResolvedOptions {
  const validated = InMemoryReferenceOptionsSchema(options ?? {});
  if (validated instanceof type.errors) {
    throw new InvalidArgumentError(`Invalid InMemoryReference options: ${validated.summary}`);
  }
  const onWarning = options?.onWarning;
  if (onWarning !== undefined && typeof onWarning !== "function") {
    throw new InvalidArgumentError("Invalid InMemoryReference options: onWarning must be a function");
  }

  return {
    warnOnCatalogMismatch: validated.warnOnCatalogMismatch ?? true,
    onWarning:
      onWarning ??
      ((warning: string): void => {
        console.warn(`InMemoryReference Warning: ${warning}`);
      }),
  };
}

function freezeContig(contig: ContigInfo): ContigInfo {
  const { altNames } = contig;
  return Object.freeze({
    ...contig,
    ...(altNames !== undefined && { altNames: Object.freeze([...altNames]) }),
  });
}

/**
 * Validate one cached sequence and take an owned, frozen copy of it
 */
function checkSequence(seq: ReferenceSequence, index: number): ReferenceSequence {
  const shape = ReferenceSequenceSchema(seq);
  if (shape instanceof type.errors) {
    throw new InvalidArgumentError(`Invalid ReferenceSequence at index ${index}: ${shape.summary}`);
  }

  const { region, bases } = seq;
  if (
    region.referenceName === "" ||
    !Number.isInteger(region.start) ||
    !Number.isInteger(region.end) ||
    region.start < 0 ||
    region.start > region.end
  ) {
    throw new InvalidArgumentError(`Malformed region ${formatRange(region)}`);
  }

  const regionLength = region.end - region.start;
  if (regionLength !== bases.length) {
    throw new InvalidArgumentError(
      `Region size = ${regionLength} not equal to bases.length() ${bases.length}`
    );
  }

  return Object.freeze({
    region: Object.freeze({
      referenceName: region.referenceName,
      start: region.start,
      end: region.end,
    }),
    bases,
  });
}

/**
 * Full scan over the records of an InMemoryReference, in catalog order
 *
 * Stops at the first contig that has no cached sequence.
 */
class InMemoryRecordIterable implements RecordIterable<ReferenceRecord> {
  private pos = 0;
  private released = false;

  constructor(
    private readonly contigs: readonly ContigInfo[],
    private readonly seqs: ReadonlyMap<string, ReferenceSequence>,
    private readonly token: LivenessToken
  ) {}

  next(): ReferenceRecord | undefined {
    if (this.released) {
      throw new LivenessError("Iterator has been released");
    }
    this.token.checkIsAlive();

    const contig = this.contigs[this.pos];
    if (contig === undefined) {
      return undefined;
    }
    const seq = this.seqs.get(contig.name);
    if (seq === undefined) {
      return undefined;
    }

    this.pos++;
    return { name: contig.name, bases: seq.bases };
  }

  release(): void {
    this.released = true;
  }

  *[Symbol.iterator](): Generator<ReferenceRecord, void, undefined> {
    for (let record = this.next(); record !== undefined; record = this.next()) {
      yield record;
    }
  }
}

/**
 * Immutable in-memory genome reference
 */
export class InMemoryReference implements GenomeReference {
  private readonly token = new LivenessToken();

  private constructor(
    readonly contigs: readonly ContigInfo[],
    private readonly seqs: ReadonlyMap<string, ReferenceSequence>
  ) {}

  /**
   * Build a reference from a contig catalog and the sequences to cache
   *
   * `contigs` should hold exactly one ContigInfo per reference name used by
   * `sequences`. Each ContigInfo describes the whole contig even when its
   * sequence caches only part of the bases. The catalog and the sequences
   * are not cross-checked; mismatches are only reported as warnings.
   *
   * @throws {InvalidArgumentError} On a malformed region, a region whose size
   *   differs from its bases, or two sequences on the same contig
   */
  static create(
    contigs: readonly ContigInfo[],
    sequences: readonly ReferenceSequence[],
    options?: InMemoryReferenceOptions
  ): InMemoryReference {
    const { warnOnCatalogMismatch, onWarning } = resolveOptions(options);

    const catalog = contigs.map((contig, index) => {
      const shape = ContigInfoSchema(contig);
      if (shape instanceof type.errors) {
        throw new InvalidArgumentError(`Invalid ContigInfo at index ${index}: ${shape.summary}`);
      }
      return freezeContig(contig);
    });

    // Keyed by the catalog's primary name, so aliases cannot hold a second sequence
    const seqs = new Map<string, ReferenceSequence>();
    const uncatalogued: string[] = [];
    sequences.forEach((candidate, index) => {
      const seq = checkSequence(candidate, index);
      const name = seq.region.referenceName;
      const contig = findContig(catalog, name);
      const key = contig?.name ?? name;
      if (seqs.has(key)) {
        throw new InvalidArgumentError(
          `Each ReferenceSequence must be on a different chromosome but multiple ones were found on ${name}`
        );
      }
      if (contig === undefined) {
        uncatalogued.push(name);
      }
      seqs.set(key, seq);
    });

    if (warnOnCatalogMismatch) {
      for (const name of uncatalogued) {
        onWarning(`ReferenceSequence on ${name} has no ContigInfo and cannot be queried`);
      }
      for (const contig of catalog) {
        if (!seqs.has(contig.name)) {
          onWarning(`Contig ${contig.name} has no ReferenceSequence; iteration stops before it`);
        }
      }
    }

    return new InMemoryReference(Object.freeze(catalog), seqs);
  }

  /**
   * Build a reference caching every record in full
   *
   * Each record becomes a contig (in input order) whose length is the
   * length of its sequence.
   */
  static fromSequences(
    records: Iterable<AbstractSequence>,
    options?: InMemoryReferenceOptions
  ): InMemoryReference {
    const contigs: ContigInfo[] = [];
    const sequences: ReferenceSequence[] = [];

    let index = 0;
    for (const record of records) {
      const shape = AbstractSequenceSchema(record);
      if (shape instanceof type.errors) {
        throw new InvalidArgumentError(`Invalid sequence record at index ${index}: ${shape.summary}`);
      }
      const { id, description, sequence, length } = record;
      if (length !== undefined && length !== sequence.length) {
        throw new InvalidArgumentError(
          `Record length = ${length} not equal to sequence.length() ${sequence.length} for ${id}`
        );
      }
      contigs.push({
        name: id,
        ...(description !== undefined && { description }),
        nBases: sequence.length,
        posInFasta: index,
      });
      sequences.push({
        region: { referenceName: id, start: 0, end: sequence.length },
        bases: sequence,
      });
      index++;
    }

    return InMemoryReference.create(contigs, sequences, options);
  }

  get nContigs(): number {
    return this.contigs.length;
  }

  get isAlive(): boolean {
    return this.token.isAlive;
  }

  contigNames(): string[] {
    return this.contigs.map((contig) => contig.name);
  }

  hasContig(name: string): boolean {
    return findContig(this.contigs, name) !== undefined;
  }

  getContig(name: string): ContigInfo {
    const contig = findContig(this.contigs, name);
    if (contig === undefined) {
      throw new NotFoundError(`Unknown reference_name '${name}'`, name);
    }
    return contig;
  }

  isValidInterval(range: Range): boolean {
    return isValidInterval(range, findContig(this.contigs, range.referenceName));
  }

  /**
   * Get the bases covering `range`
   *
   * The range must lie entirely within the cached region of its contig.
   *
   * @throws {InvalidArgumentError} If the range is not a valid interval or
   *   extends beyond the cached region
   * @throws {NotFoundError} If the contig has no cached sequence
   * @throws {LivenessError} If the reference has been closed
   */
  getBases(range: Range): string {
    this.token.checkIsAlive();

    const contig = findContig(this.contigs, range.referenceName);
    if (contig === undefined || !isValidInterval(range, contig)) {
      throw new InvalidArgumentError(`Invalid interval: ${formatRange(range)}`);
    }

    const seq = this.seqs.get(contig.name);
    if (seq === undefined) {
      throw new NotFoundError(
        `No bases cached for reference_name ${range.referenceName}`,
        range.referenceName
      );
    }

    const { region } = seq;
    if (range.start < region.start || range.end > region.end) {
      throw new InvalidArgumentError(
        `Cannot query range=${formatRange(range)} as this store only has bases in the interval=${formatRange(region)}`
      );
    }

    const offset = range.start - region.start;
    return seq.bases.slice(offset, offset + (range.end - range.start));
  }

  /**
   * Start a new full scan over the cached records
   *
   * @throws {LivenessError} If the reference has been closed
   */
  iterate(): RecordIterable<ReferenceRecord> {
    this.token.checkIsAlive();
    return new InMemoryRecordIterable(this.contigs, this.seqs, this.token);
  }

  /**
   * Tear the reference down, invalidating every outstanding iterator
   */
  close(): void {
    this.token.kill();
  }
}
