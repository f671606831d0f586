/**
 * Effect-based access to an in-memory reference
 *
 * Wraps InMemoryReference in a service tag so Effect programs can depend on
 * "a reference" and have it provided by a scoped layer. The layer builds the
 * store when the scope opens and closes it when the scope ends, after which
 * any iterator that escaped the scope fails with a LivenessError.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { ReferenceService } from "./reference/service";
 *
 * const program = Effect.gen(function* () {
 *   const ref = yield* ReferenceService;
 *   return yield* ref.getBases({ referenceName: "chr1", start: 1, end: 3 });
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(ReferenceService.layer(contigs, sequences)))
 * );
 * ```
 *
 * @module reference/service
 */

import { Context, Effect, Layer } from "effect";
import { InvalidArgumentError, RefCacheError } from "../errors";
import type {
  ContigInfo,
  InMemoryReferenceOptions,
  Range,
  ReferenceRecord,
  ReferenceSequence,
} from "../types";
import { InMemoryReference } from "./in-memory";

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

export interface ReferenceServiceShape {
  /** Contig catalog in canonical order */
  readonly contigs: readonly ContigInfo[];

  /**
   * Get the bases covering a range
   *
   * @returns Effect failing with InvalidArgumentError, NotFoundError or LivenessError
   */
  readonly getBases: (range: Range) => Effect.Effect<string, RefCacheError>;

  /**
   * Collect a full scan of the reference
   */
  readonly records: () => Effect.Effect<ReferenceRecord[], RefCacheError>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

export class ReferenceService extends Context.Tag("@refcache/ReferenceService")<
  ReferenceService,
  ReferenceServiceShape
>() {
  /**
   * Scoped layer owning an InMemoryReference for the lifetime of the scope
   */
  static layer(
    contigs: readonly ContigInfo[],
    sequences: readonly ReferenceSequence[],
    options?: InMemoryReferenceOptions
  ): Layer.Layer<ReferenceService, InvalidArgumentError> {
    return Layer.scoped(
      ReferenceService,
      Effect.acquireRelease(
        Effect.try({
          try: () => InMemoryReference.create(contigs, sequences, options),
          catch: (error) =>
            error instanceof InvalidArgumentError
              ? error
              : new InvalidArgumentError(error instanceof Error ? error.message : String(error)),
        }),
        (reference) => Effect.sync(() => reference.close())
      ).pipe(Effect.map(createReferenceService))
    );
  }
}

// =============================================================================
// SERVICE IMPLEMENTATION
// =============================================================================

/**
 * Adapt a reference to the service shape
 */
export function createReferenceService(reference: InMemoryReference): ReferenceServiceShape {
  return {
    contigs: reference.contigs,

    getBases: (range) =>
      Effect.try({
        try: () => reference.getBases(range),
        catch: RefCacheError.from,
      }),

    records: () =>
      Effect.try({
        try: () => Array.from(reference.iterate()),
        catch: RefCacheError.from,
      }),
  };
}
