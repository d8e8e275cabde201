/**
 * Failure taxonomy for the curation pipeline.
 *
 * Every stage returns a `Result`; the orchestrator decides per reason whether
 * the failure is absorbed into an algorithmic fallback or propagated to the caller.
 */

export type FailureReason =
  | { kind: 'insufficient-history'; message: string }
  | { kind: 'no-candidates'; message: string }
  | { kind: 'transport-failure'; message: string; status?: number }
  | { kind: 'malformed-response'; message: string }
  | { kind: 'configuration-missing'; message: string };

export type FailureKind = FailureReason['kind'];

export type Result<T, E = FailureReason> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E = FailureReason>(error: E): { ok: false; error: E } => ({ ok: false, error });

/**
 * Only these reasons mean no result can be produced at all, algorithmic or not.
 */
const PROPAGATED_KINDS: ReadonlySet<FailureKind> = new Set(['insufficient-history', 'no-candidates']);

export const isPropagated = (reason: FailureReason): boolean => PROPAGATED_KINDS.has(reason.kind);

/**
 * Thrown for user-visible failures ("listen to more music").
 */
export class CurationError extends Error {
  readonly reason: FailureReason;

  constructor(reason: FailureReason) {
    super(reason.message);
    this.name = 'CurationError';
    this.reason = reason;
  }

  get kind(): FailureKind {
    return this.reason.kind;
  }
}

/**
 * Unwrap a stage result, throwing the failure as a `CurationError`.
 */
export const unwrapOrThrow = <T>(result: Result<T>): T => {
  if (!result.ok) {
    throw new CurationError(result.error);
  }
  return result.value;
};
