/**
 * Error values shared by the parser, the value adapter and the extractor
 */

export type ParseError = {
  readonly kind: "parse-error";
  readonly code: "TP1001" | "TP1002";
  readonly message: string;
  /** Character offset in the input where the problem was detected */
  readonly position: number;
  readonly input: string;
};

export type AccessFailureReason =
  | "unavailable"
  | "optimized-out"
  | "missing-field"
  | "not-scalar"
  | "not-pointer"
  | "not-iterable"
  | "no-storage"
  | "uninitialized";

export type AccessFailure = {
  readonly kind: "access-failure";
  readonly path: string;
  readonly reason: AccessFailureReason;
  readonly message: string;
};

export type ExtractionInconsistency = {
  readonly kind: "extraction-inconsistency";
  readonly path: string;
  readonly transformName: string;
  readonly message: string;
};

export type ExtractionFailure = AccessFailure | ExtractionInconsistency;

export const parseError = (
  code: ParseError["code"],
  message: string,
  position: number,
  input: string
): ParseError => ({ kind: "parse-error", code, message, position, input });

export const accessFailure = (
  path: string,
  reason: AccessFailureReason,
  message: string
): AccessFailure => ({ kind: "access-failure", path, reason, message });

export const extractionInconsistency = (
  path: string,
  transformName: string,
  message: string
): ExtractionInconsistency => ({
  kind: "extraction-inconsistency",
  path,
  transformName,
  message,
});

const PLACEHOLDER_LABELS: Readonly<Record<AccessFailureReason, string>> = {
  unavailable: "<unavailable>",
  "optimized-out": "<optimized out>",
  "missing-field": "<unavailable>",
  "not-scalar": "<unavailable>",
  "not-pointer": "<unavailable>",
  "not-iterable": "<unavailable>",
  "no-storage": "<unavailable>",
  uninitialized: "<uninitialized>",
};

/**
 * Text shown in place of a value that could not be recovered.
 */
export const placeholderText = (failure: ExtractionFailure): string =>
  failure.kind === "access-failure"
    ? PLACEHOLDER_LABELS[failure.reason]
    : "<inconsistent>";

export const describeFailure = (failure: ExtractionFailure): string =>
  failure.kind === "access-failure"
    ? `${failure.reason}: ${failure.message}`
    : `${failure.transformName}: ${failure.message}`;
