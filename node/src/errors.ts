/**
 * Header validation errors.
 *
 * GasLimitError, MissingBaseFeeError and BaseFeeMismatchError reject a
 * candidate header. OracleFailure never leaves the base fee engine: it is
 * reported on the derivation result and the fallback fee is used instead.
 */

export class GasLimitError extends Error {
  readonly have: bigint
  readonly want: bigint
  readonly bound: bigint

  constructor(message: string, have: bigint, want: bigint, bound: bigint) {
    super(message)
    this.name = "GasLimitError"
    this.have = have
    this.want = want
    this.bound = bound
  }
}

export class MissingBaseFeeError extends Error {
  readonly height: bigint

  constructor(height: bigint) {
    super(`header ${height} is missing baseFee`)
    this.name = "MissingBaseFeeError"
    this.height = height
  }
}

export interface BaseFeeMismatch {
  expected: bigint
  actual: bigint
  parentBaseFee: bigint | null
  parentGasUsed: bigint
}

export class BaseFeeMismatchError extends Error {
  readonly expected: bigint
  readonly actual: bigint
  readonly parentBaseFee: bigint | null
  readonly parentGasUsed: bigint

  constructor(m: BaseFeeMismatch) {
    super(
      `invalid baseFee: have ${m.actual}, want ${m.expected}, ` +
      `parentBaseFee ${m.parentBaseFee ?? "nil"}, parentGasUsed ${m.parentGasUsed}`,
    )
    this.name = "BaseFeeMismatchError"
    this.expected = m.expected
    this.actual = m.actual
    this.parentBaseFee = m.parentBaseFee
    this.parentGasUsed = m.parentGasUsed
  }
}

export type OracleFailureKind =
  | "transport"
  | "timeout"
  | "decode"
  | "missing-symbol"
  | "invalid-price"
  | "non-positive-rate"
  | "unknown"

export class OracleFailure extends Error {
  readonly kind: OracleFailureKind

  constructor(kind: OracleFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "OracleFailure"
    this.kind = kind
  }

  static from(err: unknown): OracleFailure {
    if (err instanceof OracleFailure) return err
    return new OracleFailure("unknown", `price oracle failed: ${String(err)}`, { cause: err })
  }
}
