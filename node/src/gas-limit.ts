import { GasLimitError } from "./errors.ts"

export const GAS_LIMIT_BOUND_DIVISOR = 1024n
export const MIN_GAS_LIMIT = 5_000n

export type GasLimitChecker = (parentGasLimit: bigint, headerGasLimit: bigint) => void

/**
 * Default bound check: the gas limit may move by less than parent/1024
 * per block and never drops below MIN_GAS_LIMIT.
 */
export const verifyGasLimit: GasLimitChecker = (parentGasLimit, headerGasLimit) => {
  const diff = parentGasLimit > headerGasLimit
    ? parentGasLimit - headerGasLimit
    : headerGasLimit - parentGasLimit
  const limit = parentGasLimit / GAS_LIMIT_BOUND_DIVISOR

  if (diff >= limit) {
    throw new GasLimitError(
      `invalid gas limit: have ${headerGasLimit}, want ${parentGasLimit} +-= ${limit - 1n}`,
      headerGasLimit,
      parentGasLimit,
      limit - 1n,
    )
  }
  if (headerGasLimit < MIN_GAS_LIMIT) {
    throw new GasLimitError(
      `invalid gas limit below ${MIN_GAS_LIMIT}`,
      headerGasLimit,
      parentGasLimit,
      limit - 1n,
    )
  }
}
