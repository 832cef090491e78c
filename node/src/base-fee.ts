/**
 * Price-anchored Base Fee
 *
 * The base fee floor targets a fixed reference-currency cost for one
 * minimal transfer at the current oracle rate:
 *
 *   gwei   = trunc(targetQuoteCost / rate / minTxGas * subunitScale)
 *   result = gwei * baseUnitScale
 *
 * Arithmetic before the truncation is float64 and must stay in exactly
 * this order; every validator has to reproduce the same integer.
 * When the oracle cannot supply a positive rate, fallbackBaseFee is used.
 */

import { formatUnits } from "ethers"
import type { BlockHeader } from "./blockchain-types.ts"
import type { FeeFloorConfig } from "./config.ts"
import { BaseFeeMismatchError, MissingBaseFeeError, OracleFailure } from "./errors.ts"
import type { PriceOracle } from "./fee-oracle.ts"
import { verifyGasLimit, type GasLimitChecker } from "./gas-limit.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("base-fee")

export type BaseFeeSource = "live" | "fallback"

export interface BaseFeeDerivation {
  baseFee: bigint
  source: BaseFeeSource
  rate?: number
  failure?: OracleFailure
}

type FeeConstants = Pick<FeeFloorConfig, "targetQuoteCost" | "minTxGas" | "subunitScale" | "baseUnitScale">

/**
 * Integer gwei per gas for a rate, truncated toward zero. Returns null
 * when the result is not a finite number.
 */
export function gweiPerGas(cfg: FeeConstants, rate: number): number | null {
  const perTx = cfg.targetQuoteCost / rate
  const perGas = perTx / cfg.minTxGas
  const gwei = Math.trunc(perGas * cfg.subunitScale)
  return Number.isFinite(gwei) ? gwei : null
}

export async function deriveBaseFeeFloor(
  cfg: FeeFloorConfig,
  parent: BlockHeader,
  oracle: PriceOracle,
): Promise<BaseFeeDerivation> {
  let rate: number
  try {
    rate = (await oracle.currentRate()).rate
  } catch (err) {
    return fallback(cfg, parent, OracleFailure.from(err))
  }

  if (!(rate > 0)) {
    return fallback(cfg, parent, new OracleFailure("non-positive-rate", `oracle returned non-positive rate ${rate}`))
  }

  const gwei = gweiPerGas(cfg, rate)
  if (gwei === null) {
    return fallback(cfg, parent, new OracleFailure("non-positive-rate", `rate ${rate} yields a non-finite fee`))
  }

  const baseFee = BigInt(gwei) * cfg.baseUnitScale
  log.debug("derived base fee", {
    height: (parent.number + 1n).toString(),
    rate,
    baseFeeGwei: formatUnits(baseFee, "gwei"),
  })
  return { baseFee, source: "live", rate }
}

export async function deriveExpectedBaseFee(
  cfg: FeeFloorConfig,
  parent: BlockHeader,
  oracle: PriceOracle,
): Promise<bigint> {
  return (await deriveBaseFeeFloor(cfg, parent, oracle)).baseFee
}

function fallback(cfg: FeeFloorConfig, parent: BlockHeader, failure: OracleFailure): BaseFeeDerivation {
  log.warn("price oracle unavailable, using fallback base fee", {
    height: (parent.number + 1n).toString(),
    kind: failure.kind,
    error: failure.message,
    baseFeeGwei: formatUnits(cfg.fallbackBaseFee, "gwei"),
  })
  return { baseFee: cfg.fallbackBaseFee, source: "fallback", failure }
}

export class BaseFeeEngine {
  private readonly cfg: FeeFloorConfig
  private readonly oracle: PriceOracle
  private readonly checkGasLimit: GasLimitChecker

  constructor(cfg: FeeFloorConfig, oracle: PriceOracle, checkGasLimit: GasLimitChecker = verifyGasLimit) {
    this.cfg = cfg
    this.oracle = oracle
    this.checkGasLimit = checkGasLimit
  }

  /**
   * Base fee floor for the block following parent (block production).
   */
  nextBaseFee(parent: BlockHeader): Promise<BaseFeeDerivation> {
    return deriveBaseFeeFloor(this.cfg, parent, this.oracle)
  }

  /**
   * Check gas limit and base fee of header against parent. Throws
   * GasLimitError, MissingBaseFeeError or BaseFeeMismatchError. Resolves
   * with the derivation compared against, or null when the base fee
   * check is not active at this height.
   */
  async verifyHeader(parent: BlockHeader, header: BlockHeader): Promise<BaseFeeDerivation | null> {
    this.checkGasLimit(parent.gasLimit, header.gasLimit)

    if (header.baseFee === undefined || header.baseFee === null) {
      throw new MissingBaseFeeError(header.number)
    }

    const check = this.cfg.baseFeeCheck
    if (!check.enabled || parent.number < check.activationBlock) {
      return null
    }

    const derivation = await this.nextBaseFee(parent)
    if (header.baseFee !== derivation.baseFee) {
      log.warn("rejecting header with unexpected base fee", {
        height: header.number.toString(),
        have: header.baseFee.toString(),
        want: derivation.baseFee.toString(),
        source: derivation.source,
      })
      throw new BaseFeeMismatchError({
        expected: derivation.baseFee,
        actual: header.baseFee,
        parentBaseFee: parent.baseFee ?? null,
        parentGasUsed: parent.gasUsed,
      })
    }
    return derivation
  }
}
