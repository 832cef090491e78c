import { readFile } from "node:fs/promises"
import { resolve } from "node:path"

export interface OracleConfig {
  url: string
  symbol: string
  timeoutMs: number
}

export interface BaseFeeCheckConfig {
  enabled: boolean
  activationBlock: bigint // checked when parent.number >= activationBlock
}

export interface FeeFloorConfig {
  oracle: OracleConfig
  targetQuoteCost: number // reference-currency cost of one minimal transfer
  minTxGas: number
  subunitScale: number // native unit -> gwei, applied before truncation
  baseUnitScale: bigint // gwei -> wei, applied after truncation
  fallbackBaseFee: bigint
  baseFeeCheck: BaseFeeCheckConfig
}

export const DEFAULT_ORACLE_URL = "https://sapi.xt.com/v4/public/ticker/price/"

export function defaultFeeFloorConfig(): FeeFloorConfig {
  return {
    oracle: {
      url: DEFAULT_ORACLE_URL,
      symbol: "sep_usdt",
      timeoutMs: 5_000,
    },
    targetQuoteCost: 0.99,
    minTxGas: 21_000,
    subunitScale: 1e9,
    baseUnitScale: 1_000_000_000n,
    fallbackBaseFee: 476_190n * 1_000_000_000n,
    baseFeeCheck: { enabled: false, activationBlock: 0n },
  }
}

type RawConfig = Record<string, unknown>

/**
 * Load config from defaults, then FEE_FLOOR_CONFIG (or ./fee-floor.json),
 * then FEE_FLOOR_* environment variables. Throws on invalid values.
 */
export async function loadFeeFloorConfig(env: NodeJS.ProcessEnv = process.env): Promise<FeeFloorConfig> {
  const configPath = env.FEE_FLOOR_CONFIG || resolve("fee-floor.json")

  let user: RawConfig = {}
  try {
    const raw = await readFile(configPath, "utf-8")
    const parsed: unknown = JSON.parse(raw)
    if (isRecord(parsed)) user = parsed
  } catch (err) {
    // a missing file means defaults; anything else is a broken config
    if (!isNotFound(err)) {
      throw new Error(`failed to read fee floor config ${configPath}: ${String(err)}`)
    }
  }

  const defaults = defaultFeeFloorConfig()
  const userOracle: RawConfig = isRecord(user.oracle) ? user.oracle : {}
  const userCheck: RawConfig = isRecord(user.baseFeeCheck) ? user.baseFeeCheck : {}

  // values that are present but malformed are reported, never replaced by defaults
  const parseErrors: string[] = []
  const bigintField = (v: unknown, fallback: bigint, field: string): bigint => {
    if (v === undefined) return fallback
    const parsed = toBigInt(v)
    if (parsed === undefined) {
      parseErrors.push(`${field} must be an integer`)
      return fallback
    }
    return parsed
  }

  const checkEnv = env.FEE_FLOOR_CHECK_BASE_FEE
  const checkEnabled = checkEnv !== undefined ? toBoolean(checkEnv) : userCheck.enabled
  let enabled = defaults.baseFeeCheck.enabled
  if (typeof checkEnabled === "boolean") {
    enabled = checkEnabled
  } else if (checkEnabled !== undefined) {
    parseErrors.push("baseFeeCheck.enabled must be a boolean")
  }

  const cfg: Partial<FeeFloorConfig> = {
    oracle: {
      url: env.FEE_FLOOR_ORACLE_URL || stringOr(userOracle.url, defaults.oracle.url),
      symbol: env.FEE_FLOOR_ORACLE_SYMBOL || stringOr(userOracle.symbol, defaults.oracle.symbol),
      timeoutMs: Number(env.FEE_FLOOR_ORACLE_TIMEOUT_MS ?? userOracle.timeoutMs ?? defaults.oracle.timeoutMs),
    },
    targetQuoteCost: Number(user.targetQuoteCost ?? defaults.targetQuoteCost),
    minTxGas: Number(user.minTxGas ?? defaults.minTxGas),
    subunitScale: Number(user.subunitScale ?? defaults.subunitScale),
    baseUnitScale: bigintField(user.baseUnitScale, defaults.baseUnitScale, "baseUnitScale"),
    fallbackBaseFee: bigintField(user.fallbackBaseFee, defaults.fallbackBaseFee, "fallbackBaseFee"),
    baseFeeCheck: {
      enabled,
      activationBlock: bigintField(
        env.FEE_FLOOR_CHECK_FROM_BLOCK ?? userCheck.activationBlock,
        defaults.baseFeeCheck.activationBlock,
        "baseFeeCheck.activationBlock",
      ),
    },
  }

  const errors = [...parseErrors, ...validateConfig(cfg)]
  if (errors.length > 0) {
    throw new Error(`invalid fee floor config: ${errors.join("; ")}`)
  }
  return { ...defaults, ...cfg }
}

/**
 * Validate a fee floor config object. Returns an array of error messages (empty = valid).
 */
export function validateConfig(cfg: Partial<FeeFloorConfig>): string[] {
  const errors: string[] = []

  if (cfg.oracle !== undefined) {
    if (!isHttpUrl(cfg.oracle.url)) {
      errors.push("oracle.url must be an http(s) URL")
    }
    if (typeof cfg.oracle.symbol !== "string" || cfg.oracle.symbol.trim().length === 0) {
      errors.push("oracle.symbol must be a non-empty string")
    }
    if (!Number.isInteger(cfg.oracle.timeoutMs) || cfg.oracle.timeoutMs < 1) {
      errors.push("oracle.timeoutMs must be a positive integer")
    }
  }

  if (cfg.targetQuoteCost !== undefined) {
    if (!Number.isFinite(cfg.targetQuoteCost) || cfg.targetQuoteCost <= 0) {
      errors.push("targetQuoteCost must be a positive number")
    }
  }

  if (cfg.minTxGas !== undefined) {
    if (!Number.isInteger(cfg.minTxGas) || cfg.minTxGas < 1) {
      errors.push("minTxGas must be a positive integer")
    }
  }

  if (cfg.subunitScale !== undefined) {
    if (!Number.isFinite(cfg.subunitScale) || cfg.subunitScale <= 0) {
      errors.push("subunitScale must be a positive number")
    }
  }

  if (cfg.baseUnitScale !== undefined && cfg.baseUnitScale < 1n) {
    errors.push("baseUnitScale must be >= 1")
  }

  if (cfg.fallbackBaseFee !== undefined && cfg.fallbackBaseFee < 0n) {
    errors.push("fallbackBaseFee must be >= 0")
  }

  if (cfg.baseFeeCheck !== undefined) {
    if (typeof cfg.baseFeeCheck.enabled !== "boolean") {
      errors.push("baseFeeCheck.enabled must be a boolean")
    }
    if (cfg.baseFeeCheck.activationBlock < 0n) {
      errors.push("baseFeeCheck.activationBlock must be >= 0")
    }
  }

  return errors
}

function isRecord(v: unknown): v is RawConfig {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT"
}

function stringOr(v: unknown, fallback: string): string {
  return typeof v === "string" && v.length > 0 ? v : fallback
}

// JSON numbers beyond 2^53 have already lost precision, so they are refused
function toBigInt(v: unknown): bigint | undefined {
  if (typeof v === "bigint") return v
  if (typeof v === "number" && Number.isSafeInteger(v)) return BigInt(v)
  if (typeof v === "string" && /^-?\d+$/.test(v.trim())) return BigInt(v.trim())
  return undefined
}

function toBoolean(v: string): boolean | string {
  const lower = v.trim().toLowerCase()
  if (lower === "1" || lower === "true") return true
  if (lower === "0" || lower === "false") return false
  return v
}

function isHttpUrl(url: unknown): boolean {
  if (typeof url !== "string") return false
  try {
    const parsed = new URL(url)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}
