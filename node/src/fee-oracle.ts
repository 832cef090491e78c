/**
 * Exchange-rate oracle for the native fee currency.
 *
 * TickerPriceOracle reads a ticker list over HTTP:
 *   { "result": [{ "s": "sep_usdt", "p": "0.0123" }, ...] }
 * and returns the price of the configured symbol. Every call is a fresh
 * request bounded by oracle.timeoutMs; nothing is cached.
 */

import { z } from "zod"
import type { PriceQuote } from "./blockchain-types.ts"
import type { OracleConfig } from "./config.ts"
import { OracleFailure } from "./errors.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("fee-oracle")

export interface PriceOracle {
  /** Rejects with OracleFailure when no rate can be read. */
  currentRate(): Promise<PriceQuote>
}

const TickerRecordSchema = z.object({
  s: z.string(),
  p: z.unknown(),
}).passthrough()

const TickerResponseSchema = z.object({
  // records of another shape are skipped rather than failing the whole list
  result: z.array(z.unknown()),
})

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

export function parsePrice(text: string | undefined): number | null {
  if (text === undefined) return null
  const trimmed = text.trim()
  if (!DECIMAL_RE.test(trimmed)) return null
  const value = Number(trimmed)
  return Number.isFinite(value) ? value : null
}

/**
 * Pick the configured symbol out of a decoded ticker response. The first
 * record for the symbol with a parsable price wins; invalid-price is
 * reported only when records for the symbol exist but none is usable.
 */
export function extractRate(body: unknown, symbol: string): number {
  const parsed = TickerResponseSchema.safeParse(body)
  if (!parsed.success) {
    throw new OracleFailure("decode", `ticker response has no result list: ${parsed.error.message}`)
  }

  let badPrice: { value: unknown } | null = null
  for (const item of parsed.data.result) {
    const record = TickerRecordSchema.safeParse(item)
    if (!record.success || record.data.s !== symbol) continue

    const price = record.data.p
    const rate = typeof price === "string" ? parsePrice(price) : null
    if (rate !== null) return rate
    badPrice ??= { value: price }
  }

  if (badPrice) {
    throw new OracleFailure("invalid-price", `price for ${symbol} is missing or unparsable: ${String(badPrice.value)}`)
  }
  throw new OracleFailure("missing-symbol", `${symbol.toUpperCase()} price not found`)
}

export class TickerPriceOracle implements PriceOracle {
  private readonly cfg: OracleConfig
  private readonly fetchFn: typeof fetch

  constructor(cfg: OracleConfig, fetchFn: typeof fetch = fetch) {
    this.cfg = cfg
    this.fetchFn = fetchFn
  }

  async currentRate(): Promise<PriceQuote> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.cfg.timeoutMs)

    try {
      let res: Response
      try {
        res = await this.fetchFn(this.cfg.url, {
          method: "GET",
          headers: { accept: "application/json" },
          signal: controller.signal,
        })
      } catch (err) {
        throw this.transportFailure(err, controller.signal)
      }

      if (!res.ok) {
        await res.body?.cancel()
        throw new OracleFailure("transport", `ticker request failed with HTTP ${res.status}`)
      }

      let text: string
      try {
        text = await res.text()
      } catch (err) {
        throw this.transportFailure(err, controller.signal)
      }

      let body: unknown
      try {
        body = JSON.parse(text)
      } catch (err) {
        throw new OracleFailure("decode", `failed to parse ticker JSON: ${String(err)}`, { cause: err })
      }

      const rate = extractRate(body, this.cfg.symbol)
      log.debug("fetched price", { symbol: this.cfg.symbol, rate })
      return { rate, symbol: this.cfg.symbol, fetchedAtMs: Date.now() }
    } finally {
      clearTimeout(timer)
    }
  }

  private transportFailure(err: unknown, signal: AbortSignal): OracleFailure {
    if (signal.aborted) {
      return new OracleFailure("timeout", `ticker request timed out after ${this.cfg.timeoutMs}ms`, { cause: err })
    }
    return new OracleFailure("transport", `failed to fetch ticker: ${String(err)}`, { cause: err })
  }
}

/**
 * Fixed-rate oracle. Used where the rate has been agreed ahead of
 * verification (e.g. anchored to a block) and in tests.
 */
export class StaticPriceOracle implements PriceOracle {
  private readonly rate: number
  private readonly symbol: string

  constructor(rate: number, symbol = "static") {
    if (!Number.isFinite(rate)) {
      throw new RangeError(`static rate must be finite, got ${rate}`)
    }
    this.rate = rate
    this.symbol = symbol
  }

  async currentRate(): Promise<PriceQuote> {
    return { rate: this.rate, symbol: this.symbol, fetchedAtMs: Date.now() }
  }
}
