import { readFile } from "node:fs/promises"
import { Command } from "commander"
import { formatUnits } from "ethers"
import { z } from "zod"
import type { BlockHeader } from "./blockchain-types.ts"
import { BaseFeeEngine, type BaseFeeDerivation } from "./base-fee.ts"
import { loadFeeFloorConfig, type FeeFloorConfig } from "./config.ts"
import { StaticPriceOracle, TickerPriceOracle, type PriceOracle } from "./fee-oracle.ts"

const IntegerField = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^(0x[0-9a-fA-F]+|\d+)$/),
]).transform((v) => BigInt(v))

const HeaderJsonSchema = z.object({
  number: IntegerField,
  gasLimit: IntegerField,
  gasUsed: IntegerField,
  baseFee: IntegerField.nullish(),
})

/**
 * Parse a header from JSON. Integer fields may be numbers, decimal
 * strings or 0x-prefixed hex strings.
 */
export function parseHeaderJson(raw: string): BlockHeader {
  const parsed = HeaderJsonSchema.parse(JSON.parse(raw))
  return { ...parsed, baseFee: parsed.baseFee ?? null }
}

export interface CliIO {
  out: (line: string) => void
  loadConfig: () => Promise<FeeFloorConfig>
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  loadConfig: () => loadFeeFloorConfig(),
}

function pickOracle(cfg: FeeFloorConfig, rate: number | undefined): PriceOracle {
  return rate === undefined ? new TickerPriceOracle(cfg.oracle) : new StaticPriceOracle(rate, cfg.oracle.symbol)
}

function describeDerivation(d: BaseFeeDerivation): string {
  const parts = [
    `baseFee ${d.baseFee} wei (${formatUnits(d.baseFee, "gwei")} gwei)`,
    `source ${d.source}`,
  ]
  if (d.rate !== undefined) parts.push(`rate ${d.rate}`)
  if (d.failure) parts.push(`reason ${d.failure.kind}: ${d.failure.message}`)
  return parts.join(", ")
}

export function buildProgram(io: CliIO = defaultIO): Command {
  const program = new Command("fee-floor")
    .description("Price-anchored base fee floor tools")

  // --- fee-floor rate ---
  program
    .command("rate")
    .description("Fetch the current exchange rate from the price oracle")
    .action(async () => {
      const cfg = await io.loadConfig()
      const quote = await new TickerPriceOracle(cfg.oracle).currentRate()
      io.out(`${quote.symbol} ${quote.rate}`)
    })

  // --- fee-floor floor ---
  program
    .command("floor")
    .description("Derive the base fee floor for the next block")
    .option("--rate <rate>", "Use a fixed rate instead of querying the oracle", Number)
    .option("--parent <file>", "Parent header JSON")
    .action(async (opts: { rate?: number; parent?: string }) => {
      const cfg = await io.loadConfig()
      const parent: BlockHeader = opts.parent
        ? parseHeaderJson(await readFile(opts.parent, "utf-8"))
        : { number: 0n, gasLimit: 0n, gasUsed: 0n, baseFee: null }
      const engine = new BaseFeeEngine(cfg, pickOracle(cfg, opts.rate))
      io.out(describeDerivation(await engine.nextBaseFee(parent)))
    })

  // --- fee-floor verify <parent> <header> ---
  program
    .command("verify <parent> <header>")
    .description("Validate a header's gas limit and base fee against its parent")
    .option("--rate <rate>", "Use a fixed rate instead of querying the oracle", Number)
    .option("--enforce", "Check the base fee regardless of configured activation")
    .action(async (parentPath: string, headerPath: string, opts: { rate?: number; enforce?: boolean }) => {
      const loaded = await io.loadConfig()
      const cfg: FeeFloorConfig = opts.enforce
        ? { ...loaded, baseFeeCheck: { enabled: true, activationBlock: 0n } }
        : loaded
      const parent = parseHeaderJson(await readFile(parentPath, "utf-8"))
      const header = parseHeaderJson(await readFile(headerPath, "utf-8"))

      const engine = new BaseFeeEngine(cfg, pickOracle(cfg, opts.rate))
      const derivation = await engine.verifyHeader(parent, header)
      io.out(derivation
        ? `header ${header.number} valid: ${describeDerivation(derivation)}`
        : `header ${header.number} valid: base fee check inactive`)
    })

  return program
}
