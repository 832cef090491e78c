import { describe, it, before, after } from "node:test"
import assert from "node:assert/strict"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { DEFAULT_ORACLE_URL, defaultFeeFloorConfig, loadFeeFloorConfig, validateConfig } from "./config.ts"

describe("validateConfig", () => {
  it("returns no errors for defaults", () => {
    assert.deepEqual(validateConfig(defaultFeeFloorConfig()), [])
  })

  it("returns no errors for empty config", () => {
    assert.equal(validateConfig({}).length, 0)
  })

  it("rejects a bad oracle section", () => {
    const errors = validateConfig({ oracle: { url: "ftp://example.test", symbol: " ", timeoutMs: 0 } })
    assert.deepEqual(errors, [
      "oracle.url must be an http(s) URL",
      "oracle.symbol must be a non-empty string",
      "oracle.timeoutMs must be a positive integer",
    ])
  })

  it("rejects non-positive fee constants", () => {
    assert.deepEqual(validateConfig({ targetQuoteCost: 0 }), ["targetQuoteCost must be a positive number"])
    assert.deepEqual(validateConfig({ targetQuoteCost: Number.NaN }), ["targetQuoteCost must be a positive number"])
    assert.deepEqual(validateConfig({ minTxGas: 21_000.5 }), ["minTxGas must be a positive integer"])
    assert.deepEqual(validateConfig({ subunitScale: -1 }), ["subunitScale must be a positive number"])
    assert.deepEqual(validateConfig({ baseUnitScale: 0n }), ["baseUnitScale must be >= 1"])
    assert.deepEqual(validateConfig({ fallbackBaseFee: -1n }), ["fallbackBaseFee must be >= 0"])
  })

  it("rejects a negative activation block", () => {
    assert.deepEqual(
      validateConfig({ baseFeeCheck: { enabled: true, activationBlock: -1n } }),
      ["baseFeeCheck.activationBlock must be >= 0"],
    )
  })
})

describe("loadFeeFloorConfig", () => {
  let dir = ""

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), "fee-floor-config-"))
  })

  after(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("returns defaults when the config file does not exist", async () => {
    const cfg = await loadFeeFloorConfig({ FEE_FLOOR_CONFIG: join(dir, "missing.json") })
    assert.deepEqual(cfg, defaultFeeFloorConfig())
    assert.equal(cfg.oracle.url, DEFAULT_ORACLE_URL)
  })

  it("merges file values under environment overrides", async () => {
    const path = join(dir, "merged.json")
    await writeFile(path, JSON.stringify({
      oracle: { symbol: "abc_usdt", timeoutMs: 3000 },
      targetQuoteCost: 0.5,
      fallbackBaseFee: "1000",
      baseFeeCheck: { enabled: true, activationBlock: "4046533" },
    }))

    const cfg = await loadFeeFloorConfig({
      FEE_FLOOR_CONFIG: path,
      FEE_FLOOR_ORACLE_URL: "http://127.0.0.1:9/ticker",
      FEE_FLOOR_ORACLE_TIMEOUT_MS: "250",
    })
    assert.equal(cfg.oracle.url, "http://127.0.0.1:9/ticker")
    assert.equal(cfg.oracle.symbol, "abc_usdt")
    assert.equal(cfg.oracle.timeoutMs, 250)
    assert.equal(cfg.targetQuoteCost, 0.5)
    assert.equal(cfg.minTxGas, 21_000)
    assert.equal(cfg.fallbackBaseFee, 1000n)
    assert.deepEqual(cfg.baseFeeCheck, { enabled: true, activationBlock: 4_046_533n })
  })

  it("lets the environment disable the base fee check", async () => {
    const path = join(dir, "enabled.json")
    await writeFile(path, JSON.stringify({ baseFeeCheck: { enabled: true } }))
    const cfg = await loadFeeFloorConfig({ FEE_FLOOR_CONFIG: path, FEE_FLOOR_CHECK_BASE_FEE: "false" })
    assert.equal(cfg.baseFeeCheck.enabled, false)

    const on = await loadFeeFloorConfig({
      FEE_FLOOR_CONFIG: join(dir, "missing.json"),
      FEE_FLOOR_CHECK_BASE_FEE: "1",
      FEE_FLOOR_CHECK_FROM_BLOCK: "12",
    })
    assert.deepEqual(on.baseFeeCheck, { enabled: true, activationBlock: 12n })
  })

  it("throws on invalid values", async () => {
    await assert.rejects(
      loadFeeFloorConfig({ FEE_FLOOR_CONFIG: join(dir, "missing.json"), FEE_FLOOR_ORACLE_TIMEOUT_MS: "0" }),
      /oracle\.timeoutMs must be a positive integer/,
    )
  })

  it("rejects a malformed activation block instead of defaulting to zero", async () => {
    await assert.rejects(
      loadFeeFloorConfig({
        FEE_FLOOR_CONFIG: join(dir, "missing.json"),
        FEE_FLOOR_CHECK_BASE_FEE: "1",
        FEE_FLOOR_CHECK_FROM_BLOCK: "4046533x",
      }),
      { message: "invalid fee floor config: baseFeeCheck.activationBlock must be an integer" },
    )
  })

  it("rejects unsafe or non-integer fee constants and a non-boolean enabled flag", async () => {
    const path = join(dir, "malformed-values.json")
    await writeFile(path, JSON.stringify({
      fallbackBaseFee: 1e21,
      baseUnitScale: "1e9",
      baseFeeCheck: { enabled: "true" },
    }))
    await assert.rejects(loadFeeFloorConfig({ FEE_FLOOR_CONFIG: path }), {
      message: "invalid fee floor config: baseFeeCheck.enabled must be a boolean; " +
        "baseUnitScale must be an integer; fallbackBaseFee must be an integer",
    })
  })

  it("rejects an unrecognised FEE_FLOOR_CHECK_BASE_FEE value", async () => {
    await assert.rejects(
      loadFeeFloorConfig({ FEE_FLOOR_CONFIG: join(dir, "missing.json"), FEE_FLOOR_CHECK_BASE_FEE: "yes" }),
      { message: "invalid fee floor config: baseFeeCheck.enabled must be a boolean" },
    )
  })

  it("accepts fee constants written as decimal strings beyond 2^53", async () => {
    const path = join(dir, "big-fallback.json")
    await writeFile(path, JSON.stringify({ fallbackBaseFee: "1000000000000000000000" }))
    const cfg = await loadFeeFloorConfig({ FEE_FLOOR_CONFIG: path })
    assert.equal(cfg.fallbackBaseFee, 1_000_000_000_000_000_000_000n)
  })

  it("throws on a malformed config file", async () => {
    const path = join(dir, "broken.json")
    await writeFile(path, "{ oracle: ")
    await assert.rejects(loadFeeFloorConfig({ FEE_FLOOR_CONFIG: path }), /failed to read fee floor config/)
  })
})
