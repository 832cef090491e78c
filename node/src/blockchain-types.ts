export interface BlockHeader {
  number: bigint
  gasLimit: bigint
  gasUsed: bigint
  baseFee?: bigint | null // wei per gas
}

export interface PriceQuote {
  rate: number // reference-currency price of one native unit
  symbol: string
  fetchedAtMs: number
}
