/**
 * A currency or security identifier such as `$`, `AAPL` or `"MUTF2351"`.
 * `quoted` records whether the journal wrote it between double quotes.
 */
export interface CommoditySymbol {
  readonly value: string
  readonly quoted: boolean
}

export function sameSymbol(a: CommoditySymbol, b: CommoditySymbol): boolean {
  return a.value === b.value && a.quoted === b.quoted
}
