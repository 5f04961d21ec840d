export interface PricePolicy {
  /** Fraction, e.g. 0.15 for 15 % VAT. */
  vatRate: number;
  /** Ascending price floors in the target currency. */
  floors: readonly number[];
}

/**
 * Convert a catalog price to the store currency including VAT.
 *
 * Prices under the lowest floors snap up to the next floor; everything else
 * rounds up to a whole unit. Returns "" when the price or rate is missing.
 */
export function priceWithVat(
  sourcePrice: string | number | null | undefined,
  rate: number | null | undefined,
  policy: PricePolicy,
): string {
  if (sourcePrice === null || sourcePrice === undefined || rate === null || rate === undefined) return "";
  if (typeof sourcePrice === "string" && sourcePrice.trim() === "") return "";

  const amount = typeof sourcePrice === "number" ? sourcePrice : Number(sourcePrice.trim());
  if (!Number.isFinite(amount) || !Number.isFinite(rate)) return "";

  const price = amount * rate * (1 + policy.vatRate);
  for (const floor of policy.floors) {
    if (price < floor) return String(floor);
  }
  return String(Math.ceil(price));
}
