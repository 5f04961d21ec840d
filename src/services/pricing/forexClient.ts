import type { Logger } from "pino";
import { z } from "zod";
import { fetchJson, type FetchLike } from "../../utils/fetchJson";

const latestRatesSchema = z.object({
  base: z.string().optional(),
  rates: z.record(z.number()),
});

export interface ForexClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

/**
 * Exchange rates from a Frankfurter-compatible endpoint.
 */
export class ForexClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly options: ForexClientOptions,
    private readonly logger: Logger,
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getRate(from: string, to: string): Promise<number | null> {
    const source = from.toUpperCase();
    const target = to.toUpperCase();
    if (source === target) return 1;

    const params = new URLSearchParams({ from: source, to: target });
    const result = await fetchJson(
      this.fetchImpl,
      `${this.options.baseUrl}/latest?${params.toString()}`,
      { method: "GET", headers: { Accept: "application/json" } },
      this.options.timeoutMs,
    );
    if (!result.ok) {
      this.logger.warn({ from: source, to: target, status: result.status, error: result.error }, "forex.request_failed");
      return null;
    }

    const parsed = latestRatesSchema.safeParse(result.body);
    const rate = parsed.success ? parsed.data.rates[target] : undefined;
    if (rate === undefined) {
      this.logger.warn({ from: source, to: target }, "forex.rate_missing");
      return null;
    }

    this.logger.info({ from: source, to: target, rate }, "forex.rate");
    return rate;
  }
}
