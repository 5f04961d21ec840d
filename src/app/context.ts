/**
 * AppContext: composition root.
 *
 * Wires repositories, services and external clients from runtimeConfig so that
 * server.ts, cli.ts and the route tests share one construction path.
 */

import pino, { type Logger } from "pino";

import { runtimeConfig, type RuntimeConfig } from "../config";
import { MergeSessionRepository } from "../repositories/mergeSessionRepository";
import { CatalogClient } from "../services/catalog/scryfallClient";
import { ListingEnrichmentService } from "../services/listing/enrichmentService";
import { ShopifyClient } from "../services/marketplace/shopifyClient";
import { ListingUploader } from "../services/marketplace/shopifyUploader";
import { MergeSessionService } from "../services/mergeSessionService";
import { ForexClient } from "../services/pricing/forexClient";
import type { FetchLike } from "../utils/fetchJson";

export { runtimeConfig };

export interface AppContext {
  logger: Logger;
  config: RuntimeConfig;
  sessionRepo: MergeSessionRepository;
  mergeSessions: MergeSessionService;
  catalog: CatalogClient;
  forex: ForexClient;
  enrichment: ListingEnrichmentService;
  shopify: ShopifyClient;
  uploader: ListingUploader;
}

export interface ContextOverrides {
  logger?: Logger;
  config?: Partial<RuntimeConfig>;
  /** Stand-in for global fetch used by every outbound client. */
  fetch?: FetchLike;
  now?: () => number;
}

/**
 * Root logger. The CLI passes fd 2 so that stdout carries only exported data.
 */
export function createLogger(level: RuntimeConfig["logLevel"] = runtimeConfig.logLevel, fd = 1): Logger {
  const destination = pino.destination({ dest: fd, sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: Error) => {
    if ("code" in err && err.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level }, destination);
}

export function createContext(overrides: ContextOverrides = {}): AppContext {
  const config: RuntimeConfig = { ...runtimeConfig, ...overrides.config };
  const logger = overrides.logger ?? createLogger(config.logLevel);

  const sessionRepo = new MergeSessionRepository(config.sessionTtlMs, overrides.now);
  const mergeSessions = new MergeSessionService(sessionRepo, logger, config.previewRowLimit);

  const catalog = new CatalogClient(
    {
      baseUrl: config.catalogApiUrl,
      timeoutMs: config.catalogTimeoutMs,
      requestDelayMs: config.catalogRequestDelayMs,
      fetch: overrides.fetch,
    },
    logger,
  );
  const forex = new ForexClient(
    { baseUrl: config.forexApiUrl, timeoutMs: config.forexTimeoutMs, fetch: overrides.fetch },
    logger,
  );
  const enrichment = new ListingEnrichmentService(
    catalog,
    forex,
    {
      pricing: {
        vatRate: config.priceVatRate,
        floors: config.priceFloors,
        sourceCurrency: config.priceSourceCurrency,
        targetCurrency: config.priceTargetCurrency,
      },
      defaults: {
        vendor: config.listingVendor,
        productCategory: config.listingProductCategory,
        optionName: config.listingOptionName,
        variantGrams: config.listingVariantGrams,
        published: config.listingPublished,
      },
    },
    logger,
  );

  const shopify = new ShopifyClient(
    {
      store: config.shopifyStore,
      accessToken: config.shopifyAccessToken,
      apiVersion: config.shopifyApiVersion,
      timeoutMs: config.shopifyTimeoutMs,
      fetch: overrides.fetch,
    },
    logger,
  );
  if (!shopify.isConfigured()) {
    logger.warn("Shopify credentials not configured - listing upload disabled");
  }
  const uploader = new ListingUploader(shopify, logger);

  return { logger, config, sessionRepo, mergeSessions, catalog, forex, enrichment, shopify, uploader };
}
