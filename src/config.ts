import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "node:path";
import { fileURLToPath } from "node:url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

/**
 * Comma-separated ascending list of positive numbers, e.g. "5,8,10".
 */
const numberListFromEnv = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((value, ctx) => {
      const parts = value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map(Number);
      if (parts.some((n) => !Number.isFinite(n) || n <= 0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected positive numbers, got "${value}"` });
        return z.NEVER;
      }
      return [...parts].sort((a, b) => a - b);
    });

// Load .env from the project root, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
const envResult = loadEnv({ path: envPath });

if (envResult.error && !("code" in envResult.error && envResult.error.code === "ENOENT")) {
  console.warn(`[config] Failed to load .env from ${envPath}:`, envResult.error.message);
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Merge sessions
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  PREVIEW_ROW_LIMIT: z.coerce.number().int().positive().default(20),
  // Card catalog (Scryfall-compatible)
  CATALOG_API_URL: z.string().url().default("https://api.scryfall.com"),
  CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  CATALOG_REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(100),
  // Currency conversion (Frankfurter-compatible)
  FOREX_API_URL: z.string().url().default("https://api.frankfurter.app"),
  FOREX_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PRICE_SOURCE_CURRENCY: z.string().length(3).default("USD"),
  PRICE_TARGET_CURRENCY: z.string().length(3).default("ZAR"),
  PRICE_VAT_RATE: z.coerce.number().min(0).max(1).default(0.15),
  PRICE_FLOORS: numberListFromEnv("5,8,10"),
  // Listing defaults
  LISTING_VENDOR: z.string().default("Card Shop"),
  LISTING_PRODUCT_CATEGORY: z.string().default("Uncategorized"),
  LISTING_OPTION_NAME: z.string().default("Version"),
  LISTING_VARIANT_GRAMS: z.coerce.number().min(0).default(2),
  LISTING_PUBLISHED: boolFromEnv(true),
  // Marketplace upload (Shopify Admin REST)
  SHOPIFY_STORE: z.string().optional(),
  SHOPIFY_ADMIN_API_ACCESS_TOKEN: z.string().optional(),
  SHOPIFY_API_VERSION: z.string().default("2023-10"),
  SHOPIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
});

const parsed = envSchema.parse(process.env);

export const runtimeConfig = {
  env: parsed.NODE_ENV,
  port: parsed.PORT,
  host: parsed.HOST,
  logLevel: parsed.LOG_LEVEL,
  maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
  sessionTtlMs: Math.round(parsed.SESSION_TTL_MINUTES * 60_000),
  sessionSweepIntervalMs: parsed.SESSION_SWEEP_INTERVAL_MS,
  previewRowLimit: parsed.PREVIEW_ROW_LIMIT,
  catalogApiUrl: parsed.CATALOG_API_URL.replace(/\/+$/, ""),
  catalogTimeoutMs: parsed.CATALOG_TIMEOUT_MS,
  catalogRequestDelayMs: parsed.CATALOG_REQUEST_DELAY_MS,
  forexApiUrl: parsed.FOREX_API_URL.replace(/\/+$/, ""),
  forexTimeoutMs: parsed.FOREX_TIMEOUT_MS,
  priceSourceCurrency: parsed.PRICE_SOURCE_CURRENCY.toUpperCase(),
  priceTargetCurrency: parsed.PRICE_TARGET_CURRENCY.toUpperCase(),
  priceVatRate: parsed.PRICE_VAT_RATE,
  priceFloors: parsed.PRICE_FLOORS,
  listingVendor: parsed.LISTING_VENDOR,
  listingProductCategory: parsed.LISTING_PRODUCT_CATEGORY,
  listingOptionName: parsed.LISTING_OPTION_NAME,
  listingVariantGrams: parsed.LISTING_VARIANT_GRAMS,
  listingPublished: parsed.LISTING_PUBLISHED,
  shopifyStore: parsed.SHOPIFY_STORE?.trim() ?? "",
  shopifyAccessToken: parsed.SHOPIFY_ADMIN_API_ACCESS_TOKEN?.trim() ?? "",
  shopifyApiVersion: parsed.SHOPIFY_API_VERSION,
  shopifyTimeoutMs: parsed.SHOPIFY_TIMEOUT_MS,
};

export type RuntimeConfig = typeof runtimeConfig;
