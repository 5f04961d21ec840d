/**
 * Shopify Admin REST client for the calls the listing uploader needs.
 * Reference: https://shopify.dev/docs/api/admin-rest
 */

import type { Logger } from "pino";
import { z } from "zod";
import { fetchJson, type FetchLike } from "../../utils/fetchJson";

const variantSchema = z.object({
  id: z.number(),
  option1: z.string().nullable().optional(),
  price: z.string().optional(),
  inventory_item_id: z.number().nullable().optional(),
});

const productSchema = z.object({
  id: z.number(),
  handle: z.string().optional(),
  title: z.string().optional(),
  variants: z.array(variantSchema).default([]),
});

const imageSchema = z.object({
  id: z.number(),
  src: z.string().optional(),
});

export type ShopifyVariant = z.infer<typeof variantSchema>;
export type ShopifyProduct = z.infer<typeof productSchema>;
export type ShopifyImage = z.infer<typeof imageSchema>;

export interface VariantInput {
  option1: string;
  price: string;
  sku: string;
  inventory_quantity: number;
  inventory_management: string;
  fulfillment_service: string;
  inventory_policy: string;
}

export interface ProductInput {
  title: string;
  handle: string;
  body_html: string;
  vendor: string;
  product_type: string;
  tags: string;
  status: string;
  options?: Array<{ name: string }>;
  variants: VariantInput[];
}

export type ShopifyResult<T> = { ok: true; data: T } | { ok: false; status?: number; error: string };

export interface ShopifyClientOptions {
  store: string;
  accessToken: string;
  apiVersion: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

export class ShopifyClient {
  private readonly fetchImpl: FetchLike;
  private locationId: number | null = null;

  constructor(
    private readonly options: ShopifyClientOptions,
    private readonly logger: Logger,
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  isConfigured(): boolean {
    return Boolean(this.options.store && this.options.accessToken);
  }

  async findProductByHandle(handle: string): Promise<ShopifyResult<ShopifyProduct | null>> {
    const result = await this.request("GET", `/products.json?${new URLSearchParams({ handle }).toString()}`);
    if (!result.ok) return result;

    const parsed = z.object({ products: z.array(productSchema) }).safeParse(result.data);
    if (!parsed.success) return { ok: false, error: "BAD_RESPONSE" };
    // The handle filter is exact, but older API versions ignore unknown filters
    const product = parsed.data.products.find((p) => p.handle === undefined || p.handle === handle);
    return { ok: true, data: product ?? null };
  }

  async createProduct(product: ProductInput): Promise<ShopifyResult<ShopifyProduct>> {
    const result = await this.request("POST", "/products.json", { product });
    if (!result.ok) return result;
    return this.parse(z.object({ product: productSchema }), result.data, (d) => d.product);
  }

  async updateVariantPrice(variantId: number, price: string): Promise<ShopifyResult<ShopifyVariant>> {
    const result = await this.request("PUT", `/variants/${variantId}.json`, { variant: { id: variantId, price } });
    if (!result.ok) return result;
    return this.parse(z.object({ variant: variantSchema }), result.data, (d) => d.variant);
  }

  async addVariant(productId: number, variant: VariantInput): Promise<ShopifyResult<ShopifyVariant>> {
    const result = await this.request("POST", `/products/${productId}/variants.json`, { variant });
    if (!result.ok) return result;
    return this.parse(z.object({ variant: variantSchema }), result.data, (d) => d.variant);
  }

  async addProductImage(productId: number, src: string): Promise<ShopifyResult<ShopifyImage>> {
    const result = await this.request("POST", `/products/${productId}/images.json`, { image: { src } });
    if (!result.ok) return result;
    return this.parse(z.object({ image: imageSchema }), result.data, (d) => d.image);
  }

  async assignImageToVariant(variantId: number, imageId: number): Promise<ShopifyResult<ShopifyVariant>> {
    const result = await this.request("PUT", `/variants/${variantId}.json`, {
      variant: { id: variantId, image_id: imageId },
    });
    if (!result.ok) return result;
    return this.parse(z.object({ variant: variantSchema }), result.data, (d) => d.variant);
  }

  /**
   * Set the available quantity at the store's first location.
   */
  async setInventoryLevel(inventoryItemId: number, available: number): Promise<ShopifyResult<true>> {
    const location = await this.getLocationId();
    if (!location.ok) return location;

    const result = await this.request("POST", "/inventory_levels/set.json", {
      location_id: location.data,
      inventory_item_id: inventoryItemId,
      available,
    });
    return result.ok ? { ok: true, data: true } : result;
  }

  private async getLocationId(): Promise<ShopifyResult<number>> {
    if (this.locationId !== null) return { ok: true, data: this.locationId };

    const result = await this.request("GET", "/locations.json");
    if (!result.ok) return result;

    const parsed = z.object({ locations: z.array(z.object({ id: z.number() })) }).safeParse(result.data);
    const first = parsed.success ? parsed.data.locations[0] : undefined;
    if (!first) return { ok: false, error: "NO_LOCATION" };

    this.locationId = first.id;
    return { ok: true, data: first.id };
  }

  private parse<S extends z.ZodTypeAny, T>(
    schema: S,
    body: unknown,
    select: (data: z.infer<S>) => T,
  ): ShopifyResult<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) return { ok: false, error: "BAD_RESPONSE" };
    return { ok: true, data: select(parsed.data) };
  }

  private async request(
    method: "GET" | "POST" | "PUT",
    path: string,
    body?: unknown,
  ): Promise<ShopifyResult<unknown>> {
    if (!this.isConfigured()) return { ok: false, error: "MARKETPLACE_NOT_CONFIGURED" };

    const url = `https://${this.options.store}/admin/api/${this.options.apiVersion}${path}`;
    const result = await fetchJson(
      this.fetchImpl,
      url,
      {
        method,
        headers: {
          "X-Shopify-Access-Token": this.options.accessToken,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        ...(body === undefined ? {} : { body: JSON.stringify(body) }),
      },
      this.options.timeoutMs,
    );

    if (!result.ok) {
      this.logger.warn({ method, path, status: result.status, error: result.error }, "shopify.request_failed");
      return { ok: false, status: result.status, error: result.error };
    }
    return { ok: true, data: result.body };
  }
}
