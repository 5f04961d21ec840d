import type { Logger } from "pino";
import { cellText, getCell, type Row, type TabularDataset } from "../../domain/dataset";
import type { ProductInput, ShopifyClient, ShopifyVariant, VariantInput } from "./shopifyClient";

export type UploadAction = "created" | "updated" | "added" | "failed";

export interface UploadRowResult {
  handle: string;
  option1: string;
  action: UploadAction;
  message?: string;
}

export type UploadOutcome =
  | {
      ok: true;
      results: UploadRowResult[];
      counts: Record<UploadAction, number>;
    }
  | { ok: false; error: "MARKETPLACE_NOT_CONFIGURED" | "INVALID_LISTING"; message: string };

function field(row: Row, column: string): string {
  return (cellText(getCell(row, column)) ?? "").trim();
}

function normalizeOption(value: string): string {
  return value.trim().toLowerCase();
}

function indexVariants(variants: readonly ShopifyVariant[]): Map<string, ShopifyVariant> {
  const byOption = new Map<string, ShopifyVariant>();
  for (const variant of variants) {
    if (variant.option1) byOption.set(normalizeOption(variant.option1), variant);
  }
  return byOption;
}

function joinNotes(...notes: Array<string | null>): { message?: string } {
  const message = notes.filter((note): note is string => note !== null).join("; ");
  return message ? { message } : {};
}

export function rowToVariant(row: Row): VariantInput {
  const quantity = Number.parseInt(field(row, "Variant Inventory Qty"), 10);
  return {
    option1: field(row, "Option1 Value") || "Default Title",
    price: field(row, "Variant Price"),
    sku: field(row, "Variant SKU"),
    inventory_quantity: Number.isFinite(quantity) && quantity > 0 ? quantity : 1,
    inventory_management: field(row, "Variant Inventory Tracker") || "shopify",
    fulfillment_service: field(row, "Variant Fulfillment Service") || "manual",
    inventory_policy: field(row, "Variant Inventory Policy") || "deny",
  };
}

/**
 * Product payload for a handle group; the first row supplies product fields,
 * every row contributes a variant. Images are attached per variant afterwards.
 */
export function groupToProduct(handle: string, rows: readonly Row[]): ProductInput {
  const [first] = rows;
  return {
    title: field(first, "Name"),
    handle,
    body_html: field(first, "Body (HTML)"),
    vendor: field(first, "Vendor"),
    product_type: field(first, "Type"),
    tags: field(first, "Tags"),
    status: field(first, "Status") || "active",
    ...(field(first, "Option1 Name") ? { options: [{ name: field(first, "Option1 Name") }] } : {}),
    variants: rows.map(rowToVariant),
  };
}

export function groupByHandle(dataset: TabularDataset): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of dataset.rows) {
    const handle = field(row, "Handle");
    if (!handle) continue;
    const group = groups.get(handle);
    if (group) group.push(row);
    else groups.set(handle, [row]);
  }
  return groups;
}

/**
 * ListingUploader pushes listing rows to the store, one product per Handle:
 * - Unknown handle: create the product with every row as a variant
 * - Known handle: update the price of variants whose Option1 matches, add the rest
 * - Inventory is set at the store location for every updated or added variant
 * - A row's Image Src is uploaded once per product and assigned to its created or added variant
 */
export class ListingUploader {
  constructor(
    private readonly client: ShopifyClient,
    private readonly logger: Logger,
  ) {}

  async upload(dataset: TabularDataset): Promise<UploadOutcome> {
    if (!this.client.isConfigured()) {
      return {
        ok: false,
        error: "MARKETPLACE_NOT_CONFIGURED",
        message: "Set SHOPIFY_STORE and SHOPIFY_ADMIN_API_ACCESS_TOKEN to upload listings",
      };
    }
    if (!dataset.columns.some((c) => c.name === "Handle")) {
      return { ok: false, error: "INVALID_LISTING", message: "Listing has no Handle column" };
    }

    const groups = groupByHandle(dataset);
    this.logger.info({ products: groups.size, rows: dataset.rows.length }, "listing.upload.start");

    const results: UploadRowResult[] = [];
    for (const [handle, rows] of groups) {
      results.push(...(await this.uploadGroup(handle, rows)));
    }

    const counts: Record<UploadAction, number> = { created: 0, updated: 0, added: 0, failed: 0 };
    for (const result of results) counts[result.action]++;

    this.logger.info(counts, "listing.upload.complete");
    return { ok: true, results, counts };
  }

  private async uploadGroup(handle: string, rows: readonly Row[]): Promise<UploadRowResult[]> {
    const existing = await this.client.findProductByHandle(handle);
    if (!existing.ok) {
      return rows.map((row) => ({
        handle,
        option1: rowToVariant(row).option1,
        action: "failed" as const,
        message: `Product lookup failed: ${existing.error}`,
      }));
    }

    if (!existing.data) return this.createGroup(handle, rows);

    const product = existing.data;
    const variants = indexVariants(product.variants);
    const images = new Map<string, number>();

    const results: UploadRowResult[] = [];
    for (const row of rows) {
      const input = rowToVariant(row);
      const match = variants.get(normalizeOption(input.option1));

      if (match) {
        const updated = await this.client.updateVariantPrice(match.id, input.price || match.price || "");
        if (!updated.ok) {
          results.push({ handle, option1: input.option1, action: "failed", message: `Update failed: ${updated.error}` });
          continue;
        }
        const message = await this.syncInventory(updated.data, input.inventory_quantity);
        results.push({ handle, option1: input.option1, action: "updated", ...joinNotes(message) });
        continue;
      }

      const added = await this.client.addVariant(product.id, input);
      if (!added.ok) {
        results.push({ handle, option1: input.option1, action: "failed", message: `Add failed: ${added.error}` });
        continue;
      }
      variants.set(normalizeOption(input.option1), added.data);
      const inventoryNote = await this.syncInventory(added.data, input.inventory_quantity);
      const imageNote = await this.attachImage(product.id, added.data, field(row, "Image Src"), images);
      results.push({ handle, option1: input.option1, action: "added", ...joinNotes(inventoryNote, imageNote) });
    }
    return results;
  }

  private async createGroup(handle: string, rows: readonly Row[]): Promise<UploadRowResult[]> {
    const payload = groupToProduct(handle, rows);
    const created = await this.client.createProduct(payload);
    if (!created.ok) {
      this.logger.warn({ handle, error: created.error }, "listing.upload.create_failed");
      return payload.variants.map((variant) => ({
        handle,
        option1: variant.option1,
        action: "failed" as const,
        message: `Create failed: ${created.error}`,
      }));
    }

    const variants = indexVariants(created.data.variants);
    const images = new Map<string, number>();
    const results: UploadRowResult[] = [];
    for (const [i, row] of rows.entries()) {
      const { option1 } = payload.variants[i];
      const variant = variants.get(normalizeOption(option1));
      const src = field(row, "Image Src");
      let imageNote: string | null = null;
      if (variant) imageNote = await this.attachImage(created.data.id, variant, src, images);
      else if (src) imageNote = "Image not attached: variant missing from the created product";
      results.push({ handle, option1, action: "created", ...joinNotes(imageNote) });
    }
    return results;
  }

  /**
   * Upload `src` to the product unless this group already did, then point the
   * variant at it. `uploaded` maps image URLs to ids within one product.
   */
  private async attachImage(
    productId: number,
    variant: ShopifyVariant,
    src: string,
    uploaded: Map<string, number>,
  ): Promise<string | null> {
    if (!src) return null;

    let imageId = uploaded.get(src);
    if (imageId === undefined) {
      const image = await this.client.addProductImage(productId, src);
      if (!image.ok) {
        this.logger.warn({ productId, src, error: image.error }, "listing.upload.image_failed");
        return `Image not attached: ${image.error}`;
      }
      imageId = image.data.id;
      uploaded.set(src, imageId);
    }

    const assigned = await this.client.assignImageToVariant(variant.id, imageId);
    if (assigned.ok) return null;
    this.logger.warn({ variantId: variant.id, imageId, error: assigned.error }, "listing.upload.image_failed");
    return `Image not attached: ${assigned.error}`;
  }

  private async syncInventory(variant: ShopifyVariant, quantity: number): Promise<string | null> {
    if (!variant.inventory_item_id) return "Inventory not updated: variant has no inventory item";
    const result = await this.client.setInventoryLevel(variant.inventory_item_id, quantity);
    if (result.ok) return null;
    this.logger.warn({ variantId: variant.id, error: result.error }, "listing.upload.inventory_failed");
    return `Inventory not updated: ${result.error}`;
  }
}
