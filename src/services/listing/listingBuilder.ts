/**
 * Marketplace product rows for trading cards.
 *
 * A listing row carries every marketplace import column (see
 * data/marketplace-columns.json); columns without a value are empty text.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { textCell, type CellValue, type Row, type TabularDataset } from "../../domain/dataset";
import {
  buildCardTags,
  buildOptionValue,
  cardImageUrl,
  ensureTag,
} from "../catalog/cardTags";
import type { CatalogCard } from "../catalog/scryfallClient";

const columnsFile = new URL("../../data/marketplace-columns.json", import.meta.url);

export const LISTING_COLUMNS: readonly string[] = z
  .array(z.string().min(1))
  .nonempty()
  .parse(JSON.parse(readFileSync(columnsFile, "utf8")));

export type ListingRow = Record<string, string>;

export interface ListingDefaults {
  vendor: string;
  productCategory: string;
  optionName: string;
  variantGrams: number;
  published: boolean;
}

export interface ListingInput {
  /** Card name as given by the input list; the catalog name is used when absent. */
  name?: string;
  quantity: number;
  card: CatalogCard | null;
  foil: boolean;
  price: string;
  fallbackSetName?: string;
  fallbackCardNumber?: string;
}

export function listingHandle(name: string): string {
  return name.toLowerCase().replace(/ /g, "-");
}

export function emptyListingRow(): ListingRow {
  const row: ListingRow = {};
  for (const column of LISTING_COLUMNS) row[column] = "";
  return row;
}

export function buildListingRow(input: ListingInput, defaults: ListingDefaults): ListingRow {
  const row = emptyListingRow();
  const { card } = input;
  const name = input.name?.trim() || card?.name || "";

  row["Handle"] = listingHandle(name);
  row["Name"] = name;

  if (card) {
    const tags = buildCardTags(card);
    const image = cardImageUrl(card);
    row["Type"] = card.type_line;
    row["Tags"] = tags.rarity ? ensureTag(tags.tags, `Rarity: ${tags.rarity}`) : tags.tags;
    row["Rarity (product.metafields.shopify.rarity)"] = tags.rarity;
    row["Color (product.metafields.shopify.color-pattern)"] = tags.colourTags.join(", ");
    row["Image Src"] = image;
    row["Variant Image"] = image;
    row["Rarity"] = tags.rarity;
  }

  row["Set Name"] = card?.set_name || input.fallbackSetName || "";
  row["Card Number"] = card?.collector_number || input.fallbackCardNumber || "";
  row["Option1 Name"] = defaults.optionName;
  row["Option1 Value"] = buildOptionValue(row["Set Name"], input.foil, card?.frame_effects);

  row["Variant Inventory Qty"] = String(input.quantity);
  row["Variant Price"] = input.price;
  row["Status"] = "draft";
  row["Variant Fulfillment Service"] = "manual";
  row["Variant Inventory Policy"] = "deny";
  row["Vendor"] = defaults.vendor;
  row["Product Category"] = defaults.productCategory;
  row["Published"] = defaults.published ? "TRUE" : "FALSE";
  row["Variant Grams"] = String(defaults.variantGrams);
  row["Variant Inventory Tracker"] = "shopify";
  row["Variant Requires Shipping"] = "TRUE";
  row["Variant Taxable"] = "TRUE";
  row["Gift Card"] = "FALSE";
  row["Variant Weight Unit"] = "g";

  return row;
}

export function listingDataset(rows: readonly ListingRow[], sourceId: string): TabularDataset {
  return {
    sourceId,
    columns: LISTING_COLUMNS.map((name) => ({ name, declaredType: "text" as const })),
    rows: rows.map(
      (listing): Row =>
        Object.fromEntries(
          LISTING_COLUMNS.map((column): [string, CellValue] => [column, textCell(listing[column] ?? "")]),
        ),
    ),
  };
}
