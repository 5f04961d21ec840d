import type { Logger } from "pino";
import {
  cellText,
  getCell,
  textCell,
  type CellValue,
  type Row,
  type TabularDataset,
} from "../../domain/dataset";
import type { Separator, TextEncodingName } from "../../domain/formats";
import { buildCardTags, cardUsdPrice } from "../catalog/cardTags";
import type { CatalogClient, CatalogSet } from "../catalog/scryfallClient";
import { loadDataset } from "../merge/datasetLoader";
import type { ForexClient } from "../pricing/forexClient";
import { priceWithVat, type PricePolicy } from "../pricing/pricePolicy";
import { parseCardList } from "./cardListParser";
import { buildListingRow, listingDataset, type ListingDefaults, type ListingRow } from "./listingBuilder";
import { detectListInputFormat, findHeader, type ListInputFormat } from "./listInputFormat";

export type ListingErrorCode = "LOAD_ERROR" | "UNSUPPORTED_INPUT" | "CATALOG_UNAVAILABLE";

export type ListingOutcome =
  | {
      ok: true;
      /** "listing" rows follow the marketplace columns; "tagged" keeps the input columns. */
      kind: "listing" | "tagged";
      format: ListInputFormat | "card_list" | "set";
      dataset: TabularDataset;
      /** Card names the catalog could not find. */
      missing: string[];
      warnings: string[];
      rate: number | null;
    }
  | { ok: false; error: ListingErrorCode; message: string };

export interface ListingUpload {
  fileName: string;
  content: Uint8Array;
  separator?: Separator;
  encoding?: TextEncodingName;
}

export interface EnrichmentOptions {
  pricing: PricePolicy & { sourceCurrency: string; targetCurrency: string };
  defaults: ListingDefaults;
}

const FOIL_VALUES = new Set(["yes", "true", "1"]);

function cellString(row: Row, column: string | null): string {
  if (column === null) return "";
  return (cellText(getCell(row, column)) ?? "").trim();
}

function parseQuantity(row: Row, column: string | null): number {
  if (column === null) return 1;
  const cell = getCell(row, column);
  const value = cell.kind === "number" ? cell.value : Number.parseInt(cellText(cell) ?? "", 10);
  return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : 1;
}

/**
 * ListingEnrichmentService turns card lists into marketplace listings:
 * - Deckbox exports become full product rows with prices
 * - Plain name lists get a Tags column filled from the catalog
 * - A set code becomes a listing of every regular card in the set
 */
export class ListingEnrichmentService {
  constructor(
    private readonly catalog: CatalogClient,
    private readonly forex: ForexClient,
    private readonly options: EnrichmentOptions,
    private readonly logger: Logger,
  ) {}

  /**
   * Enrich an uploaded .txt card list or .csv export, picking the mode from
   * the file type and header row.
   */
  async enrichUpload(upload: ListingUpload): Promise<ListingOutcome> {
    if (upload.fileName.toLowerCase().endsWith(".txt")) {
      const text = new TextDecoder("utf-8").decode(upload.content);
      const dataset = parseCardList(text, upload.fileName);
      if (dataset.rows.length === 0) {
        return { ok: false, error: "UNSUPPORTED_INPUT", message: "Card list is empty" };
      }
      const outcome = await this.tagNamedList(dataset);
      return outcome.ok ? { ...outcome, format: "card_list" } : outcome;
    }

    const loaded = loadDataset({
      sourceId: upload.fileName,
      content: upload.content,
      separator: upload.separator ?? "comma",
      encoding: upload.encoding ?? "utf-8",
    });
    if (!loaded.ok) return { ok: false, error: "LOAD_ERROR", message: loaded.error.message };

    const { dataset } = loaded.value;
    const format = detectListInputFormat(dataset.columns.map((c) => c.name));
    this.logger.info({ fileName: upload.fileName, format, rows: dataset.rows.length }, "listing.upload.detected");

    switch (format) {
      case "deckbox":
        return this.enrichDeckbox(dataset);
      case "named_list":
        return this.tagNamedList(dataset);
      case "unknown":
        return {
          ok: false,
          error: "UNSUPPORTED_INPUT",
          message: "Expected a Name or Title column, or a Deckbox export with Name, Count and Edition Code",
        };
    }
  }

  async enrichDeckbox(dataset: TabularDataset): Promise<ListingOutcome> {
    const headers = dataset.columns.map((c) => c.name);
    const nameColumn = findHeader(headers, ["name"]);
    if (nameColumn === null) {
      return { ok: false, error: "UNSUPPORTED_INPUT", message: "Deckbox export has no Name column" };
    }
    const countColumn = findHeader(headers, ["count"]);
    const setColumn = findHeader(headers, ["edition code"]);
    const foilColumn = findHeader(headers, ["foil"]);
    const editionColumn = findHeader(headers, ["edition"]);
    const numberColumn = findHeader(headers, ["card number"]);

    const rate = await this.exchangeRate();
    const rows: ListingRow[] = [];
    const missing: string[] = [];
    const warnings: string[] = [];

    for (const [index, row] of dataset.rows.entries()) {
      const name = cellString(row, nameColumn);
      if (!name) {
        warnings.push(`Row ${index + 1} has no card name`);
        continue;
      }
      const setCode = cellString(row, setColumn) || null;
      const foil = FOIL_VALUES.has(cellString(row, foilColumn).toLowerCase());

      const card = await this.catalog.fetchCard(name, setCode);
      if (!card) missing.push(name);

      const listing = buildListingRow(
        {
          name,
          quantity: parseQuantity(row, countColumn),
          card,
          foil,
          price: card ? priceWithVat(cardUsdPrice(card, foil), rate, this.options.pricing) : "",
          fallbackSetName: cellString(row, editionColumn),
          fallbackCardNumber: cellString(row, numberColumn),
        },
        this.options.defaults,
      );
      if (!listing["Option1 Value"]) {
        warnings.push(`Row ${index + 1} ("${name}") has no Option1 Value`);
      }
      rows.push(listing);
    }

    this.logger.info(
      { sourceId: dataset.sourceId, rows: rows.length, missing: missing.length, warnings: warnings.length },
      "listing.deckbox.complete",
    );
    return {
      ok: true,
      kind: "listing",
      format: "deckbox",
      dataset: listingDataset(rows, dataset.sourceId),
      missing,
      warnings,
      rate,
    };
  }

  /**
   * Fill a Tags column from the catalog, adding the column when absent.
   * Rows the catalog does not know keep their existing tags.
   */
  async tagNamedList(dataset: TabularDataset): Promise<ListingOutcome> {
    const headers = dataset.columns.map((c) => c.name);
    const nameColumn = findHeader(headers, ["name", "title"]);
    if (nameColumn === null) {
      return { ok: false, error: "UNSUPPORTED_INPUT", message: "Card list has no Name or Title column" };
    }
    const setColumn = findHeader(headers, ["edition code", "set code", "set"]);
    const hasTags = headers.includes("Tags");

    const missing: string[] = [];
    const rows: Row[] = [];
    for (const row of dataset.rows) {
      const name = cellString(row, nameColumn);
      const existing: CellValue = hasTags ? getCell(row, "Tags") : textCell("");
      if (!name) {
        rows.push({ ...row, Tags: existing });
        continue;
      }

      const card = await this.catalog.fetchCard(name, cellString(row, setColumn) || null);
      if (!card) missing.push(name);
      rows.push({ ...row, Tags: card ? textCell(buildCardTags(card).tags) : existing });
    }

    this.logger.info(
      { sourceId: dataset.sourceId, rows: rows.length, missing: missing.length },
      "listing.tagging.complete",
    );
    return {
      ok: true,
      kind: "tagged",
      format: "named_list",
      dataset: {
        sourceId: dataset.sourceId,
        columns: hasTags ? dataset.columns : [...dataset.columns, { name: "Tags", declaredType: "text" }],
        rows,
      },
      missing,
      warnings: [],
      rate: null,
    };
  }

  async listSets(): Promise<CatalogSet[] | null> {
    return this.catalog.fetchSets();
  }

  /**
   * One listing row per regular card of the set, quantity 1, non-foil price.
   */
  async buildSetListing(setCode: string): Promise<ListingOutcome> {
    const result = await this.catalog.fetchSetCards(setCode);
    if (!result) {
      return { ok: false, error: "CATALOG_UNAVAILABLE", message: `Could not fetch cards for set "${setCode}"` };
    }

    const rate = await this.exchangeRate();
    const rows = result.cards.map((card) =>
      buildListingRow(
        {
          quantity: 1,
          card,
          foil: false,
          price: priceWithVat(cardUsdPrice(card, false), rate, this.options.pricing),
        },
        this.options.defaults,
      ),
    );
    const warnings = result.complete ? [] : ["Catalog stopped responding; the listing is missing later pages"];

    this.logger.info({ setCode, cards: rows.length, complete: result.complete }, "listing.set.complete");
    return {
      ok: true,
      kind: "listing",
      format: "set",
      dataset: listingDataset(rows, `${setCode.toLowerCase()}-cards.csv`),
      missing: [],
      warnings,
      rate,
    };
  }

  private async exchangeRate(): Promise<number | null> {
    const { sourceCurrency, targetCurrency } = this.options.pricing;
    const rate = await this.forex.getRate(sourceCurrency, targetCurrency);
    if (rate === null) {
      this.logger.warn({ sourceCurrency, targetCurrency }, "listing.prices_unconverted");
    }
    return rate;
  }
}
