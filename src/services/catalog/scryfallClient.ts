/**
 * Card catalog client for a Scryfall-compatible API.
 *
 * Lookups are spaced by `requestDelayMs` so batch enrichment stays within
 * the public API's rate guidance.
 */

import type { Logger } from "pino";
import { z } from "zod";
import { fetchJson, sleep, type FetchLike } from "../../utils/fetchJson";

const imageUrisSchema = z.object({ png: z.string().optional() });

const catalogCardSchema = z.object({
  name: z.string(),
  set: z.string().default(""),
  set_name: z.string().default(""),
  collector_number: z.string().default(""),
  rarity: z.string().default(""),
  colors: z.array(z.string()).optional(),
  type_line: z.string().default(""),
  frame_effects: z.array(z.string()).default([]),
  digital: z.boolean().default(false),
  layout: z.string().default("normal"),
  prices: z
    .object({
      usd: z.string().nullable().optional(),
      usd_foil: z.string().nullable().optional(),
    })
    .default({}),
  image_uris: imageUrisSchema.optional(),
  card_faces: z
    .array(
      z.object({
        colors: z.array(z.string()).optional(),
        image_uris: imageUrisSchema.optional(),
      }),
    )
    .optional(),
});

export type CatalogCard = z.infer<typeof catalogCardSchema>;

const catalogSetSchema = z.object({
  code: z.string(),
  name: z.string(),
  set_type: z.string(),
  released_at: z.string().optional(),
});

export type CatalogSet = z.infer<typeof catalogSetSchema>;

const setListSchema = z.object({ data: z.array(catalogSetSchema) });

const cardPageSchema = z.object({
  data: z.array(z.unknown()),
  has_more: z.boolean().optional(),
  next_page: z.string().nullable().optional(),
});

/** Paper set types offered for whole-set listings. */
export const LISTABLE_SET_TYPES: ReadonlySet<string> = new Set([
  "expansion",
  "core",
  "masters",
  "draft_innovation",
  "commander",
  "starter",
  "funny",
  "duel_deck",
  "box",
  "from_the_vault",
  "spellbook",
  "premium_deck",
  "archenemy",
  "planechase",
  "vanguard",
  "treasure_chest",
  "alchemy",
  "remaster",
]);

const EXCLUDED_LAYOUTS: ReadonlySet<string> = new Set(["token", "art_series"]);

export interface CatalogClientOptions {
  baseUrl: string;
  timeoutMs: number;
  requestDelayMs: number;
  fetch?: FetchLike;
}

export interface SetCardsResult {
  cards: CatalogCard[];
  /** False when a later page failed and only the earlier pages are present. */
  complete: boolean;
}

export class CatalogClient {
  private readonly fetchImpl: FetchLike;
  private lastRequestAt = 0;

  constructor(
    private readonly options: CatalogClientOptions,
    private readonly logger: Logger,
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Exact-name lookup, optionally pinned to a set. Returns null when the card
   * is unknown or the catalog cannot be reached.
   */
  async fetchCard(name: string, setCode?: string | null): Promise<CatalogCard | null> {
    const params = new URLSearchParams({ exact: name });
    if (setCode && setCode.trim()) params.set("set", setCode.trim().toLowerCase());

    const body = await this.getJson(`/cards/named?${params.toString()}`, { name, setCode: setCode ?? null });
    if (body === null) return null;

    const parsed = catalogCardSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ name, issues: parsed.error.issues.length }, "catalog.card.invalid_response");
      return null;
    }
    return parsed.data;
  }

  /**
   * Paper sets suitable for a full listing, newest first.
   */
  async fetchSets(): Promise<CatalogSet[] | null> {
    const body = await this.getJson("/sets", {});
    if (body === null) return null;

    const parsed = setListSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, "catalog.sets.invalid_response");
      return null;
    }

    return parsed.data.data
      .filter((set) => LISTABLE_SET_TYPES.has(set.set_type))
      .sort((a, b) => (b.released_at ?? "").localeCompare(a.released_at ?? ""));
  }

  /**
   * Every regular paper card of a set, following pagination. Digital cards,
   * tokens and art series cards are left out.
   */
  async fetchSetCards(setCode: string): Promise<SetCardsResult | null> {
    const query = `e:${setCode.trim().toLowerCase()} game:paper -is:token -promo`;
    let url: string | null = `${this.options.baseUrl}/cards/search?${new URLSearchParams({ q: query }).toString()}`;
    const cards: CatalogCard[] = [];
    let pages = 0;

    while (url) {
      const body = await this.getJson(url, { setCode, page: pages + 1 }, true);
      if (body === null) {
        if (pages === 0) return null;
        this.logger.warn({ setCode, pages, cards: cards.length }, "catalog.set_cards.incomplete");
        return { cards, complete: false };
      }

      const page = cardPageSchema.safeParse(body);
      if (!page.success) {
        this.logger.warn({ setCode, page: pages + 1 }, "catalog.set_cards.invalid_response");
        return pages === 0 ? null : { cards, complete: false };
      }
      pages++;

      for (const raw of page.data.data) {
        const card = catalogCardSchema.safeParse(raw);
        if (!card.success) continue;
        if (card.data.digital || EXCLUDED_LAYOUTS.has(card.data.layout)) continue;
        cards.push(card.data);
      }
      url = page.data.next_page ?? null;
    }

    this.logger.info({ setCode, pages, cards: cards.length }, "catalog.set_cards.complete");
    return { cards, complete: true };
  }

  private async getJson(
    pathOrUrl: string,
    context: Record<string, unknown>,
    absolute = false,
  ): Promise<unknown> {
    await this.pace();
    const url = absolute ? pathOrUrl : `${this.options.baseUrl}${pathOrUrl}`;
    const result = await fetchJson(
      this.fetchImpl,
      url,
      { method: "GET", headers: { Accept: "application/json" } },
      this.options.timeoutMs,
    );

    if (!result.ok) {
      if (result.status === 404) {
        this.logger.debug(context, "catalog.not_found");
      } else {
        this.logger.warn({ ...context, status: result.status, error: result.error }, "catalog.request_failed");
      }
      return null;
    }
    return result.body;
  }

  private async pace(): Promise<void> {
    const delay = this.options.requestDelayMs;
    if (delay > 0) {
      const wait = this.lastRequestAt + delay - Date.now();
      if (wait > 0) await sleep(wait);
    }
    this.lastRequestAt = Date.now();
  }
}
