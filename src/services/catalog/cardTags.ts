import type { CatalogCard } from "./scryfallClient";

const COLOUR_NAMES: Record<string, string> = {
  W: "White",
  U: "Blue",
  B: "Black",
  R: "Red",
  G: "Green",
};

const TYPE_LINE_SEPARATOR = "\u2014";

export interface CardTags {
  colourTags: string[];
  /** Capitalised rarity, e.g. "Mythic". Empty when the catalog has none. */
  rarity: string;
  types: string[];
  /** Comma-joined tag string for the listing's Tags column. */
  tags: string;
}

export function capitalize(value: string): string {
  if (!value) return value;
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Supertypes and card types: the capitalised words of the type line before
 * the subtype separator, so "Legendary Creature" for a legendary elf druid.
 */
export function cardTypes(typeLine: string): string[] {
  const [front = ""] = typeLine.split(TYPE_LINE_SEPARATOR);
  return front
    .split(/\s+/)
    .map((word) => word.trim())
    .filter((word) => /^\p{Lu}/u.test(word));
}

export function colourTags(colors: readonly string[] | undefined): string[] {
  if (!colors || colors.length === 0) return ["Colour: Colorless"];
  return colors.map((code) => `Colour: ${COLOUR_NAMES[code] ?? code}`);
}

export function buildCardTags(card: Pick<CatalogCard, "colors" | "rarity" | "type_line" | "card_faces">): CardTags {
  // Double-faced cards carry colours per face only
  const colors = card.colors ?? card.card_faces?.[0]?.colors;
  const colours = colourTags(colors);
  const rarity = capitalize(card.rarity);
  const types = cardTypes(card.type_line);

  const parts = [...colours, rarity ? `Rarity: ${rarity}` : "", types.length > 0 ? `Type: ${types.join(" ")}` : ""];
  return {
    colourTags: colours,
    rarity,
    types,
    tags: parts.filter((part) => part.length > 0).join(", "),
  };
}

/**
 * Append a tag to a comma-separated tag list unless it is already there.
 */
export function ensureTag(tags: string, tag: string): string {
  if (!tag) return tags;
  const present = tags
    .split(",")
    .map((part) => part.trim())
    .includes(tag);
  if (present) return tags;
  return tags ? `${tags}, ${tag}` : tag;
}

/**
 * Variant label: set name, then " (Foil)" and " [Boosterfun]" markers.
 */
export function buildOptionValue(setName: string, foil: boolean, frameEffects: readonly string[] = []): string {
  let value = setName.trim();
  if (foil) value += " (Foil)";
  if (frameEffects.includes("boosterfun")) value += " [Boosterfun]";
  return value;
}

export function cardImageUrl(card: Pick<CatalogCard, "image_uris" | "card_faces">): string {
  return card.image_uris?.png ?? card.card_faces?.[0]?.image_uris?.png ?? "";
}

/**
 * Catalog USD price for the printing; foil falls back to the regular price.
 */
export function cardUsdPrice(card: Pick<CatalogCard, "prices">, foil: boolean): string | null {
  const foilPrice = foil ? card.prices.usd_foil : null;
  return foilPrice || card.prices.usd || null;
}
