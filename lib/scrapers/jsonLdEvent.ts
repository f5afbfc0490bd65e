/**
 * Extract schema.org Event objects from application/ld+json blocks, keeping each
 * object paired with the <script> element it came from so callers can look at
 * the markup around it.
 */
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { isText } from "domhandler";

export type JsonObject = { readonly [key: string]: unknown };

/** A decoded JSON-LD payload. Only objects and arrays can carry events. */
export type JsonLdPayload =
  | { kind: "object"; value: JsonObject }
  | { kind: "array"; items: readonly unknown[] }
  | { kind: "other" };

/** Fields of a schema.org Event that the pipeline reads; absent when missing or not a string. */
export interface EventObject {
  name?: string;
  startDate?: string;
  location?: {
    name?: string;
    locality?: string;
  };
  offerUrl?: string;
}

export interface JsonLdEventBlock {
  block: Element;
  event: EventObject;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

export function readString(obj: JsonObject | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === "string" ? value : undefined;
}

export function readObject(obj: JsonObject | undefined, key: string): JsonObject | undefined {
  const value = obj?.[key];
  return isJsonObject(value) ? value : undefined;
}

/** Decode a block's text. Returns null when the text is not valid JSON. */
export function decodeJsonLd(text: string): JsonLdPayload | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (Array.isArray(value)) return { kind: "array", items: value };
  if (isJsonObject(value)) return { kind: "object", value };
  return { kind: "other" };
}

function payloadObjects(payload: JsonLdPayload): JsonObject[] {
  switch (payload.kind) {
    case "object":
      return [payload.value];
    case "array":
      return payload.items.filter(isJsonObject);
    case "other":
      return [];
  }
}

export function toEventObject(obj: JsonObject): EventObject {
  const location = readObject(obj, "location");
  const address = readObject(location, "address");
  const offers = readObject(obj, "offers");
  return {
    name: readString(obj, "name"),
    startDate: readString(obj, "startDate"),
    location: location
      ? { name: readString(location, "name"), locality: readString(address, "addressLocality") }
      : undefined,
    offerUrl: readString(offers, "url"),
  };
}

function scriptText(el: Element): string {
  return el.children
    .filter(isText)
    .map((t) => t.data)
    .join("")
    .trim();
}

/**
 * Every object declaring "@type": "Event", in document order and then array order.
 * Empty and malformed blocks are skipped; they never abort the page.
 */
export function extractJsonLdEvents($: CheerioAPI): JsonLdEventBlock[] {
  const out: JsonLdEventBlock[] = [];
  $('script[type="application/ld+json"]').each((_, block) => {
    const text = scriptText(block);
    if (!text) return;
    const payload = decodeJsonLd(text);
    if (!payload) return;
    for (const obj of payloadObjects(payload)) {
      if (obj["@type"] === "Event") out.push({ block, event: toEventObject(obj) });
    }
  });
  return out;
}
