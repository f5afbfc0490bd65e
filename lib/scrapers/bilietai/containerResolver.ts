import type { CheerioAPI } from "cheerio";
import type { AnyNode, Document, Element } from "domhandler";
import { isDocument, isTag } from "domhandler";
import { resolveUrl } from "../domWalk";

export const SITE_ROOT = "https://www.bilietai.lt";

/** How many ancestors of a JSON-LD block are searched for its detail link. */
export const MAX_ASCENT = 10;

/** A node that groups one event's markup: an element, or the whole page at the top of the chain. */
export type Container = Element | Document;

export interface ResolvedContainer {
  container: Container | null;
  /** Absolute event-detail URL, "" when no unambiguous link was found. */
  link: string;
}

const EVENT_PAGE_PATH = /\/(?:eng|lit)\/tickets\/.+-\d+/;
const ABS_EVENT_PAGE_URL = /https?:\/\/(?:www\.)?bilietai\.lt\/(?:eng|lit)\/tickets\/.+-\d+/;

/**
 * Absolute URL when `href` has the shape of an event-detail page
 * (/eng/tickets/<slug>-<id> or /lit/...), otherwise null.
 */
export function eventPageUrl(href: string, siteRoot = SITE_ROOT): string | null {
  if (href.startsWith("/") && EVENT_PAGE_PATH.test(href)) {
    return resolveUrl(href, siteRoot);
  }
  if (ABS_EVENT_PAGE_URL.test(href)) {
    return href.split("#")[0];
  }
  return null;
}

/** Up to `limit` ancestors of `node`, nearest first. Index 0 is the direct parent. */
export function ancestorChain(node: AnyNode, limit = MAX_ASCENT): Container[] {
  const chain: Container[] = [];
  let current = node.parent;
  while (current && chain.length < limit) {
    if (isTag(current) || isDocument(current)) chain.push(current);
    current = current.parent;
  }
  return chain;
}

function uniqueEventLinks($: CheerioAPI, root: Container, siteRoot: string): string[] {
  const links = new Set<string>();
  $(root)
    .find("a[href]")
    .each((_, a) => {
      const url = eventPageUrl(a.attribs.href, siteRoot);
      if (url) links.add(url);
    });
  return [...links];
}

/**
 * Find the one event-detail link that belongs to a JSON-LD block.
 *
 * Blocks are not annotated with their link, so the enclosing <a> wins when it is a
 * detail link; otherwise the smallest ancestor (within MAX_ASCENT levels) whose
 * detail links collapse to a single URL is the container. Zero or several
 * candidates at every level means the block is unresolvable.
 */
export function resolveContainer($: CheerioAPI, block: Element, siteRoot = SITE_ROOT): ResolvedContainer {
  const enclosing = $(block).parents("a[href]").first().get(0);
  if (enclosing) {
    const url = eventPageUrl(enclosing.attribs.href, siteRoot);
    if (url) return { container: enclosing, link: url };
  }

  const chain = ancestorChain(block);
  for (let level = 0; level < chain.length; level++) {
    const candidate = chain[level];
    const links = uniqueEventLinks($, candidate, siteRoot);
    if (links.length === 1) return { container: candidate, link: links[0] };
  }

  return { container: null, link: "" };
}
