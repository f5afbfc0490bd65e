import type { CheerioAPI } from "cheerio";
import type { AnyNode, Element, Text } from "domhandler";
import { hasChildren, isTag, isText } from "domhandler";

/** Elements whose text is code or styling, never page copy. */
const OPAQUE_TAGS = new Set(["script", "style"]);

function isOpaque(node: AnyNode): boolean {
  return isTag(node) && OPAQUE_TAGS.has(node.name);
}

/**
 * Pre-order walk of a subtree. Opaque elements are visited but not entered.
 */
function* preOrder(root: AnyNode): Generator<AnyNode> {
  const stack: AnyNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    yield node;
    if (node !== root && isOpaque(node)) continue;
    if (hasChildren(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
    }
  }
}

/** Visible text nodes beneath a node, in document order. */
export function textNodes(root: AnyNode): Text[] {
  const out: Text[] = [];
  for (const node of preOrder(root)) {
    if (isText(node)) out.push(node);
  }
  return out;
}

/** Every text node trimmed, blanks dropped, joined with single spaces. */
export function flattenText(root: AnyNode): string {
  return textNodes(root)
    .map((t) => t.data.trim())
    .filter(Boolean)
    .join(" ");
}

/** Text as written in the markup, without separators or trimming. */
export function rawText(root: AnyNode): string {
  return textNodes(root)
    .map((t) => t.data)
    .join("");
}

/** Non-blank lines of the page's visible text, one or more per text node. */
export function textLines(root: AnyNode): string[] {
  return textNodes(root)
    .map((t) => t.data.trim())
    .filter(Boolean)
    .join("\n")
    .split("\n")
    .filter((line) => line.trim());
}

/** Collapse whitespace runs to one space, trim, and compose to NFC. */
export function norm(text: string | null | undefined): string {
  if (!text) return "";
  return text.replace(/\s+/g, " ").trim().normalize("NFC");
}

/** Nearest ancestor element (excluding the node itself) that satisfies the test. */
export function findParent(node: AnyNode, test: (el: Element) => boolean): Element | null {
  let current = node.parent;
  while (current) {
    if (isTag(current) && test(current)) return current;
    current = current.parent;
  }
  return null;
}

export function hasHref(el: Element): boolean {
  return typeof el.attribs.href === "string";
}

const HAS_SCHEME = /^[a-z][a-z\d+.-]*:/i;

/**
 * Resolve `href` against `baseUrl`. Absolute URLs are kept as written and a
 * path-absolute href is appended to the base origin, neither re-encoded.
 * Other relative forms go through the URL parser; hrefs it rejects are returned as written.
 */
export function resolveUrl(href: string, baseUrl: string): string {
  if (HAS_SCHEME.test(href)) return href;
  try {
    const base = new URL(baseUrl);
    if (href.startsWith("/") && !href.startsWith("//")) return base.origin + href;
    return new URL(href, base).href;
  } catch {
    return href;
  }
}

/**
 * Document-order index of a parsed page, for "previous link before this text"
 * and "next text after this one" lookups across unrelated branches of the tree.
 * Ancestors precede their descendants, so the previous <a> of a link's own text is that link.
 */
export class DocumentWalk {
  private readonly order: AnyNode[] = [];
  private readonly positions = new Map<AnyNode, number>();

  static of($: CheerioAPI): DocumentWalk {
    return new DocumentWalk($.root()[0]);
  }

  constructor(root: AnyNode) {
    for (const node of preOrder(root)) {
      this.positions.set(node, this.order.length);
      this.order.push(node);
    }
  }

  texts(test?: (data: string) => boolean): Text[] {
    const out: Text[] = [];
    for (const node of this.order) {
      if (isText(node) && (!test || test(node.data))) out.push(node);
    }
    return out;
  }

  /** Text nodes after `from`, in document order. */
  *textsAfter(from: AnyNode): Generator<Text> {
    const start = this.positionOf(from);
    for (let i = start + 1; i < this.order.length; i++) {
      const node = this.order[i];
      if (isText(node)) yield node;
    }
  }

  nextText(from: AnyNode, test: (data: string) => boolean): Text | null {
    for (const text of this.textsAfter(from)) {
      if (test(text.data)) return text;
    }
    return null;
  }

  previousText(from: AnyNode, test: (data: string) => boolean): Text | null {
    for (let i = this.positionOf(from) - 1; i >= 0; i--) {
      const node = this.order[i];
      if (isText(node) && test(node.data)) return node;
    }
    return null;
  }

  previousElement(from: AnyNode, test: (el: Element) => boolean): Element | null {
    for (let i = this.positionOf(from) - 1; i >= 0; i--) {
      const node = this.order[i];
      if (isTag(node) && test(node)) return node;
    }
    return null;
  }

  private positionOf(node: AnyNode): number {
    const pos = this.positions.get(node);
    if (pos === undefined) throw new Error("Node is not part of this document");
    return pos;
  }
}
