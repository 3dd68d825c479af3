import type { DirectoryItem } from "~/types";

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " "
};

export function unescapeHtml(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match: string, entity: string) => {
    if (entity[0] === "#") {
      const code = entity[1] === "x" || entity[1] === "X" ? Number.parseInt(entity.slice(2), 16) : Number.parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function classifyHref(href: string): DirectoryItem {
  return href.endsWith("/") ? { kind: "directory", href } : { kind: "file", href };
}

function readHref(attributes: string): string | null {
  for (const [, name, doubleQuoted, singleQuoted, bare] of attributes.matchAll(/([^\s=/>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+)))?/g)) {
    if (name.toLowerCase() === "href") {
      return unescapeHtml(doubleQuoted ?? singleQuoted ?? bare ?? "");
    }
  }
  return null;
}

/**
 * Walks the start tags of an autoindex page in order and yields one item per anchor that carries an href.
 * Comments, closing tags and every other element are skipped.
 */
export function* readDirectoryItems(html: string): Generator<DirectoryItem> {
  const tags = /<!--[\s\S]*?-->|<(\/?)([a-zA-Z][^\s/>]*)((?:"[^"]*"|'[^']*'|[^>"'])*)>/g;

  for (const [, closing, tagName, attributes] of html.matchAll(tags)) {
    if (tagName === undefined || closing || tagName.toLowerCase() !== "a") {
      continue;
    }

    const href = readHref(attributes);
    if (href !== null) {
      yield classifyHref(href);
    }
  }
}
