import { SUPER_VERSION_PREFIX } from "~/constants";
import type { Selector } from "~/types";
import { isSubVersionOf } from "~/version";

export function parseSelector(text: string): Selector {
  if (text.startsWith(SUPER_VERSION_PREFIX)) {
    return { kind: "super", version: text.slice(SUPER_VERSION_PREFIX.length) };
  }
  return { kind: "alias", name: text };
}

export function formatSelector(selector: Selector): string {
  return selector.kind === "super" ? SUPER_VERSION_PREFIX + selector.version : selector.name;
}

export function aliasOf(selector: Selector): string | null {
  return selector.kind === "alias" ? selector.name : null;
}

/**
 * Aliases match only the exact version the alias table maps them to; super versions match themselves
 * and every refinement ("1.12" matches "1.12" and "1.12.0.7192", not "1.1").
 */
export function testSelector(selector: Selector, aliases: Record<string, string>, version: string): boolean {
  if (selector.kind === "alias") {
    return Object.hasOwn(aliases, selector.name) && aliases[selector.name] === version;
  }
  return isSubVersionOf(version, selector.version);
}
