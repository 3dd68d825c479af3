import { NotFoundError } from "~/errors";
import { toolchainHomes } from "~/paths";
import type { ConfigData, FoundToolchain, InstalledToolchains, Selector, ToolchainLocation } from "~/types";
import { isSubVersionOf, maxByVersion } from "~/version";

import { existsSync, readdirSync } from "fs";
import path from "path";

/** Names of the subdirectories of dir, or null when dir is missing or unreadable. */
export function readToolchainNames(dir: string): string[] | null {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name);
  } catch {
    return null;
  }
}

export function listInstalled(): InstalledToolchains[] {
  const result: InstalledToolchains[] = [];
  for (const home of toolchainHomes()) {
    const names = readToolchainNames(home.path);
    if (names !== null) {
      result.push({ home, names });
    }
  }
  return result;
}

export function isInstalled(version: string): boolean {
  return toolchainHomes().some((home) => existsSync(path.join(home.path, version)));
}

/**
 * Exact-name lookup. The custom home is checked first and wins whenever it has the version,
 * even if the cache home has it too.
 */
export function findToolchainPath(version: string): ToolchainLocation | null {
  for (const home of toolchainHomes()) {
    const toolchainPath = path.join(home.path, version);
    if (existsSync(toolchainPath)) {
      return { home, path: toolchainPath };
    }
  }
  return null;
}

/**
 * Newest installed toolchain that is superVersion or a refinement of it. Unlike {@link findToolchainPath},
 * the names of both homes are pooled before picking the maximum.
 */
export function findLatestToolchainOf(superVersion: string): FoundToolchain | null {
  const candidates: FoundToolchain[] = [];

  for (const { home, names } of listInstalled()) {
    for (const name of names) {
      if (isSubVersionOf(name, superVersion)) {
        candidates.push({ name, home, path: path.join(home.path, name) });
      }
    }
  }

  return maxByVersion(candidates, (candidate) => candidate.name);
}

export function findToolchain(selector: Selector, config: ConfigData): FoundToolchain {
  if (selector.kind === "super") {
    const found = findLatestToolchainOf(selector.version);
    if (!found) {
      throw new NotFoundError("latest", selector.version);
    }
    return found;
  }

  const version = Object.hasOwn(config.aliases, selector.name) ? config.aliases[selector.name] : undefined;
  if (version === undefined) {
    throw new NotFoundError("no-alias-default", selector.name);
  }

  const location = findToolchainPath(version);
  if (!location) {
    throw new NotFoundError("aliased", version, selector.name);
  }

  return { name: version, ...location };
}
