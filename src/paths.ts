import { CONFIG_FILE_NAME, CONFIG_HOME_ENV, CUSTOM_TOOLCHAIN_HOME_ENV, PRODUCT_NAME, TOOLCHAIN_HOME_ENV, TOOLCHAINS_DIR } from "~/constants";
import type { HomeKind, ToolchainHome } from "~/types";

import { homedir } from "os";
import path from "path";

type BaseDir = "config" | "data" | "cache";

function envPath(name: string): string | null {
  const value = process.env[name];
  return value && value.length !== 0 ? value : null;
}

/**
 * Per-user base directories, following XDG on Linux, Known Folders on Windows and
 * ~/Library on macOS. Returns null when no home directory can be determined.
 */
export function baseDir(kind: BaseDir): string | null {
  let home: string;
  try {
    home = homedir();
  } catch {
    return null;
  }
  if (home.length === 0) {
    return null;
  }

  if (process.platform === "win32") {
    const roaming = envPath("APPDATA") ?? path.join(home, "AppData", "Roaming");
    const local = envPath("LOCALAPPDATA") ?? path.join(home, "AppData", "Local");
    return kind === "cache" ? local : roaming;
  }

  if (process.platform === "darwin") {
    const library = path.join(home, "Library");
    return kind === "cache" ? path.join(library, "Caches") : path.join(library, "Application Support");
  }

  switch (kind) {
    case "config":
      return envPath("XDG_CONFIG_HOME") ?? path.join(home, ".config");
    case "data":
      return envPath("XDG_DATA_HOME") ?? path.join(home, ".local", "share");
    case "cache":
      return envPath("XDG_CACHE_HOME") ?? path.join(home, ".cache");
  }
}

export function configPath(): string | null {
  const base = envPath(CONFIG_HOME_ENV) ?? baseDir("config");
  return base === null ? null : path.join(base, PRODUCT_NAME, CONFIG_FILE_NAME);
}

export function toolchainHome(kind: HomeKind): ToolchainHome | null {
  const base = kind === "custom" ? (envPath(CUSTOM_TOOLCHAIN_HOME_ENV) ?? baseDir("data")) : (envPath(TOOLCHAIN_HOME_ENV) ?? baseDir("cache"));
  return base === null ? null : { kind, path: path.join(base, PRODUCT_NAME, TOOLCHAINS_DIR) };
}

/** Toolchain homes in lookup order: the custom home always comes first. */
export function toolchainHomes(): ToolchainHome[] {
  return (["custom", "cache"] as const).map((kind) => toolchainHome(kind)).filter((home): home is ToolchainHome => home !== null);
}
