import { DEFAULT_MAX_DOWNLOAD_SIZE, DEFAULT_ROOT_URL, DEFAULT_SELECTOR, TOOLCHAIN_ENV } from "~/constants";
import { ConfigError } from "~/errors";
import { configPath } from "~/paths";
import type { ConfigData, ToolchainSource } from "~/types";

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { z } from "zod";

const sourceSchema = z
  .object({
    rootUrl: z.string().url().default(DEFAULT_ROOT_URL),
    maxDownloadSize: z.number().int().positive().default(DEFAULT_MAX_DOWNLOAD_SIZE)
  })
  .strict();

export const configSchema = z
  .object({
    default: z.string().min(1).default(DEFAULT_SELECTOR),
    aliases: z.record(z.string()).default({}),
    source: sourceSchema.default({})
  })
  .strict();

export function defaultConfig(): ConfigData {
  return {
    default: DEFAULT_SELECTOR,
    aliases: {},
    source: {
      rootUrl: DEFAULT_ROOT_URL,
      maxDownloadSize: DEFAULT_MAX_DOWNLOAD_SIZE
    }
  };
}

export function parseConfig(text: string, file: string): ConfigData {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError("Failed to parse", file, { cause: e });
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    throw new ConfigError("Invalid configuration in", file, { cause: issues });
  }
  return result.data;
}

export function serializeConfig(data: ConfigData): string {
  return JSON.stringify(data, null, 2) + "\n";
}

/**
 * Handle on the configuration file. Each command opens its own; changes are only persisted by {@link save}.
 */
export class ConfigStore {
  readonly path: string;
  private current: ConfigData;

  private constructor(file: string, data: ConfigData) {
    this.path = file;
    this.current = data;
  }

  /** Opens the configuration at file, writing the defaults there first if it doesn't exist. */
  static open(file: string | null = configPath()): ConfigStore {
    if (file === null) {
      throw new ConfigError("Couldn't determine the configuration path", null);
    }

    if (!existsSync(file)) {
      try {
        mkdirSync(path.dirname(file), { recursive: true });
        writeFileSync(file, serializeConfig(defaultConfig()));
      } catch (e) {
        throw new ConfigError("Failed to create default configuration at", file, { cause: e });
      }
    }

    let text: string;
    try {
      text = readFileSync(file).toString("utf-8");
    } catch (e) {
      throw new ConfigError("Failed to open", file, { cause: e });
    }

    return new ConfigStore(file, parseConfig(text, file));
  }

  get data(): ConfigData {
    return this.current;
  }

  setDefault(selector: string) {
    this.current = { ...this.current, default: selector };
  }

  setAlias(alias: string, version: string) {
    this.current = { ...this.current, aliases: { ...this.current.aliases, [alias]: version } };
  }

  save() {
    try {
      writeFileSync(this.path, serializeConfig(this.current));
    } catch (e) {
      throw new ConfigError("Failed to write changes to", this.path, { cause: e });
    }
  }
}

/** Selector the proxy should use, and where it came from. */
export function currentToolchain(data: ConfigData): { selector: string; source: ToolchainSource } {
  const fromEnv = process.env[TOOLCHAIN_ENV];
  if (fromEnv !== undefined && fromEnv.length !== 0) {
    return { selector: fromEnv, source: "env" };
  }
  return { selector: data.default, source: "config" };
}
