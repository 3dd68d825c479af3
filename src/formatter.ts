import type { RemoteBranchListing } from "~/catalog";
import { NotFoundError } from "~/errors";
import type { ConfigData, InstalledFile, InstalledToolchains, ToolchainSource } from "~/types";

import path from "path";

export function formatBool(value: boolean): string {
  return value ? "Yes" : "No";
}

export function formatInstalledFile(file: InstalledFile): string {
  return `${file.entry} => ${file.destination}`;
}

export function formatConfig(file: string, data: ConfigData): string {
  return `@${file}\n${JSON.stringify(data, null, 2)}`;
}

export function formatInstalled(installed: InstalledToolchains[]): string {
  let content = "";
  for (const { home, names } of installed) {
    content += `${home.path}:\n`;
    for (const name of [...names].sort()) {
      content += `  ${name} => ${path.join(home.path, name)}\n`;
    }
  }
  return content.trimEnd();
}

export function formatRemoteListing(listings: RemoteBranchListing[]): string {
  let content = "";
  for (const { branch, urls } of listings) {
    content += `${branch.name}:\n`;
    if (urls.length === 0) {
      content += "  (no archives for this platform)\n";
    }
    for (const url of urls) {
      content += `  ${url.version} => ${url.url}\n`;
    }
  }
  return content.trimEnd();
}

/** Message for a proxy invocation whose selected toolchain isn't installed. */
export function formatMissingToolchain(source: ToolchainSource, error: NotFoundError): string {
  const origin = source === "env" ? "the `PAWNUP_TOOLCHAIN` environment variable" : "the pawnup configuration file";

  switch (error.reason) {
    case "latest":
      return `${origin} specifies that a toolchain of the latest version compatible with "${error.version}" should be used, but that toolchain is not installed`;
    case "aliased":
      return `${origin} specifies that a toolchain of version "${error.version}" (as specified by alias "${error.alias}") should be used, but that toolchain is not installed`;
    case "no-alias-default":
      return `${origin} selects alias "${error.version}", which has no version set`;
  }
}
