import { selectBranch, selectRemoteVersion } from "~/branches";
import { fetchBranches, fetchRelevantUrls, listRemote, type RemoteBranchListing } from "~/catalog";
import { ConfigStore } from "~/config";
import { ConfigError, FilesystemError, NotFoundError, ResolutionError } from "~/errors";
import { formatBool, formatConfig, formatInstalled, formatRemoteListing } from "~/formatter";
import { installVersion } from "~/install";
import { toolchainHome } from "~/paths";
import { aliasOf, parseSelector, testSelector } from "~/selector";
import { findLatestToolchainOf, findToolchain, isInstalled, listInstalled, readToolchainNames } from "~/toolchain";
import type { Branch, InstalledToolchains, RelevantUrl } from "~/types";
import { maxByVersion, versionOrd } from "~/version";

import { rmSync } from "fs";
import path from "path";

export type UpdateOptions = {
  selector?: string;
  alias?: string;
  redownload?: boolean;
};

export type InstallOptions = {
  selector: string;
  redownload?: boolean;
};

export type AcquireOutcome = {
  branch: Branch;
  remote: RelevantUrl;
  downloaded: boolean;
  destination: string | null;
};

export type UpdateOutcome = AcquireOutcome & {
  alias: string | null;
};

export type RemovedToolchain = {
  name: string;
  path: string;
  error: string | null;
};

function cacheHomePath(): string {
  const home = toolchainHome("cache");
  if (!home) {
    throw new ConfigError("Couldn't determine the toolchain destination directory", null);
  }
  return home.path;
}

function cachedToolchains(): { home: string; names: string[] } {
  const home = cacheHomePath();
  return { home, names: readToolchainNames(home) ?? [] };
}

async function acquire(url: RelevantUrl, maxBytes: number, needsDownload: boolean): Promise<string | null> {
  console.log(`Needs download: ${formatBool(needsDownload)}`);
  if (!needsDownload) {
    return null;
  }

  const destination = path.join(cacheHomePath(), url.version);
  console.log(`Destination: ${destination}`);
  await installVersion({ url: url.url, maxBytes, destination });
  return destination;
}

export function showConfig(): string {
  const config = ConfigStore.open();
  const content = formatConfig(config.path, config.data);
  console.log(content);
  return content;
}

export function defaultSelector(selector?: string): string {
  const config = ConfigStore.open();
  const previous = config.data.default;

  if (selector === undefined) {
    console.log(previous);
    return previous;
  }

  console.log(`${previous} => ${selector}`);
  if (previous !== selector) {
    config.setDefault(selector);
    config.save();
  }
  return selector;
}

export function alias(name: string, version?: string): string | null {
  if (parseSelector(name).kind !== "alias") {
    throw new ConfigError(`Alias name "${name}" is invalid`, null);
  }

  const config = ConfigStore.open();
  if (version !== undefined) {
    config.setAlias(name, version);
    config.save();
    return version;
  }

  const current = Object.hasOwn(config.data.aliases, name) ? config.data.aliases[name] : null;
  if (current !== null) {
    console.log(`=${current}`);
  }
  return current;
}

export function show(): InstalledToolchains[] {
  const installed = listInstalled();
  console.log(formatInstalled(installed));
  return installed;
}

/**
 * Fetches the newest version of the selected branch when it is newer than what is installed for that
 * branch, then points the alias at it.
 */
export async function update(options: UpdateOptions = {}): Promise<UpdateOutcome> {
  const config = ConfigStore.open();
  const selector = parseSelector(options.selector ?? config.data.default);
  const params = config.data.source;

  const branch = selectBranch(await fetchBranches(params), selector, config.data.aliases);
  console.log(`Remote branch: ${branch.name}`);

  const remote = maxByVersion(await fetchRelevantUrls(params, branch), (url) => url.version);
  if (!remote) {
    throw new ResolutionError(`Received no versions for branch "${branch.name}"`, options.selector ?? config.data.default, aliasOf(selector) ?? undefined);
  }
  console.log(`Remote version: ${remote.version}`);
  console.log(`Remote URL: ${remote.url}`);

  const installed = findLatestToolchainOf(branch.name);
  if (installed) {
    console.log(`Installed version: ${installed.name}`);
  }

  const upgrading = installed === null || versionOrd(installed.name, remote.version) < 0;
  console.log(`Is upgrade: ${formatBool(upgrading)}`);

  const downloaded = options.redownload === true || (upgrading && !isInstalled(remote.version));
  const destination = await acquire(remote, params.maxDownloadSize, downloaded);

  const aliasName = options.alias ?? aliasOf(selector);
  if (aliasName !== null) {
    console.log(`Alias: ${aliasName}`);
    config.setAlias(aliasName, remote.version);
  }
  config.save();

  return { branch, remote, downloaded, destination, alias: aliasName };
}

export async function install(options: InstallOptions): Promise<AcquireOutcome> {
  const config = ConfigStore.open();
  const selector = parseSelector(options.selector);
  const params = config.data.source;

  const branch = selectBranch(await fetchBranches(params), selector, config.data.aliases);
  console.log(`Remote branch: ${branch.name}`);

  const remote = selectRemoteVersion(await fetchRelevantUrls(params, branch), selector, branch);
  console.log(`Remote version: ${remote.version}`);
  console.log(`Remote URL: ${remote.url}`);

  const downloaded = options.redownload === true || !isInstalled(remote.version);
  const destination = await acquire(remote, params.maxDownloadSize, downloaded);

  return { branch, remote, downloaded, destination };
}

function removeToolchain(toolchainPath: string): void {
  try {
    rmSync(toolchainPath, { recursive: true });
  } catch (e) {
    throw new FilesystemError("Failed to recursively delete toolchain at", toolchainPath, { cause: e });
  }
}

/** Deletes every downloaded toolchain the selector matches. A failed deletion is reported and skipped. */
export function remove(selectorText: string): RemovedToolchain[] {
  const config = ConfigStore.open();
  const selector = parseSelector(selectorText);
  const { home, names } = cachedToolchains();
  const removed: RemovedToolchain[] = [];

  for (const name of names) {
    if (!testSelector(selector, config.data.aliases, name)) {
      continue;
    }

    const toolchainPath = path.join(home, name);
    console.log(`${name} => ${toolchainPath}`);
    try {
      removeToolchain(toolchainPath);
      removed.push({ name, path: toolchainPath, error: null });
    } catch (e) {
      if (!(e instanceof FilesystemError)) {
        throw e;
      }
      console.error(e.message);
      removed.push({ name, path: toolchainPath, error: e.message });
    }
  }

  return removed;
}

/**
 * Deletes downloaded toolchains nothing refers to. Versions named by an alias are kept, and so is
 * whatever the default selector currently resolves to.
 */
export function purge(dryRun = false): string[] {
  const config = ConfigStore.open();
  const { home, names } = cachedToolchains();
  const unused = new Set(names);

  try {
    unused.delete(findToolchain(parseSelector(config.data.default), config.data).name);
  } catch (e) {
    if (!(e instanceof NotFoundError)) {
      throw e;
    }
  }
  for (const version of Object.values(config.data.aliases)) {
    unused.delete(version);
  }

  const result = [...unused].sort();
  for (const name of result) {
    const toolchainPath = path.join(home, name);
    console.log(`${name} => ${toolchainPath}`);
    if (!dryRun) {
      removeToolchain(toolchainPath);
    }
  }
  return result;
}

export async function available(): Promise<RemoteBranchListing[]> {
  const config = ConfigStore.open();
  const params = config.data.source;

  const branches = (await fetchBranches(params)).sort((a, b) => versionOrd(a.name, b.name));
  const listings = await listRemote(params, branches);
  console.log(formatRemoteListing(listings));
  return listings;
}
