import { COMMON_FETCH_OPTS, LATEST_SENTINEL, PLATFORM_ID, REMOTE_LIST_CONCURRENCY } from "~/constants";
import { TransferError } from "~/errors";
import { readDirectoryItems } from "~/listing";
import type { Branch, RelevantUrl, RemoteVersion, SourceParams } from "~/types";

import pLimit from "p-limit";

export type RemoteBranchListing = {
  branch: Branch;
  urls: RelevantUrl[];
};

export function rootUrlOf(params: SourceParams): string {
  return params.rootUrl.endsWith("/") ? params.rootUrl : params.rootUrl + "/";
}

export function branchUrl(params: SourceParams, branch: Branch): string {
  return `${rootUrlOf(params)}${encodeURIComponent(branch.name)}/`;
}

async function fetchListing(url: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      ...COMMON_FETCH_OPTS
    });
  } catch (e) {
    throw new TransferError("Couldn't fetch listing", url, { cause: e });
  }

  if (!response.ok) {
    throw new TransferError(`Listing request failed with status ${response.status}`, url);
  }

  try {
    return await response.text();
  } catch (e) {
    throw new TransferError("Couldn't read listing body", url, { cause: e });
  }
}

function decodeBranchName(href: string): string {
  const name = href.slice(0, -1);
  try {
    return decodeURIComponent(name);
  } catch {
    return name;
  }
}

/** Every relative directory on the root listing is a branch; absolute ones (the parent link) are not. */
export function parseBranches(html: string): Branch[] {
  const result: Branch[] = [];
  for (const item of readDirectoryItems(html)) {
    if (item.kind === "directory" && !item.href.startsWith("/")) {
      result.push({ name: decodeBranchName(item.href) });
    }
  }
  return result;
}

export function parseVersions(html: string, root: string): RemoteVersion[] {
  const result: RemoteVersion[] = [];
  for (const item of readDirectoryItems(html)) {
    if (item.kind === "file") {
      result.push(parseArchiveName(root + item.href));
    }
  }
  return result;
}

/**
 * Splits an archive URL named `<product>-<version>-<target>.<ext>`.
 * The target runs from the last dash to the first dot after it, the version from the first dash to the last.
 */
export function parseArchiveName(url: string): RemoteVersion {
  const fileName = url.slice(url.lastIndexOf("/") + 1);

  const lastDash = fileName.lastIndexOf("-");
  if (lastDash === -1) {
    return { url, fileName, target: null, version: null };
  }

  const targetSuffix = fileName.slice(lastDash + 1);
  const dot = targetSuffix.indexOf(".");
  const target = dot === -1 ? targetSuffix : targetSuffix.slice(0, dot);

  const firstDash = fileName.indexOf("-");
  const version = firstDash < lastDash ? fileName.slice(firstDash + 1, lastDash) : null;

  return { url, fileName, target, version };
}

/** Turns a trailing `-git<N>` revision marker into a regular version part: "1.12.0-git7192" becomes "1.12.0.7192". */
export function normalizeVersion(version: string): string {
  return version.replace(/-git(\d+)$/, ".$1");
}

export function toRelevantUrl(remote: RemoteVersion, platform: string = PLATFORM_ID): RelevantUrl | null {
  if (remote.target !== platform || remote.version === null || remote.version === LATEST_SENTINEL) {
    return null;
  }

  return {
    url: remote.url,
    rawVersion: remote.version,
    version: normalizeVersion(remote.version)
  };
}

export async function fetchBranches(params: SourceParams): Promise<Branch[]> {
  return parseBranches(await fetchListing(rootUrlOf(params)));
}

export async function fetchVersions(params: SourceParams, branch: Branch): Promise<RemoteVersion[]> {
  const root = branchUrl(params, branch);
  return parseVersions(await fetchListing(root), root);
}

export async function fetchRelevantUrls(params: SourceParams, branch: Branch, platform: string = PLATFORM_ID): Promise<RelevantUrl[]> {
  const result: RelevantUrl[] = [];
  for (const remote of await fetchVersions(params, branch)) {
    const relevant = toRelevantUrl(remote, platform);
    if (relevant) {
      result.push(relevant);
    }
  }
  return result;
}

/** Read-only overview of several branches; listings are fetched a few at a time. */
export async function listRemote(params: SourceParams, branches: Branch[], platform: string = PLATFORM_ID): Promise<RemoteBranchListing[]> {
  const limit = pLimit(REMOTE_LIST_CONCURRENCY);
  return Promise.all(
    branches.map((branch) =>
      limit(async () => ({
        branch,
        urls: await fetchRelevantUrls(params, branch, platform)
      }))
    )
  );
}
