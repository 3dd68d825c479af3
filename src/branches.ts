import { ResolutionError } from "~/errors";
import { formatSelector } from "~/selector";
import type { Branch, RelevantUrl, Selector } from "~/types";
import { isSubVersionOf, maxByVersion, versionOrd } from "~/version";

export const LATEST_ALIAS = "latest";
export const STABLE_ALIAS = "stable";

/**
 * Chooses the remote branch a selector refers to.
 * "latest" is the newest branch and "stable" the one right before it, since the newest branch is
 * treated as unreleased. Any other alias goes through the alias table first.
 */
export function selectBranch(branches: Branch[], selector: Selector, aliases: Record<string, string>): Branch {
  const text = formatSelector(selector);

  if (selector.kind === "super") {
    const { version } = selector;
    const branch = branches.find((b) => isSubVersionOf(version, b.name));
    if (!branch) {
      throw new ResolutionError(`Couldn't select branch with selector "${text}"`, text);
    }
    return branch;
  }

  switch (selector.name) {
    case LATEST_ALIAS: {
      const branch = maxByVersion(branches, (b) => b.name);
      if (!branch) {
        throw new ResolutionError("Couldn't select latest branch", text, selector.name);
      }
      return branch;
    }
    case STABLE_ALIAS: {
      const sorted = [...branches].sort((a, b) => versionOrd(a.name, b.name));
      if (sorted.length < 2) {
        throw new ResolutionError("Couldn't select latest stable branch", text, selector.name);
      }
      return sorted[sorted.length - 2];
    }
    default: {
      const version = Object.hasOwn(aliases, selector.name) ? aliases[selector.name] : undefined;
      if (version === undefined) {
        throw new ResolutionError(`Alias "${selector.name}" is not defined`, text, selector.name);
      }
      const branch = branches.find((b) => isSubVersionOf(version, b.name));
      if (!branch) {
        throw new ResolutionError(`Couldn't select branch for version ${version} of alias "${selector.name}"`, text, selector.name);
      }
      return branch;
    }
  }
}

/**
 * Picks the archive to install from a branch. Aliases take the newest one; a super version takes the
 * newest among its own refinements.
 */
export function selectRemoteVersion(urls: RelevantUrl[], selector: Selector, branch: Branch): RelevantUrl {
  const text = formatSelector(selector);

  if (selector.kind === "alias") {
    const newest = maxByVersion(urls, (u) => u.version);
    if (!newest) {
      throw new ResolutionError(`Received no versions for branch "${branch.name}"`, text, selector.name);
    }
    return newest;
  }

  const { version } = selector;
  const newest = maxByVersion(
    urls.filter((u) => isSubVersionOf(u.version, version)),
    (u) => u.version
  );
  if (!newest) {
    throw new ResolutionError(`Couldn't find version "${version}" in branch "${branch.name}"`, text);
  }
  return newest;
}
