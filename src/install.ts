import { openArchive, archiveKindOf } from "~/archive";
import { COMPILER_FILE_NAME, INCLUDE_DIR, SCRIPTING_ROOT } from "~/constants";
import { openDownload } from "~/download";
import { FilesystemError, PawnupError, TransferError } from "~/errors";
import { formatInstalledFile } from "~/formatter";
import type { Archive, InstalledFile } from "~/types";

import { chmodSync, createWriteStream, existsSync, mkdirSync, rmSync } from "fs";
import path from "path";
import { pipeline } from "stream/promises";

export type InstallRequest = {
  url: string;
  maxBytes: number;
  destination: string;
};

/**
 * Collapses `.`, `..` and repeated separators of a relative path. Returns null for an empty result or
 * for any path that climbs above its root.
 */
export function cleanRelativePath(relative: string): string | null {
  const parts: string[] = [];
  for (const part of relative.split(/[\\/]/)) {
    if (part === "" || part === ".") {
      continue;
    }
    if (part === "..") {
      if (parts.length === 0) {
        return null;
      }
      parts.pop();
      continue;
    }
    parts.push(part);
  }
  return parts.length === 0 ? null : parts.join("/");
}

export function isToolchainFile(relative: string): boolean {
  return relative.split("/")[0] === INCLUDE_DIR || relative === COMPILER_FILE_NAME;
}

/**
 * Maps an archive entry name to its place inside a toolchain directory, or null if it doesn't belong there.
 * Only the scripting subtree of a SourceMod package is considered; of that, the include tree and the
 * compiler executable are kept.
 */
export function mapToToolchainPath(rawPath: string): string | null {
  // Names that didn't decode as UTF-8 carry replacement characters.
  if (rawPath.includes("\uFFFD") || !rawPath.startsWith(SCRIPTING_ROOT)) {
    return null;
  }

  const rest = rawPath.slice(SCRIPTING_ROOT.length);
  if (rest.length === 0) {
    return null;
  }

  const cleaned = cleanRelativePath(rest);
  return cleaned !== null && isToolchainFile(cleaned) ? cleaned : null;
}

async function writeEntry(stream: AsyncIterable<Buffer>, target: string, executable: boolean) {
  try {
    mkdirSync(path.dirname(target), { recursive: true });
  } catch (e) {
    throw new FilesystemError("Failed to create directories up to", target, { cause: e });
  }

  try {
    await pipeline(stream, createWriteStream(target, { flags: "w", mode: executable ? 0o777 : 0o666 }));
  } catch (e) {
    if (e instanceof PawnupError) {
      throw e;
    }
    throw new FilesystemError("Failed to write", target, { cause: e });
  }

  if (executable) {
    try {
      chmodSync(target, 0o777);
    } catch (e) {
      throw new FilesystemError("Failed to mark as executable", target, { cause: e });
    }
  }
}

/**
 * Writes the toolchain files of an archive below destination. The first failure aborts the install;
 * files written before it stay where they are. Every path opened for writing, including one whose
 * write failed, is appended to touched.
 */
export async function installArchive(archive: Archive, destination: string, touched: string[] = []): Promise<InstalledFile[]> {
  const installed: InstalledFile[] = [];

  for await (const entry of archive.entries()) {
    const relative = mapToToolchainPath(entry.path);
    if (relative === null || entry.isDirectory) {
      continue;
    }

    const target = path.join(destination, ...relative.split("/"));
    const executable = relative === COMPILER_FILE_NAME && process.platform !== "win32";
    touched.push(target);
    await writeEntry(entry.stream, target, executable);

    const file = { entry: relative, destination: target };
    console.log(formatInstalledFile(file));
    installed.push(file);
  }

  return installed;
}

export async function installVersion(request: InstallRequest): Promise<InstalledFile[]> {
  const kind = archiveKindOf(request.url);

  console.log(`Downloading ${request.url}...`);
  const source = await openDownload(request.url, request.maxBytes);
  const archive = await openArchive(kind, source, request.url);

  const existed = existsSync(request.destination);
  const touched: string[] = [];
  let installed: InstalledFile[];
  try {
    installed = await installArchive(archive, request.destination, touched);
  } catch (e) {
    if (e instanceof TransferError) {
      discardPartialInstall(request.destination, existed, touched);
    }
    throw e;
  }

  console.log(`Installed ${installed.length} files to ${request.destination}`);
  return installed;
}

/** A download cut short leaves nothing behind; local I/O failures are not rolled back. */
function discardPartialInstall(destination: string, existed: boolean, touched: string[]) {
  try {
    if (existed) {
      for (const file of touched) {
        rmSync(file, { force: true });
      }
    } else {
      rmSync(destination, { recursive: true, force: true });
    }
  } catch (e) {
    throw new FilesystemError("Failed to clean up partial install at", destination, { cause: e });
  }
}
