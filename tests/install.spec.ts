import { openArchive } from "~/archive";
import { COMPILER_FILE_NAME, SCRIPTING_ROOT } from "~/constants";
import { FilesystemError, FormatError, TransferError } from "~/errors";
import { cleanRelativePath, installArchive, installVersion, mapToToolchainPath } from "~/install";
import type { Archive, ArchiveEntry } from "~/types";
import { buildTarGz, buildZip, createSandbox, type Sandbox, streamed, stubFetch } from "./helpers";

import { randomBytes } from "crypto";
import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "fs";
import path from "path";
import { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("cleanRelativePath", () => {
  it("collapses dot segments and repeated separators", () => {
    expect(cleanRelativePath("include//./sdktools/../core.inc")).toBe("include/core.inc");
    expect(cleanRelativePath("include\\core.inc")).toBe("include/core.inc");
  });

  it("rejects empty results and escapes", () => {
    expect(cleanRelativePath("./")).toBeNull();
    expect(cleanRelativePath("../core.inc")).toBeNull();
    expect(cleanRelativePath("include/../../core.inc")).toBeNull();
  });
});

describe("mapToToolchainPath", () => {
  it("keeps includes and the compiler", () => {
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}include/core.inc`)).toBe("include/core.inc");
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}include/sdktools/trace.inc`)).toBe("include/sdktools/trace.inc");
    expect(mapToToolchainPath(SCRIPTING_ROOT + COMPILER_FILE_NAME)).toBe(COMPILER_FILE_NAME);
  });

  it("drops everything else in the scripting directory", () => {
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}admin-flatfile.sp`)).toBeNull();
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}compile.sh`)).toBeNull();
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}${COMPILER_FILE_NAME}.bak`)).toBeNull();
  });

  it("drops paths outside the scripting directory", () => {
    expect(mapToToolchainPath("addons/sourcemod/plugins/basechat.smx")).toBeNull();
    expect(mapToToolchainPath(`include/core.inc`)).toBeNull();
    expect(mapToToolchainPath(`/${SCRIPTING_ROOT}include/core.inc`)).toBeNull();
  });

  it("drops the scripting directory itself", () => {
    expect(mapToToolchainPath(SCRIPTING_ROOT)).toBeNull();
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}.`)).toBeNull();
  });

  it("drops paths that climb out of the toolchain", () => {
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}../../../etc/passwd`)).toBeNull();
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}include/../../x.inc`)).toBeNull();
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}include/../include/core.inc`)).toBe("include/core.inc");
  });

  it("drops names that didn't decode", () => {
    expect(mapToToolchainPath(`${SCRIPTING_ROOT}include/\uFFFD.inc`)).toBeNull();
  });
});

function fileEntry(entryPath: string, content: AsyncIterable<Buffer>): ArchiveEntry {
  return { path: entryPath, stream: content, isDirectory: false };
}

function archiveOf(entries: ArchiveEntry[]): Archive {
  return {
    kind: "zip",
    async *entries() {
      yield* entries;
    }
  };
}

describe("installArchive", () => {
  let sandbox: Sandbox;
  let destination: string;

  beforeEach(() => {
    sandbox = createSandbox();
    destination = path.join(sandbox.homePath("cache"), "1.12.0.7192");
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    sandbox.cleanup();
  });

  it("writes only the toolchain files", async () => {
    const zip = await buildZip({
      [`${SCRIPTING_ROOT}include/core.inc`]: "core",
      [`${SCRIPTING_ROOT}include/sdktools/trace.inc`]: "trace",
      [SCRIPTING_ROOT + COMPILER_FILE_NAME]: "compiler",
      [`${SCRIPTING_ROOT}admin-flatfile.sp`]: "plugin source",
      [`${SCRIPTING_ROOT}../../../evil.inc`]: "evil",
      "addons/sourcemod/plugins/basechat.smx": "plugin"
    });
    const archive = await openArchive("zip", Readable.from([zip]), "test.zip");

    const installed = await installArchive(archive, destination);

    expect(installed.map((file) => file.entry).sort()).toEqual([COMPILER_FILE_NAME, "include/core.inc", "include/sdktools/trace.inc"].sort());
    expect(readFileSync(path.join(destination, "include", "sdktools", "trace.inc"), "utf-8")).toBe("trace");
    expect(readdirSync(destination).sort()).toEqual([COMPILER_FILE_NAME, "include"].sort());
    expect(existsSync(path.join(sandbox.homePath("cache"), "evil.inc"))).toBe(false);
    expect(existsSync(path.join(sandbox.root, "evil.inc"))).toBe(false);
  });

  it("logs each installed file", async () => {
    const archive = archiveOf([fileEntry(`${SCRIPTING_ROOT}include/core.inc`, Readable.from([Buffer.from("core")]))]);
    await installArchive(archive, destination);
    expect(console.log).toHaveBeenCalledWith(`include/core.inc => ${path.join(destination, "include", "core.inc")}`);
  });

  it("marks the compiler as executable", async () => {
    const tarball = await buildTarGz({ [SCRIPTING_ROOT + COMPILER_FILE_NAME]: "compiler" });
    const archive = await openArchive("tar.gz", Readable.from([tarball]), "test.tar.gz");

    await installArchive(archive, destination);

    expect(statSync(path.join(destination, COMPILER_FILE_NAME)).mode & 0o777).toBe(process.platform === "win32" ? 0o666 : 0o777);
  });

  it("overwrites files left by an earlier install", async () => {
    mkdirSync(path.join(destination, "include"), { recursive: true });
    writeFileSync(path.join(destination, "include", "core.inc"), "old contents that are longer");

    await installArchive(archiveOf([fileEntry(`${SCRIPTING_ROOT}include/core.inc`, Readable.from([Buffer.from("new")]))]), destination);

    expect(readFileSync(path.join(destination, "include", "core.inc"), "utf-8")).toBe("new");
  });

  it("keeps files written before a failing entry", async () => {
    async function* broken(): AsyncGenerator<Buffer> {
      yield Buffer.from("partial");
      throw new FormatError("Malformed tar.gz archive", "test.tar.gz");
    }
    const archive = archiveOf([
      fileEntry(`${SCRIPTING_ROOT}include/core.inc`, Readable.from([Buffer.from("core")])),
      fileEntry(`${SCRIPTING_ROOT}include/broken.inc`, broken())
    ]);

    await expect(installArchive(archive, destination)).rejects.toThrow(FormatError);
    expect(readFileSync(path.join(destination, "include", "core.inc"), "utf-8")).toBe("core");
  });

  it("reports directories that can't be created", async () => {
    mkdirSync(destination, { recursive: true });
    writeFileSync(path.join(destination, "include"), "in the way");

    const archive = archiveOf([fileEntry(`${SCRIPTING_ROOT}include/core.inc`, Readable.from([Buffer.from("core")]))]);
    const error = await installArchive(archive, destination).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FilesystemError);
    expect(error).toMatchObject({ path: path.join(destination, "include", "core.inc") });
  });
});

describe("installVersion", () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    sandbox.cleanup();
  });

  it("downloads and installs a tar.gz archive", async () => {
    const url = "https://mirror.test/smdrop/1.12/sourcemod-1.12.0-git7192-linux.tar.gz";
    stubFetch({ [url]: await buildTarGz({ [`${SCRIPTING_ROOT}include/core.inc`]: "core" }) });
    const destination = path.join(sandbox.root, "toolchain");

    const installed = await installVersion({ url, maxBytes: 1_000_000, destination });

    expect(installed).toEqual([{ entry: "include/core.inc", destination: path.join(destination, "include", "core.inc") }]);
    expect(console.log).toHaveBeenCalledWith(`Installed 1 files to ${destination}`);
  });

  describe("when a body without a length passes the size limit", () => {
    const url = "https://mirror.test/smdrop/1.12/sourcemod-1.12.0-git7192-linux.tar.gz";
    let tarball: Buffer;

    beforeEach(async () => {
      tarball = await buildTarGz({
        [`${SCRIPTING_ROOT}include/a.inc`]: "core",
        [`${SCRIPTING_ROOT}include/z.inc`]: randomBytes(200_000)
      });
      stubFetch({ [url]: streamed(tarball, 4096) });
    });

    it("removes a new destination entirely", async () => {
      const destination = path.join(sandbox.root, "toolchain");

      await expect(installVersion({ url, maxBytes: 50_000, destination })).rejects.toThrow(TransferError);
      expect(existsSync(destination)).toBe(false);
    });

    it("removes only the files it wrote into an existing destination", async () => {
      const destination = path.join(sandbox.root, "toolchain");
      mkdirSync(path.join(destination, "include"), { recursive: true });
      writeFileSync(path.join(destination, "include", "keep.inc"), "kept");

      await expect(installVersion({ url, maxBytes: 50_000, destination })).rejects.toThrow(TransferError);
      expect(readdirSync(path.join(destination, "include"))).toEqual(["keep.inc"]);
    });

    it("installs everything when the limit allows it", async () => {
      const destination = path.join(sandbox.root, "toolchain");

      const installed = await installVersion({ url, maxBytes: tarball.byteLength, destination });
      expect(installed.map((file) => file.entry)).toEqual(["include/a.inc", "include/z.inc"]);
    });
  });

  it("refuses unsupported formats before fetching", async () => {
    const fetchMock = stubFetch({});
    await expect(installVersion({ url: "https://mirror.test/sourcemod-linux.rar", maxBytes: 1, destination: sandbox.root })).rejects.toThrow(FormatError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
