import { CONFIG_HOME_ENV, CUSTOM_TOOLCHAIN_HOME_ENV, PRODUCT_NAME, TOOLCHAIN_HOME_ENV, TOOLCHAINS_DIR } from "~/constants";
import type { HomeKind } from "~/types";

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import JSZip from "jszip";
import { tmpdir } from "os";
import path from "path";
import { buffer } from "stream/consumers";
import { create } from "tar";
import { vi } from "vitest";

export type Sandbox = {
  root: string;
  homePath(kind: HomeKind): string;
  configFile: string;
  cleanup(): void;
};

/** Points every pawnup directory at a fresh temporary tree. */
export function createSandbox(): Sandbox {
  const root = mkdtempSync(path.join(tmpdir(), "pawnup-test-"));
  vi.stubEnv(CONFIG_HOME_ENV, path.join(root, "config"));
  vi.stubEnv(CUSTOM_TOOLCHAIN_HOME_ENV, path.join(root, "custom"));
  vi.stubEnv(TOOLCHAIN_HOME_ENV, path.join(root, "cache"));

  return {
    root,
    homePath: (kind) => path.join(root, kind, PRODUCT_NAME, TOOLCHAINS_DIR),
    configFile: path.join(root, "config", PRODUCT_NAME, "config.json"),
    cleanup: () => {
      vi.unstubAllEnvs();
      rmSync(root, { recursive: true, force: true });
    }
  };
}

export function fakeToolchain(sandbox: Sandbox, kind: HomeKind, name: string): string {
  const dir = path.join(sandbox.homePath(kind), name);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function autoindex(title: string, hrefs: string[]): string {
  const items = hrefs.map((href) => `<li><a href="${href}"> ${href}</a></li>`).join("\n");
  return `<!DOCTYPE HTML PUBLIC "-//W3C//DTD HTML 3.2 Final//EN">
<html>
 <head>
  <title>Index of ${title}</title>
 </head>
 <body>
<h1>Index of ${title}</h1>
<ul>${items}</ul>
<address>Apache Server at mirror.test Port 443</address>
</body></html>
`;
}

export type Route = string | Buffer | (() => Response);

/** Replaces the global fetch with a lookup in routes; unknown URLs get a 404. */
export function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    if (route === undefined) {
      return new Response("not found", { status: 404 });
    }
    if (typeof route === "string") {
      return new Response(route, { headers: { "content-type": "text/html" } });
    }
    if (Buffer.isBuffer(route)) {
      return new Response(route, { headers: { "content-length": String(route.byteLength) } });
    }
    return route();
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** Serves data in fixed-size chunks without a Content-Length header. */
export function streamed(data: Buffer, chunkSize: number): () => Response {
  return () =>
    new Response(
      new ReadableStream<Uint8Array>({
        start(controller) {
          for (let offset = 0; offset < data.byteLength; offset += chunkSize) {
            controller.enqueue(new Uint8Array(data.subarray(offset, offset + chunkSize)));
          }
          controller.close();
        }
      })
    );
}

export async function buildZip(files: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content, { createFolders: !name.split("/").includes("..") });
  }
  return zip.generateAsync({ type: "nodebuffer" });
}

/** Entries are stored in key order, without separate directory entries. */
export async function buildTarGz(files: Record<string, string | Buffer>): Promise<Buffer> {
  const dir = mkdtempSync(path.join(tmpdir(), "pawnup-tar-"));
  try {
    for (const [name, content] of Object.entries(files)) {
      const file = path.join(dir, name);
      mkdirSync(path.dirname(file), { recursive: true });
      writeFileSync(file, content);
    }
    return await buffer(create({ gzip: true, cwd: dir, portable: true }, Object.keys(files)));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
