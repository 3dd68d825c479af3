import { FormatError, PawnupError } from "~/errors";
import type { Archive, ArchiveEntry, ArchiveKind } from "~/types";

import JSZip from "jszip";
import { Readable } from "stream";
import { buffer } from "stream/consumers";
import { pipeline } from "stream/promises";
import { Parser, type ReadEntry } from "tar";
import { createGunzip } from "zlib";

const TAR_FILE_TYPES = new Set(["File", "OldFile", "ContiguousFile"]);

/** Archive format is decided by the URL suffix alone, so unsupported URLs fail before anything is fetched. */
export function archiveKindOf(url: string): ArchiveKind {
  const pathname = url.split(/[?#]/, 1)[0];
  if (pathname.endsWith(".zip")) {
    return "zip";
  } else if (pathname.endsWith(".tar.gz")) {
    return "tar.gz";
  }
  throw new FormatError("Unsupported archive format", url);
}

async function* zipEntries(zip: JSZip, origin: string): AsyncGenerator<ArchiveEntry> {
  for (const file of Object.values(zip.files)) {
    const path = file.unsafeOriginalName ?? file.name;

    if (file.dir) {
      yield { path, stream: Readable.from([]), isDirectory: true };
      continue;
    }

    let data: Buffer;
    try {
      data = await file.async("nodebuffer");
    } catch (e) {
      throw new FormatError(`Couldn't read entry ${path}`, origin, { cause: e });
    }

    yield { path, stream: Readable.from([data]), isDirectory: false };
  }
}

/**
 * One forward pass over network bytes, gunzip and tar framing. Entries are handed out one at a time;
 * whatever the consumer leaves unread of an entry is drained before the next one is produced.
 */
async function* tarEntries(source: Readable, origin: string): AsyncGenerator<ArchiveEntry> {
  const parser = new Parser();
  const pending: ReadEntry[] = [];
  const state: { current: ReadEntry | null; finished: boolean; failure: unknown } = {
    current: null,
    finished: false,
    failure: null
  };
  let wake: (() => void) | null = null;

  const notify = () => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  parser.on("entry", (entry: ReadEntry) => {
    pending.push(entry);
    notify();
  });

  const done = pipeline(source, createGunzip(), parser).then(
    () => {
      state.finished = true;
      notify();
    },
    (e: unknown) => {
      state.failure = e;
      state.finished = true;
      state.current?.destroy(e instanceof Error ? e : undefined);
      notify();
    }
  );

  try {
    while (true) {
      if (state.failure !== null) {
        const { failure } = state;
        throw failure instanceof PawnupError ? failure : new FormatError("Malformed tar.gz archive", origin, { cause: failure });
      }

      const entry = pending.shift();
      if (entry) {
        state.current = entry;
        if (entry.type === "Directory" || TAR_FILE_TYPES.has(entry.type)) {
          yield { path: entry.path, stream: entry, isDirectory: entry.type === "Directory" };
        }
        entry.resume();
        state.current = null;
        continue;
      }

      if (state.finished) {
        return;
      }

      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    if (!state.finished) {
      source.destroy();
    }
    await done;
  }
}

/**
 * Wraps a downloaded body as an {@link Archive}. Zip needs random access, so its body is buffered
 * (the download itself is bounded); tar.gz stays a stream.
 */
export async function openArchive(kind: ArchiveKind, source: Readable, origin: string): Promise<Archive> {
  if (kind === "tar.gz") {
    return { kind, entries: () => tarEntries(source, origin) };
  }

  const data = await buffer(source);
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (e) {
    throw new FormatError("Malformed zip archive", origin, { cause: e });
  }

  return { kind, entries: () => zipEntries(zip, origin) };
}
