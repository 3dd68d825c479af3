import { COMMON_FETCH_OPTS } from "~/constants";
import { TransferError } from "~/errors";

import { Readable } from "stream";

type ResponseBody = NonNullable<Response["body"]>;

function tooLarge(url: string, maxBytes: number): TransferError {
  return new TransferError(`Download exceeds the maximum size of ${maxBytes} bytes`, url);
}

async function* readBounded(body: ResponseBody, url: string, maxBytes: number, controller: AbortController): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  let received = 0;
  let completed = false;

  try {
    while (true) {
      const chunk = await reader.read().catch((e: unknown) => {
        throw new TransferError("Download interrupted", url, { cause: e });
      });

      if (chunk.done) {
        completed = true;
        return;
      }

      received += chunk.value.byteLength;
      if (received > maxBytes) {
        throw tooLarge(url, maxBytes);
      }

      yield Buffer.from(chunk.value.buffer, chunk.value.byteOffset, chunk.value.byteLength);
    }
  } finally {
    if (!completed) {
      controller.abort();
    }
  }
}

/**
 * Starts a GET for url and returns its body as a byte stream that errors with a {@link TransferError}
 * before more than maxBytes have been handed on. A Content-Length above the limit fails up front.
 */
export async function openDownload(url: string, maxBytes: number): Promise<Readable> {
  const controller = new AbortController();

  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      ...COMMON_FETCH_OPTS,
      signal: controller.signal
    });
  } catch (e) {
    throw new TransferError("Couldn't fetch archive", url, { cause: e });
  }

  if (!response.ok) {
    controller.abort();
    throw new TransferError(`Archive request failed with status ${response.status}`, url);
  }

  const declared = Number(response.headers.get("content-length") ?? Number.NaN);
  if (Number.isFinite(declared) && declared > maxBytes) {
    controller.abort();
    throw tooLarge(url, maxBytes);
  }

  if (!response.body) {
    return Readable.from([], { objectMode: false });
  }

  return Readable.from(readBounded(response.body, url, maxBytes, controller), { objectMode: false });
}
