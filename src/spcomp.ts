import { ConfigStore, currentToolchain } from "~/config";
import { COMPILER_FILE_NAME } from "~/constants";
import { FilesystemError, NotFoundError, PawnupError } from "~/errors";
import { formatMissingToolchain } from "~/formatter";
import { parseSelector } from "~/selector";
import { findToolchain } from "~/toolchain";

import { spawn } from "child_process";
import path from "path";

/** Path of the compiler the current selector resolves to. */
export function resolveCompiler(): string {
  const data = ConfigStore.open().data;
  const { selector, source } = currentToolchain(data);

  try {
    const toolchain = findToolchain(parseSelector(selector), data);
    return path.join(toolchain.path, COMPILER_FILE_NAME);
  } catch (e) {
    if (e instanceof NotFoundError) {
      throw new PawnupError("not-found", formatMissingToolchain(source, e), { cause: e });
    }
    throw e;
  }
}

export function runCompiler(compiler: string, args: string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(compiler, args, { stdio: "inherit" });
    child.on("error", (e) => reject(new FilesystemError("Failed to run", compiler, { cause: e })));
    child.on("close", (code) => resolve(code ?? 1));
  });
}
