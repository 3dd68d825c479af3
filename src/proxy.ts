import { describeCause } from "~/errors";
import { resolveCompiler, runCompiler } from "~/spcomp";

import path from "path";

async function main(): Promise<number> {
  const exe = path.basename(process.argv[1] ?? "pawnup-spcomp");
  try {
    return await runCompiler(resolveCompiler(), process.argv.slice(2));
  } catch (e) {
    console.error(`${exe}: ${describeCause(e)}`);
    return 1;
  }
}

process.exitCode = await main();
