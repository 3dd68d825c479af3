import { alias, available, defaultSelector, install, purge, remove, show, showConfig, update } from "~/commands";
import { PRODUCT_NAME, PRODUCT_VERSION } from "~/constants";
import { describeCause } from "~/errors";

import { Command } from "commander";

export function createProgram(): Command {
  const program = new Command();

  program.name(PRODUCT_NAME).description("Install and switch between SourcePawn compiler toolchains").version(PRODUCT_VERSION);

  program
    .command("config")
    .description("Show current configuration data")
    .action(() => {
      showConfig();
    });

  program
    .command("default")
    .description("Get or set the default toolchain selector")
    .argument("[selector]", "new default selector")
    .action((selector?: string) => {
      defaultSelector(selector);
    });

  program
    .command("alias")
    .description("Get or set an alias")
    .argument("<alias>", "alias name")
    .argument("[version]", "version the alias should point at")
    .action((name: string, version?: string) => {
      alias(name, version);
    });

  program
    .command("show")
    .description("Show a list of installed toolchains")
    .action(() => {
      show();
    });

  program
    .command("update")
    .description("Fetch the newest toolchain of a branch, download it if needed, and alias it")
    .argument("[selector]", "toolchain selector; defaults to the configured default")
    .argument("[alias]", "alias to point at the installed version; defaults to the selector's alias")
    .option("--redownload", "download the toolchain even if it is already installed", false)
    .action(async (selector: string | undefined, aliasName: string | undefined, options: { redownload: boolean }) => {
      await update({ selector, alias: aliasName, redownload: options.redownload });
    });

  program
    .command("install")
    .description("Install a specific toolchain")
    .argument("<selector>", "toolchain selector")
    .option("--redownload", "download the toolchain even if it is already installed", false)
    .action(async (selector: string, options: { redownload: boolean }) => {
      await install({ selector, redownload: options.redownload });
    });

  program
    .command("remove")
    .description("Delete downloaded toolchains matching a selector")
    .argument("<selector>", "toolchain selector")
    .action((selector: string) => {
      remove(selector);
    });

  program
    .command("purge")
    .description("Delete downloaded toolchains that no alias or default refers to")
    .option("--dry-run", "only print the toolchains that would be deleted", false)
    .action((options: { dryRun: boolean }) => {
      purge(options.dryRun);
    });

  program
    .command("available")
    .description("List toolchain versions available on the remote server")
    .action(async () => {
      await available();
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await createProgram().parseAsync(argv);
    return 0;
  } catch (e) {
    console.error(`Fatal error: ${describeCause(e)}`);
    return 1;
  }
}
