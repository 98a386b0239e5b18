import fs from "node:fs/promises";
import yargs from "yargs";
import type { MetadataProvider } from "../rename/metadata/provider.js";
import type { RenamePlan } from "../rename/types.js";
import { createConfigIO, resolveRenamerConfig } from "../config/io.js";
import { formatErrorMessage, InvalidArgumentError } from "../rename/errors.js";
import { formatMetadataValue } from "../rename/metadata/format.js";
import { Renamer } from "../rename/renamer.js";
import { parseSchemePattern } from "../rename/scheme.js";
import { VERSION } from "../version.js";

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  provider?: MetadataProvider;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
};

type CommonArgs = {
  config?: string;
  "sub-char"?: string;
};

function planToJson(plan: RenamePlan): string {
  return JSON.stringify(Object.fromEntries(plan), null, 2);
}

async function readPlanFile(planPath: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await fs.readFile(planPath, "utf-8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError(`Plan file must hold a JSON object of old => new names: ${planPath}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Run the command line. Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  const createRenamer = (args: CommonArgs, schemePattern?: string): Renamer => {
    const io = createConfigIO({ env, configPath: args.config });
    const config = resolveRenamerConfig(io.loadConfig());
    return new Renamer({
      scheme: schemePattern ? parseSchemePattern(schemePattern) : config.scheme,
      subChar: args["sub-char"] ?? config.subChar,
      provider: deps.provider,
    });
  };

  const parser = yargs(argv)
    .scriptName("media-renamer")
    .usage("$0 <command> [options]")
    .option("config", {
      type: "string",
      describe: "Config file path (default: ~/.media-renamer/config.json)",
    })
    .option("sub-char", {
      type: "string",
      describe: "Character that replaces characters not allowed in file names",
    })
    .command(
      "plan <files..>",
      "Print the rename plan as JSON without touching any file",
      (y) =>
        y
          .positional("files", { type: "string", array: true, demandOption: true })
          .option("scheme", { type: "string", describe: "Naming scheme, e.g. 'Trip-{date_time}'" }),
      async (args) => {
        const renamer = createRenamer(args, args.scheme);
        const plan = await renamer.generate(args.files);
        stdout(`${planToJson(plan)}\n`);
      },
    )
    .command(
      "rename <files..>",
      "Rename files to the naming scheme",
      (y) =>
        y
          .positional("files", { type: "string", array: true, demandOption: true })
          .option("scheme", { type: "string", describe: "Naming scheme, e.g. 'Trip-{date_time}'" })
          .option("dry-run", { type: "boolean", default: false, describe: "Only print the plan" }),
      async (args) => {
        const renamer = createRenamer(args, args.scheme);
        const plan = await renamer.generate(args.files);
        for (const [oldPath, newName] of plan) {
          stdout(`${oldPath} => ${newName}\n`);
        }
        if (!args["dry-run"]) {
          await renamer.overwrite(plan);
        }
      },
    )
    .command(
      "apply <plan>",
      "Rename files per a plan written by `plan`",
      (y) => y.positional("plan", { type: "string", demandOption: true }),
      async (args) => {
        const renamer = createRenamer(args);
        await renamer.overwrite(await readPlanFile(args.plan));
      },
    )
    .command(
      "metadata <file>",
      "Print the metadata keys available for a file",
      (y) => y.positional("file", { type: "string", demandOption: true }),
      async (args) => {
        const renamer = createRenamer(args);
        const lookup = await renamer.getMetadata(args.file);
        if (!lookup.ok) {
          throw lookup.error;
        }
        const printable: Record<string, string> = {};
        for (const [key, value] of Object.entries(lookup.metadata)) {
          const text = formatMetadataValue(value);
          if (text !== null) {
            printable[key] = text;
          }
        }
        stdout(`${JSON.stringify(printable, null, 2)}\n`);
      },
    )
    .demandCommand(1)
    .strict()
    .version(VERSION)
    .help()
    .exitProcess(false)
    .fail(false);

  try {
    await parser.parseAsync();
    return 0;
  } catch (err) {
    stderr(`${formatErrorMessage(err)}\n`);
    return 1;
  }
}
