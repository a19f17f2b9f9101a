import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { FORMAT_NAMES } from "../shared/schema.js";
import { applyEnvironment, loadOrCreateConfig, requireApiKey, resolveConfigPath } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { FORMATS, parseFormatName } from "./formatter.js";
import { runPipeline } from "./pipeline.js";
import { alwaysResize, createInteractivePrompter, neverResize, type Prompter } from "./prompt.js";
import { HamsterProvider } from "./providers/hamster-provider.js";
import type { HostingProvider } from "./providers/hosting-provider.js";
import { createSinks, selectSinks, type Clipboard } from "./sinks.js";
import { Logger } from "./utils/logger.js";
import { widthSchema } from "./utils/validation.js";

type CliOptions = {
  clip?: boolean;
  txt?: boolean;
  print?: boolean;
  format: string;
  single?: boolean;
  width?: number;
  yes?: boolean;
  config?: string;
  verbose?: boolean;
};

export interface RunDeps {
  createProvider?: (options: { apiKey: string; endpoint: string; uniqueTail: boolean }) => HostingProvider;
  prompter?: Prompter;
  clipboard?: Clipboard;
  stdout?: NodeJS.WritableStream;
  interactive?: boolean;
}

function parseWidth(value: string): number {
  const parsed = widthSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues[0]?.message ?? "Invalid width");
  }
  return parsed.data;
}

export function createProgram(): Command {
  return new Command()
    .name("hamlink")
    .description("Upload images to hamster.is and print the links")
    .argument("<source...>", "file, folder (recursive) or URL")
    .option("-c, --clip", "copy the links to the clipboard")
    .option("-t, --txt", "save the links to a text file")
    .option("-p, --print", "print the links even when --clip or --txt is given")
    .addOption(new Option("-f, --format <name>", "link format").choices(FORMAT_NAMES).default("plain"))
    .option("-s, --single", "put all links on a single line")
    .option("-w, --width <px>", "resize oversized images to this width", parseWidth)
    .option("-y, --yes", "resize oversized images without asking")
    .option("--config <path>", "use another config file")
    .option("--verbose", "log debug output")
    .exitOverride();
}

/** Runs the CLI and resolves to the process exit code. */
export async function run(argv: readonly string[], deps: RunDeps = {}): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const sources = program.args;
  Logger.setVerbose(options.verbose === true);

  const configPath = resolveConfigPath(options.config);

  try {
    const config = applyEnvironment(await loadOrCreateConfig(configPath));
    const apiKey = requireApiKey(config, configPath);

    const providerOptions = { apiKey, endpoint: config.endpoint, uniqueTail: config.uniqueTail };
    const provider = deps.createProvider?.(providerOptions) ?? new HamsterProvider(providerOptions);

    const interactive = deps.interactive ?? process.stdin.isTTY === true;
    const prompter =
      deps.prompter ?? (options.yes ? alwaysResize : interactive ? createInteractivePrompter() : neverResize);

    const sinks = createSinks(selectSinks(options), {
      txtDir: config.txtDir,
      clipboard: deps.clipboard,
      stdout: deps.stdout,
    });

    const report = await runPipeline(
      sources,
      {
        format: FORMATS[parseFormatName(options.format)],
        single: options.single === true,
        width: options.width,
        maxUploadBytes: config.maxUploadBytes,
      },
      { provider, prompter, sinks },
    );

    if (report.enumerated === 0) {
      Logger.error("No compatible arguments.");
      return 1;
    }

    return report.aborted ? 1 : 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      Logger.error(error.message);
    } else {
      Logger.error(`Unexpected error: ${errorMessage(error)}`);
      Logger.debug("Stack", error);
    }
    return 1;
  }
}
