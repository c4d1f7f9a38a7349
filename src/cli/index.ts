import { AppConfig, loadConfig, toPositiveInt } from "../config";
import { CommandContext, runArchive, runPipeline, runSearch } from "../core/commands";
import { errorMessage } from "../core/errors";
import { createRunId, LineWriter, Logger, MetricsRegistry } from "../observability";

export type CommandName = "search" | "run" | "archive";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  query?: string;
  limit?: number;
  archiveEnabled?: boolean;
  outputDir?: string;
  linkHost?: string;
  ignoreHttpsErrors: boolean;
  url?: string;
}

const HELP_TEXT = `
Usage:
  paper-link-archiver <command> [options]

Commands:
  search           Search arXiv and list result ids
  run              Search, download PDFs, extract links and optionally archive them
  archive <url>    Archive a single URL in the Wayback Machine

Options:
  --config <path>      Optional path to JSON config file
  --query <text>       Search query (default "quantum")
  --limit <n>          Maximum number of search results
  --archive            Submit discovered links to the Wayback Machine
  --no-archive         Only report discovered links
  --output-dir <path>  Directory for downloaded PDFs
  --host <host>        Link host to match (default github.com)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help           Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "search" || raw === "run" || raw === "archive") {
    return raw;
  }

  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const url = command === "archive" ? argv[1] : undefined;
  if (command === "archive" && (!url || url.startsWith("--"))) {
    return "help";
  }

  const limitRaw = optionValue(argv, "--limit");
  const limitParsed = toPositiveInt(limitRaw, 0);
  let archiveEnabled: boolean | undefined;
  if (argv.includes("--archive")) {
    archiveEnabled = true;
  }
  if (argv.includes("--no-archive")) {
    archiveEnabled = false;
  }

  return {
    command,
    configPath: optionValue(argv, "--config"),
    query: optionValue(argv, "--query"),
    limit: limitParsed > 0 ? limitParsed : undefined,
    archiveEnabled,
    outputDir: optionValue(argv, "--output-dir"),
    linkHost: optionValue(argv, "--host"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    url,
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    query: parsed.query ?? config.query,
    limit: parsed.limit ?? config.limit,
    archiveEnabled: parsed.archiveEnabled ?? config.archiveEnabled,
    outputDir: parsed.outputDir ?? config.outputDir,
    linkHost: parsed.linkHost ?? config.linkHost,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  };
}

export type CliDeps = Pick<CommandContext, "fetchFn" | "pageReader" | "download"> & {
  env?: NodeJS.ProcessEnv;
  writeLine?: LineWriter;
};

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const { env, writeLine, ...injected } = deps;
  const config = applyCliOverrides(loadConfig(parsed.configPath, env), parsed);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId: createRunId() }, writeLine);
  const context = { ...injected, config, metrics };

  logger.info("command_start", {
    command: parsed.command,
    query: config.query,
    limit: config.limit,
    archiveEnabled: config.archiveEnabled,
    outputDir: config.outputDir,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "search":
        await runSearch({ ...context, logger: logger.child("search") });
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") });
        break;
      case "archive":
        await runArchive({ ...context, logger: logger.child("archive") }, parsed.url ?? "");
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return 1;
  } finally {
    metrics.printSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
