import { BrowserLauncher } from "../browser";
import { AppConfig, loadConfig } from "../config";
import { runHarvest } from "../core/commands";
import { errorMessage } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink, RecordSink } from "../sink";
import { createStore, RunStore } from "../store";

export interface ParsedCliArgs {
  configPath?: string;
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  launcher?: BrowserLauncher;
  createStore?: (config: AppConfig) => RunStore;
  createSink?: (config: AppConfig, runId: string) => RecordSink;
}

const HELP_TEXT = `
Usage:
  judgment-harvester [options]

Logs into the portal, walks the judgments listing and stores one record per judgment.
Settings come from the environment (and .env); see .env.example.

Options:
  --config <path>  Optional JSON file with settings (environment values win)
  -h, --help       Show this help
`;

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0) {
    const configPath = argv[configIndex + 1];
    return configPath && !configPath.startsWith("-") ? { configPath } : "help";
  }

  return argv.length === 0 ? {} : "help";
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId();
  let config: AppConfig;
  try {
    config = loadConfig(parsed.configPath, deps.env ?? process.env);
  } catch (error) {
    new Logger({ component: "cli", runId }).error("config_invalid", { error: errorMessage(error) });
    return 1;
  }

  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  let sink: RecordSink;
  try {
    sink = (deps.createSink ?? createSink)(config, runId);
  } catch (error) {
    logger.error("config_invalid", { error: errorMessage(error) });
    return 1;
  }

  const store = (deps.createStore ?? createStore)(config);
  const metrics = new MetricsRegistry();
  logger.info("command_start", { headless: config.headless, logLevel: config.logLevel });

  try {
    await runHarvest({ runId, config, store, sink, logger, metrics }, deps.launcher);
    logger.info("command_complete");
    return 0;
  } catch (error) {
    logger.error("harvest_failed", {
      errorType: error instanceof Error ? error.name : typeof error,
      error: errorMessage(error),
      cause: error instanceof Error && error.cause !== undefined ? errorMessage(error.cause) : undefined,
    });
    return 1;
  } finally {
    const stats = await store.getRunStats(runId);
    const failedRows = await store.listFailedRows(runId);
    logger.info("run_stats", { ...stats, failedUrls: failedRows.map((row) => row.pdfUrl) });
    await store.close();
    metrics.printSummary(runId);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
