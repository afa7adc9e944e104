import { InputPathNotFoundError } from "../batch";
import { loadConfig } from "../config";
import type { AppConfig } from "../config";
import { runExtract } from "../core/commands";
import { closeGatewayDispatcher, createGateway } from "../gateway";
import type { ModelGateway } from "../gateway";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createSink } from "../sink";

export interface ParsedCliArgs {
  inputPath: string;
  configPath?: string;
  outputDir?: string;
  ignoreHttpsErrors: boolean;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  gatewayFactory?: (config: AppConfig) => ModelGateway;
}

const HELP_TEXT = `
Usage:
  filing-table-extractor <file_or_folder> [options]

Extracts the financial tables of each filing into validated JSON records.
A folder is scanned for files with the configured extension (default .txt).

Options:
  --config <path>        Optional path to JSON config file
  --output-dir <dir>     Directory for the output document (default: output)
  --ignore-https-errors  Ignore TLS certificate errors on model gateway calls
  -h, --help             Show this help

Example:
  filing-table-extractor my_filing.txt
`;

const VALUE_FLAGS = new Set(["--config", "--output-dir"]);

function flagValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index >= 0 && argv[index + 1]) {
    return argv[index + 1];
  }
  return undefined;
}

function findPositional(argv: string[]): string | undefined {
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      i += 1;
      continue;
    }
    if (!arg.startsWith("-")) {
      return arg;
    }
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" | "usage" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const inputPath = findPositional(argv);
  if (!inputPath) {
    return "usage";
  }

  return {
    inputPath,
    configPath: flagValue(argv, "--config"),
    outputDir: flagValue(argv, "--output-dir"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  if (parsed === "usage") {
    console.error(HELP_TEXT.trim());
    return 1;
  }

  const env = deps.env ?? process.env;
  let config = loadConfig(parsed.configPath, env);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  if (parsed.outputDir !== undefined) {
    config = {
      ...config,
      outputDir: parsed.outputDir,
    };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(env.LOG_LEVEL) });
  if (!deps.gatewayFactory && !config.apiKey) {
    logger.error("gateway_api_key_missing", { gatewayBaseUrl: config.gatewayBaseUrl });
    return 1;
  }
  const gateway = (deps.gatewayFactory ?? createGateway)(config);

  logger.info("command_start", {
    inputPath: parsed.inputPath,
    outputDir: config.outputDir,
    model: config.model,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    const result = await runExtract(
      {
        runId,
        config,
        logger: logger.child("extract"),
        metrics,
        gateway,
        createSink: (outputPath) => createSink(runId, outputPath, env),
      },
      parsed.inputPath,
    );
    logger.info("command_complete", { outputPath: result.outputPath });
    return 0;
  } catch (error) {
    if (error instanceof InputPathNotFoundError) {
      logger.error("input_path_not_found", { inputPath: error.inputPath });
      return 1;
    }
    throw error;
  } finally {
    logger.info("metrics_summary", { ...metrics.snapshot() });
    await closeGatewayDispatcher();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
