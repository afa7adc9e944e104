import type { BatchSummary } from "../batch";
import { planInputs, runBatch } from "../batch";
import type { AppConfig } from "../config";
import type { ModelGateway } from "../gateway";
import type { Logger, MetricsRegistry } from "../observability";
import { ExtractionSession } from "../session";
import type { Sink } from "../sink";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  gateway: ModelGateway;
  createSink: (outputPath: string) => Sink;
}

export interface ExtractCommandResult {
  outputPath: string;
  summary: BatchSummary;
}

export async function runExtract(ctx: CommandContext, inputPath: string): Promise<ExtractCommandResult> {
  const { config, logger } = ctx;
  const plan = await planInputs(inputPath, config.inputExtension, config.outputDir);
  logger.info("extract_start", {
    inputPath,
    isDirectory: plan.isDirectory,
    fileCount: plan.files.length,
    outputPath: plan.outputPath,
    model: config.model,
    maxAttempts: config.maxAttempts,
  });

  const sink = ctx.createSink(plan.outputPath);
  sink.assertReady();
  const session = new ExtractionSession({
    gateway: ctx.gateway,
    logger,
    metrics: ctx.metrics,
    options: {
      maxAttempts: config.maxAttempts,
      fragmentCharLimit: config.fragmentCharLimit,
      validator: { requireFinancialFields: config.requireFinancialFields },
    },
  });

  const { summary } = await runBatch(plan.files, {
    logger: logger.child("batch"),
    metrics: ctx.metrics,
    session,
    sink,
    locate: { minTableTextLength: config.minTableTextLength },
  });

  logger.info("extract_complete", { ...summary, outputPath: plan.outputPath });
  return { outputPath: plan.outputPath, summary };
}
