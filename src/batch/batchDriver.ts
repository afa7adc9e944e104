import fs from "node:fs";
import path from "node:path";
import type { LocateOptions } from "../locate";
import { locateTables } from "../locate";
import { describeError } from "../observability";
import type { Logger, MetricsRegistry } from "../observability";
import type { Sink } from "../sink";
import type { FileRecord, TableFragment, TableOutcome } from "../types";
import { isAcceptedRecord } from "../types";

export interface TableProcessor {
  run(fragment: TableFragment): Promise<TableOutcome>;
}

export interface BatchDeps {
  logger: Logger;
  metrics: MetricsRegistry;
  session: TableProcessor;
  sink: Sink;
  locate?: LocateOptions;
  readFile?: (filePath: string) => Promise<string>;
}

export interface BatchSummary {
  filesProcessed: number;
  filesFailed: number;
  tables: number;
  tablesPassed: number;
  tablesFailed: number;
}

export interface BatchResult {
  summary: BatchSummary;
  records: FileRecord[];
}

function readUtf8(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, "utf-8");
}

/**
 * Files one at a time, tables in document order. A file that fails is logged
 * and left out of the output; the sink is called once, after the last file.
 */
export async function runBatch(files: string[], deps: BatchDeps): Promise<BatchResult> {
  const { logger, metrics, session, sink } = deps;
  const readFile = deps.readFile ?? readUtf8;
  const records: FileRecord[] = [];
  const summary: BatchSummary = { filesProcessed: 0, filesFailed: 0, tables: 0, tablesPassed: 0, tablesFailed: 0 };

  logger.info("batch_start", { fileCount: files.length, sink: sink.describe() });

  for (const filePath of files) {
    const filename = path.basename(filePath);
    logger.info("file_start", { filename, filePath });

    try {
      const content = await readFile(filePath);
      const fragments = locateTables(filename, content, deps.locate);
      metrics.incrementCounter("tables_located", fragments.length);
      logger.info("file_tables_located", { filename, tableCount: fragments.length });

      const record: FileRecord = { filename, extracted_tables: [] };
      for (const fragment of fragments) {
        logger.info("table_start", { filename, tableIndex: fragment.index, tableCount: fragments.length });
        record.extracted_tables.push(await session.run(fragment));
      }

      const passed = record.extracted_tables.filter(isAcceptedRecord).length;
      summary.tables += fragments.length;
      summary.tablesPassed += passed;
      summary.tablesFailed += fragments.length - passed;
      summary.filesProcessed += 1;
      metrics.incrementCounter("files_processed", 1);
      records.push(record);
      logger.info("file_complete", { filename, tableCount: fragments.length, passed });
    } catch (error) {
      summary.filesFailed += 1;
      metrics.incrementCounter("files_failed", 1);
      logger.error("file_failed", { filename, filePath, error: describeError(error) });
    }
  }

  await sink.publishFileRecords(records);
  logger.info("batch_complete", { ...summary, sink: sink.describe() });
  return { summary, records };
}
