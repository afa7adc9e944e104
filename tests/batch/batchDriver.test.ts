import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runBatch } from "../../src/batch";
import { ExtractionSession } from "../../src/session";
import type { Sink } from "../../src/sink";
import type { FileRecord } from "../../src/types";
import {
  balanceSheetTable,
  failure,
  filingDocument,
  makeTempDir,
  removeDir,
  reply,
  RoutingGateway,
  silenceConsole,
  testLogger,
  testMetrics,
} from "../helpers";

class RecordingSink implements Sink {
  readonly published: FileRecord[][] = [];

  assertReady(): void {
    return;
  }

  async publishFileRecords(records: FileRecord[]): Promise<void> {
    this.published.push(records);
  }

  describe(): string {
    return "recording";
  }
}

const balanced = { table_type: "Balance Sheet", total_assets: "1,000.00", total_liabilities: "600", net_assets: "400" };

describe("runBatch", () => {
  let tempDir: string;

  beforeEach(() => {
    silenceConsole();
    tempDir = makeTempDir("batch");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(tempDir);
  });

  function writeFiling(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  function createSession(gateway: RoutingGateway): ExtractionSession {
    return new ExtractionSession({ gateway, logger: testLogger(), metrics: testMetrics() });
  }

  it("keeps tables in document order within a file", async () => {
    const filePath = writeFiling(
      "fund.txt",
      filingDocument(balanceSheetTable("Statement of Assets and Liabilities"), balanceSheetTable("Statement of Operations for the year")),
    );
    const gateway = new RoutingGateway((prompt) =>
      prompt.includes("Statement of Operations") ? reply({ table_type: "Operations" }) : reply(balanced),
    );
    const sink = new RecordingSink();

    const { records, summary } = await runBatch([filePath], {
      logger: testLogger(),
      metrics: testMetrics(),
      session: createSession(gateway),
      sink,
    });

    expect(records).toEqual([
      {
        filename: "fund.txt",
        extracted_tables: [
          { ...balanced, validation_status: "passed", attempts_needed: 1 },
          { table_type: "Operations", validation_status: "passed", attempts_needed: 1 },
        ],
      },
    ]);
    expect(summary).toEqual({ filesProcessed: 1, filesFailed: 0, tables: 2, tablesPassed: 2, tablesFailed: 0 });
    expect(sink.published).toEqual([records]);
  });

  it("skips an unreadable file and still publishes the others", async () => {
    const first = writeFiling("a.txt", filingDocument(balanceSheetTable()));
    const missing = path.join(tempDir, "gone.txt");
    const last = writeFiling("c.txt", filingDocument(balanceSheetTable()));
    const metrics = testMetrics();
    const sink = new RecordingSink();

    const { records, summary } = await runBatch([first, missing, last], {
      logger: testLogger(),
      metrics,
      session: createSession(new RoutingGateway(() => reply(balanced))),
      sink,
    });

    expect(records.map((record) => record.filename)).toEqual(["a.txt", "c.txt"]);
    expect(summary.filesFailed).toBe(1);
    expect(summary.filesProcessed).toBe(2);
    expect(metrics.getCounter("files_failed")).toBe(1);
    expect(sink.published).toHaveLength(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("records a gateway failure for one table and moves on to the next", async () => {
    const filePath = writeFiling(
      "fund.txt",
      filingDocument(balanceSheetTable("Statement of Assets and Liabilities"), balanceSheetTable("Statement of Operations for the year")),
    );
    const gateway = new RoutingGateway((prompt) =>
      prompt.includes("Statement of Assets") ? failure("http_status", "Model gateway returned 429: slow down") : reply({ table_type: "Operations" }),
    );

    const { records, summary } = await runBatch([filePath], {
      logger: testLogger(),
      metrics: testMetrics(),
      session: createSession(gateway),
      sink: new RecordingSink(),
    });

    expect(records[0].extracted_tables).toEqual([
      {
        error: "Model gateway failure (http_status): Model gateway returned 429: slow down",
        error_kind: "gateway_failure",
        attempts_made: 1,
        last_attempt: null,
      },
      { table_type: "Operations", validation_status: "passed", attempts_needed: 1 },
    ]);
    expect(summary).toEqual({ filesProcessed: 1, filesFailed: 0, tables: 2, tablesPassed: 1, tablesFailed: 1 });
    expect(gateway.calls).toHaveLength(2);
  });

  it("publishes an empty run exactly once", async () => {
    const sink = new RecordingSink();

    const { records } = await runBatch([], {
      logger: testLogger(),
      metrics: testMetrics(),
      session: createSession(new RoutingGateway(() => reply({}))),
      sink,
    });

    expect(records).toEqual([]);
    expect(sink.published).toEqual([[]]);
  });

  it("keeps a file with no significant tables as an empty record", async () => {
    const filePath = writeFiling("cover.txt", filingDocument("<table><tr><td>Page 1</td></tr></table>"));
    const gateway = new RoutingGateway(() => reply({}));

    const { records } = await runBatch([filePath], {
      logger: testLogger(),
      metrics: testMetrics(),
      session: createSession(gateway),
      sink: new RecordingSink(),
    });

    expect(records).toEqual([{ filename: "cover.txt", extracted_tables: [] }]);
    expect(gateway.calls).toHaveLength(0);
  });

  it("uses the injected reader", async () => {
    const readFile = vi.fn(async (_filePath: string) => filingDocument(balanceSheetTable()));

    const { records } = await runBatch(["/virtual/fund.txt"], {
      logger: testLogger(),
      metrics: testMetrics(),
      session: createSession(new RoutingGateway(() => reply(balanced))),
      sink: new RecordingSink(),
      readFile,
    });

    expect(readFile).toHaveBeenCalledWith("/virtual/fund.txt");
    expect(records[0].filename).toBe("fund.txt");
  });
});
