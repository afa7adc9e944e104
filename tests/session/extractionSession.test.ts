import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GatewayError } from "../../src/gateway/types";
import type { MetricsRegistry } from "../../src/observability";
import { buildAuditFeedback, EXHAUSTED_ERROR, ExtractionSession, MAX_RETRIES } from "../../src/session";
import type { ExtractionSessionOptions } from "../../src/session";
import type { ExtractedRecord, TableFragment } from "../../src/types";
import { failure, reply, ScriptedGateway, silenceConsole, testLogger, testMetrics } from "../helpers";

const fragment: TableFragment = {
  documentName: "fund.txt",
  index: 0,
  html: "<table><tr><td>Statement of Assets and Liabilities</td></tr></table>",
};

const balanced: ExtractedRecord = {
  table_type: "Balance Sheet",
  total_assets: "1,000",
  total_liabilities: "600",
  net_assets: "400",
};

const unbalanced: ExtractedRecord = {
  table_type: "Balance Sheet",
  total_assets: "1000",
  total_liabilities: "600",
  net_assets: "300",
};

const MISMATCH_REASON =
  "Math Error: Total Assets (1000.0) does not equal Liabilities (600.0) + Net Assets (300.0). Difference is 100.0.";

function createSession(gateway: ScriptedGateway, metrics: MetricsRegistry = testMetrics(), options?: ExtractionSessionOptions) {
  return new ExtractionSession({ gateway, logger: testLogger(), metrics, options });
}

describe("ExtractionSession", () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses three attempts unless told otherwise", () => {
    expect(MAX_RETRIES).toBe(3);
  });

  it("accepts a valid first draft", async () => {
    const gateway = new ScriptedGateway([reply(balanced)]);

    const result = await createSession(gateway).run(fragment);

    expect(result).toEqual({ ...balanced, validation_status: "passed", attempts_needed: 1 });
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0]).toHaveLength(2);
  });

  it("feeds the rejection back and accepts the corrected draft", async () => {
    const gateway = new ScriptedGateway([reply(unbalanced), reply(balanced)]);

    const result = await createSession(gateway).run(fragment);

    expect(result).toEqual({ ...balanced, validation_status: "passed", attempts_needed: 2 });
    expect(gateway.calls).toHaveLength(2);
    const retryHistory = gateway.calls[1];
    expect(retryHistory).toHaveLength(4);
    expect(retryHistory[2]).toEqual({ role: "assistant", content: JSON.stringify(unbalanced) });
    expect(retryHistory[3]).toEqual({ role: "user", content: buildAuditFeedback(MISMATCH_REASON) });
  });

  it("grows the history by two turns per failed attempt", async () => {
    const gateway = new ScriptedGateway([reply(unbalanced), reply(unbalanced), reply(balanced)]);

    const result = await createSession(gateway).run(fragment);

    expect(result).toMatchObject({ validation_status: "passed", attempts_needed: 3 });
    expect(gateway.calls.map((history) => history.length)).toEqual([2, 4, 6]);
  });

  it("stops after the attempt ceiling and keeps the last draft", async () => {
    const third = { ...unbalanced, note: "third try" };
    const gateway = new ScriptedGateway([reply(unbalanced), reply(unbalanced), reply(third)]);
    const metrics = testMetrics();

    const result = await createSession(gateway, metrics).run(fragment);

    expect(result).toEqual({
      error: EXHAUSTED_ERROR,
      error_kind: "validation_exhausted",
      attempts_made: 3,
      last_attempt: third,
      last_validation_error: MISMATCH_REASON,
    });
    expect(gateway.calls).toHaveLength(3);
    expect(gateway.calls[0]).toHaveLength(2);
    expect(metrics.getCounter("tables_exhausted")).toBe(1);
    expect(metrics.getCounter("validation_failures")).toBe(3);
    expect(metrics.getCounter("attempts_total")).toBe(3);
  });

  it("honours a lower attempt ceiling", async () => {
    const gateway = new ScriptedGateway([reply(unbalanced)]);

    const result = await createSession(gateway, testMetrics(), { maxAttempts: 1 }).run(fragment);

    expect(result).toMatchObject({ error_kind: "validation_exhausted", attempts_made: 1 });
    expect(gateway.calls).toHaveLength(1);
  });

  it("does not retry after a gateway failure on the first attempt", async () => {
    const gateway = new ScriptedGateway([failure("transport", "connection reset"), reply(balanced)]);
    const metrics = testMetrics();

    const result = await createSession(gateway, metrics).run(fragment);

    expect(result).toEqual({
      error: "Model gateway failure (transport): connection reset",
      error_kind: "gateway_failure",
      attempts_made: 1,
      last_attempt: null,
    });
    expect(gateway.calls).toHaveLength(1);
    expect(metrics.getCounter("gateway_failures")).toBe(1);
  });

  it("keeps the rejected draft when the gateway fails on a retry", async () => {
    const gateway = new ScriptedGateway([reply(unbalanced), failure("unparseable", "Model reply is not a JSON object")]);

    const result = await createSession(gateway).run(fragment);

    expect(result).toEqual({
      error: "Model gateway failure (unparseable): Model reply is not a JSON object",
      error_kind: "gateway_failure",
      attempts_made: 2,
      last_attempt: unbalanced,
      last_validation_error: MISMATCH_REASON,
    });
  });

  it("treats a gateway that throws as a transport failure", async () => {
    const gateway = new ScriptedGateway([
      () => {
        throw new Error("socket hang up");
      },
    ]);

    const result = await createSession(gateway).run(fragment);

    expect(result).toMatchObject({
      error: "Model gateway failure (transport): socket hang up",
      error_kind: "gateway_failure",
      attempts_made: 1,
    });
  });

  it("keeps the kind of a thrown GatewayError", async () => {
    const gateway = new ScriptedGateway([
      () => {
        throw new GatewayError("timeout", "Model gateway call exceeded 10ms");
      },
    ]);

    const result = await createSession(gateway).run(fragment);

    expect(result).toMatchObject({ error: "Model gateway failure (timeout): Model gateway call exceeded 10ms" });
  });

  it("flags records built from a truncated table", async () => {
    const gateway = new ScriptedGateway([reply({ table_type: "Other" })]);

    const result = await createSession(gateway, testMetrics(), { fragmentCharLimit: 10 }).run(fragment);

    expect(result).toEqual({ table_type: "Other", validation_status: "passed", attempts_needed: 1, input_truncated: true });
    expect(gateway.calls[0][1].content.endsWith(`HTML:\n${fragment.html.slice(0, 10)}`)).toBe(true);
  });

  it("passes validator options through", async () => {
    const gateway = new ScriptedGateway([reply({ table_type: "Balance Sheet" })]);

    const result = await createSession(gateway, testMetrics(), {
      maxAttempts: 1,
      validator: { requireFinancialFields: true },
    }).run(fragment);

    expect(result).toMatchObject({
      error_kind: "validation_exhausted",
      last_validation_error:
        "Validation Error: Missing required financial field(s): total_assets, total_liabilities, net_assets.",
    });
  });

  it("logs each attempt under the session component with the table it belongs to", async () => {
    const gateway = new ScriptedGateway([reply(balanced)]);
    const session = new ExtractionSession({ gateway, logger: testLogger().child("extract"), metrics: testMetrics() });

    await session.run(fragment);

    const lines = vi.mocked(console.log).mock.calls.map((call): unknown => JSON.parse(String(call[0])));
    expect(lines[0]).toMatchObject({
      msg: "table_attempt_start",
      component: "session",
      filename: "fund.txt",
      tableIndex: 0,
      attempt: 1,
    });
  });

  it("starts every table from a fresh history", async () => {
    const gateway = new ScriptedGateway([reply(unbalanced), reply(balanced), reply(balanced)]);
    const session = createSession(gateway);

    await session.run(fragment);
    await session.run({ ...fragment, index: 1 });

    expect(gateway.calls.map((history) => history.length)).toEqual([2, 4, 2]);
  });
});
