import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { GatewayError } from "../src/gateway/types";
import type { GatewayErrorKind, GatewayResult, ModelGateway } from "../src/gateway/types";
import { Logger, MetricsRegistry } from "../src/observability";
import type { ConversationHistory } from "../src/session/conversation";
import type { ExtractedRecord } from "../src/types";

export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}

export function testLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test" });
}

export function testMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}

export function reply(payload: ExtractedRecord): GatewayResult {
  return { ok: true, payload };
}

export function failure(kind: GatewayErrorKind, message: string): GatewayResult {
  return { ok: false, error: new GatewayError(kind, message) };
}

type ScriptStep = GatewayResult | ((history: ConversationHistory) => GatewayResult);

/** Answers each call with the next scripted step and records every history it was sent. */
export class ScriptedGateway implements ModelGateway {
  readonly calls: ConversationHistory[] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = steps;
  }

  async complete(history: ConversationHistory): Promise<GatewayResult> {
    this.calls.push(history);
    const step = this.steps[this.calls.length - 1];
    if (step === undefined) {
      throw new Error(`No scripted reply for call ${this.calls.length}`);
    }
    return typeof step === "function" ? step(history) : step;
  }
}

/** Replies by looking at the first user turn, for batches with several tables. */
export class RoutingGateway implements ModelGateway {
  readonly calls: ConversationHistory[] = [];
  private readonly route: (prompt: string) => GatewayResult;

  constructor(route: (prompt: string) => GatewayResult) {
    this.route = route;
  }

  async complete(history: ConversationHistory): Promise<GatewayResult> {
    this.calls.push(history);
    return this.route(history[1]?.content ?? "");
  }
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** A statement table with 127 characters of stripped text. */
export function balanceSheetTable(marker = "Statement of Assets and Liabilities"): string {
  return [
    "<table>",
    `<tr><td>${marker}</td></tr>`,
    "<tr><td>Total assets</td><td>1,000,000</td></tr>",
    "<tr><td>Total liabilities</td><td>600,000</td></tr>",
    "<tr><td>Net assets</td><td>400,000</td></tr>",
    "<tr><td>Net asset value per share</td><td>10.00</td></tr>",
    "</table>",
  ].join("\n");
}

export function filingDocument(...tables: string[]): string {
  return ["<DOCUMENT>", "<TYPE>N-CSR", "<html><body>", "<p>Annual report</p>", ...tables, "</body></html>", "</DOCUMENT>"].join("\n");
}
