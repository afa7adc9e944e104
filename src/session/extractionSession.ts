import type { GatewayResult, ModelGateway } from "../gateway/types";
import { GatewayError } from "../gateway/types";
import { describeError } from "../observability";
import type { Logger, MetricsRegistry } from "../observability";
import type { AcceptedRecord, ExtractedRecord, FailedExtraction, FailureKind, TableFragment, TableOutcome } from "../types";
import { validateRecord } from "../validate";
import type { ValidatorOptions } from "../validate";
import { appendAuditFailure, seedConversation } from "./conversation";
import type { ConversationHistory } from "./conversation";

export const MAX_RETRIES = 3;
export const DEFAULT_FRAGMENT_CHAR_LIMIT = 15_000;

export const EXHAUSTED_ERROR = "Validation failed after max retries";

export interface ExtractionSessionOptions {
  /** Attempts per table, first draft included. */
  maxAttempts?: number;
  fragmentCharLimit?: number;
  validator?: ValidatorOptions;
}

export interface ExtractionSessionDeps {
  gateway: ModelGateway;
  logger: Logger;
  metrics: MetricsRegistry;
  options?: ExtractionSessionOptions;
}

interface AttemptState {
  attempt: number;
  lastAttempt: ExtractedRecord | null;
  lastReason?: string;
  truncated: boolean;
}

/**
 * Draft, audit and correct loop for one table at a time. Validation failures
 * are fed back to the model until the attempt ceiling; a gateway failure ends
 * the table at once.
 */
export class ExtractionSession {
  private readonly gateway: ModelGateway;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly maxAttempts: number;
  private readonly fragmentCharLimit: number;
  private readonly validatorOptions: ValidatorOptions;

  constructor(deps: ExtractionSessionDeps) {
    this.gateway = deps.gateway;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.maxAttempts = Math.max(1, deps.options?.maxAttempts ?? MAX_RETRIES);
    this.fragmentCharLimit = deps.options?.fragmentCharLimit ?? DEFAULT_FRAGMENT_CHAR_LIMIT;
    this.validatorOptions = deps.options?.validator ?? {};
  }

  async run(fragment: TableFragment): Promise<TableOutcome> {
    const logger = this.logger.child("session", { filename: fragment.documentName, tableIndex: fragment.index });
    const stopTableTimer = this.metrics.startTimer("table_ms");
    const seeded = seedConversation(fragment, this.fragmentCharLimit);
    if (seeded.truncated) {
      logger.warn("table_input_truncated", { htmlLength: fragment.html.length, fragmentCharLimit: this.fragmentCharLimit });
    }

    let history: ConversationHistory = seeded.history;
    const state: AttemptState = { attempt: 0, lastAttempt: null, truncated: seeded.truncated };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      state.attempt = attempt;
      logger.info("table_attempt_start", { attempt, historyTurns: history.length });
      this.metrics.incrementCounter("attempts_total", 1);

      const result = await this.callGateway(history);
      if (!result.ok) {
        const durationMs = stopTableTimer();
        this.metrics.incrementCounter("gateway_failures", 1);
        logger.error("table_gateway_failed", { attempt, kind: result.error.kind, error: result.error.message, durationMs });
        return this.fail("gateway_failure", `Model gateway failure (${result.error.kind}): ${result.error.message}`, state);
      }

      const record = result.payload;
      state.lastAttempt = record;
      const outcome = validateRecord(record, this.validatorOptions);
      if (outcome.valid) {
        const durationMs = stopTableTimer();
        this.metrics.incrementCounter("tables_passed", 1);
        logger.info("table_accepted", { attempt, durationMs });
        const accepted: AcceptedRecord = { ...record, validation_status: "passed", attempts_needed: attempt };
        if (state.truncated) {
          accepted.input_truncated = true;
        }
        return accepted;
      }

      state.lastReason = outcome.reason;
      this.metrics.incrementCounter("validation_failures", 1);
      logger.warn("table_validation_failed", { attempt, kind: outcome.kind, reason: outcome.reason });

      if (attempt < this.maxAttempts) {
        history = appendAuditFailure(history, record, outcome.reason);
      }
    }

    const durationMs = stopTableTimer();
    this.metrics.incrementCounter("tables_exhausted", 1);
    logger.warn("table_exhausted", { attempts: state.attempt, durationMs });
    return this.fail("validation_exhausted", EXHAUSTED_ERROR, state);
  }

  private async callGateway(history: ConversationHistory): Promise<GatewayResult> {
    const stopTimer = this.metrics.startTimer("gateway_call_ms");
    try {
      return await this.gateway.complete(history);
    } catch (error) {
      return { ok: false, error: error instanceof GatewayError ? error : new GatewayError("transport", describeError(error)) };
    } finally {
      stopTimer();
    }
  }

  private fail(kind: FailureKind, error: string, state: AttemptState): FailedExtraction {
    const failed: FailedExtraction = {
      error,
      error_kind: kind,
      attempts_made: state.attempt,
      last_attempt: state.lastAttempt,
    };
    if (state.lastReason !== undefined) {
      failed.last_validation_error = state.lastReason;
    }
    if (state.truncated) {
      failed.input_truncated = true;
    }
    return failed;
  }
}
