import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import type { FileRecord } from "../types";
import { BaseSink } from "./baseSink";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  runId?: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  maxMessageBytes?: number;
}

interface BatchEntry {
  Id: string;
  MessageBody: string;
  MessageDeduplicationId?: string;
  MessageGroupId?: string;
}

const BATCH_LIMIT = 10;
// SQS caps a single message and a whole SendMessageBatch request at 256 KiB.
export const SQS_MAX_PAYLOAD_BYTES = 256 * 1024;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf-8");
}

/** Groups entries so no batch exceeds the entry count or the request size limit. */
function packBatches(entries: BatchEntry[], maxEntries: number, maxBytes: number): BatchEntry[][] {
  const batches: BatchEntry[][] = [];
  let current: BatchEntry[] = [];
  let currentBytes = 0;

  for (const entry of entries) {
    const size = byteLength(entry.MessageBody);
    if (current.length > 0 && (current.length === maxEntries || currentBytes + size > maxBytes)) {
      batches.push(current);
      current = [];
      currentBytes = 0;
    }
    current.push(entry);
    currentBytes += size;
  }

  if (current.length > 0) {
    batches.push(current);
  }
  return batches;
}

/**
 * One message per file record, sent in batches of at most ten entries that
 * stay under the SQS request size limit.
 */
export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly runId: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxMessageBytes: number;

  constructor(options: SqsSinkOptions = {}) {
    super();
    this.queueUrl = options.queueUrl;
    this.runId = options.runId ?? "unknown";
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupId = options.groupId ?? "filing-table-extractor";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.maxMessageBytes = options.maxMessageBytes ?? SQS_MAX_PAYLOAD_BYTES;
  }

  describe(): string {
    return `sqs:${this.queueUrl ?? "unconfigured"}`;
  }

  assertReady(): void {
    this.ensureConfigured("SQS", Boolean(this.queueUrl));
  }

  protected async write(records: FileRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    const queueUrl = this.queueUrl ?? "";
    const sentAt = new Date().toISOString();

    const entries = this.messageBodies(records, sentAt).map((body, index) => {
      const entry: BatchEntry = {
        Id: String(index),
        MessageBody: body,
      };

      if (this.fifo) {
        entry.MessageGroupId = this.groupId;
        entry.MessageDeduplicationId = `${this.runId}:${index}`;
      }

      return entry;
    });

    for (const entryBatch of packBatches(entries, BATCH_LIMIT, this.maxMessageBytes)) {
      await this.sendBatchWithRetries(queueUrl, entryBatch);
    }
  }

  /** A file record that does not fit one message is sent as one message per table. */
  private messageBodies(records: FileRecord[], sentAt: string): string[] {
    const bodies: string[] = [];
    for (const record of records) {
      const whole = JSON.stringify({ runId: this.runId, sentAt, file: record });
      if (byteLength(whole) <= this.maxMessageBytes) {
        bodies.push(whole);
        continue;
      }

      record.extracted_tables.forEach((table, tableIndex) => {
        const body = JSON.stringify({
          runId: this.runId,
          sentAt,
          filename: record.filename,
          tableIndex,
          tableCount: record.extracted_tables.length,
          table,
        });
        const size = byteLength(body);
        if (size > this.maxMessageBytes) {
          throw new Error(
            `SQS message for ${record.filename} table ${tableIndex} is ${size} bytes, over the ${this.maxMessageBytes}-byte limit`,
          );
        }
        bodies.push(body);
      });
    }
    return bodies;
  }

  private async sendBatchWithRetries(queueUrl: string, originalEntries: BatchEntry[]): Promise<void> {
    let pendingEntries = [...originalEntries];
    let attempt = 0;

    while (pendingEntries.length > 0) {
      attempt += 1;
      const command = new SendMessageBatchCommand({
        QueueUrl: queueUrl,
        Entries: pendingEntries,
      });
      const response = await this.client.send(command);

      const failedIds = new Set((response.Failed ?? []).map((f) => f.Id).filter((id): id is string => Boolean(id)));
      if (failedIds.size === 0) {
        return;
      }

      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failedIds.size} entries still failed)`);
      }

      pendingEntries = pendingEntries.filter((entry) => failedIds.has(entry.Id));
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
