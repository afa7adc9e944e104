import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import type { FileRecord } from "../types";
import { BaseSink } from "./baseSink";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms?(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  runId?: string;
  exchange?: string;
  routingKey?: string;
  exchangeType?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** One persistent message per file record on a confirm channel. */
export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly runId: string;
  private readonly exchange: string;
  private readonly routingKey: string;
  private readonly exchangeType: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;

  constructor(options: RabbitSinkOptions = {}) {
    super();
    this.connectionUrl = options.connectionUrl;
    this.runId = options.runId ?? "unknown";
    this.exchange = options.exchange ?? "filings.extractor";
    this.routingKey = options.routingKey ?? "tables.extracted";
    this.exchangeType = options.exchangeType ?? "topic";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
  }

  describe(): string {
    return `rabbit:${this.exchange}/${this.routingKey}`;
  }

  assertReady(): void {
    this.ensureConfigured("RabbitMQ", Boolean(this.connectionUrl));
  }

  protected async write(records: FileRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    const url = this.connectionUrl ?? "";

    let attempt = 0;
    while (true) {
      attempt += 1;
      let connection: ConnectionLike | undefined;
      let channel: ChannelLike | undefined;

      try {
        connection = await this.connectFn(url);
        channel = await connection.createConfirmChannel();
        await channel.assertExchange(this.exchange, this.exchangeType, { durable: true });

        for (const record of records) {
          const body = Buffer.from(
            JSON.stringify({
              runId: this.runId,
              sentAt: new Date().toISOString(),
              file: record,
            }),
          );

          channel.publish(this.exchange, this.routingKey, body, {
            persistent: true,
            contentType: "application/json",
            headers: {
              "x-run-id": this.runId,
              "x-filename": record.filename,
              "x-idempotency-key": `${this.runId}:${record.filename}`,
            },
          });
        }

        if (typeof channel.waitForConfirms === "function") {
          await channel.waitForConfirms();
        }

        await channel.close();
        await connection.close();
        return;
      } catch (error) {
        if (channel) {
          await channel.close().catch(() => undefined);
        }
        if (connection) {
          await connection.close().catch(() => undefined);
        }

        if (attempt > this.maxRetries) {
          throw error;
        }
      }

      await sleep(this.retryDelayMs * attempt);
    }
  }
}
