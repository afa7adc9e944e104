import type { FileRecord } from "../types";
import type { Sink } from "./types";

export abstract class BaseSink implements Sink {
  private published = false;

  abstract describe(): string;

  assertReady(): void {
    // Sinks without required settings are always ready.
  }

  async publishFileRecords(records: FileRecord[]): Promise<void> {
    if (this.published) {
      throw new Error(`${this.describe()} already received this run's records`);
    }
    this.assertReady();
    this.published = true;
    await this.write(records);
  }

  protected abstract write(records: FileRecord[]): Promise<void>;

  protected ensureConfigured(name: string, ready: boolean): void {
    if (!ready) {
      throw new Error(`${name} sink is not configured`);
    }
  }
}
