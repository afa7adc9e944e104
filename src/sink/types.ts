import type { FileRecord } from "../types";

/** Receives the whole run's records once, after the last file. */
export interface Sink {
  /** Throws when the sink lacks the settings it needs to deliver. */
  assertReady(): void;
  publishFileRecords(records: FileRecord[]): Promise<void>;
  describe(): string;
}
