import fs from "node:fs";
import path from "node:path";
import type { FileRecord } from "../types";
import { BaseSink } from "./baseSink";

export const OUTPUT_INDENT = 4;

export class LocalJsonSink extends BaseSink {
  private readonly outputPath: string;

  constructor(outputPath: string) {
    super();
    this.outputPath = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(this.outputPath), { recursive: true });
  }

  describe(): string {
    return `local_json:${this.outputPath}`;
  }

  protected async write(records: FileRecord[]): Promise<void> {
    await fs.promises.writeFile(this.outputPath, JSON.stringify(records, null, OUTPUT_INDENT), "utf-8");
  }
}
