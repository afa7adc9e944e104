import fs from "node:fs";
import path from "node:path";

export class InputPathNotFoundError extends Error {
  readonly inputPath: string;

  constructor(inputPath: string) {
    super(`Input path not found: ${inputPath}`);
    this.name = "InputPathNotFoundError";
    this.inputPath = inputPath;
  }
}

export interface InputPlan {
  files: string[];
  isDirectory: boolean;
  outputPath: string;
}

export async function resolveInputFiles(
  inputPath: string,
  extension: string,
): Promise<{ files: string[]; isDirectory: boolean }> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(inputPath);
  } catch {
    throw new InputPathNotFoundError(inputPath);
  }

  if (!stats.isDirectory()) {
    return { files: [inputPath], isDirectory: false };
  }

  const entries = await fs.promises.readdir(inputPath, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith(".") && entry.name.endsWith(extension))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(inputPath, name));
  return { files, isDirectory: true };
}

export function resolveOutputPath(inputPath: string, isDirectory: boolean, outputDir: string): string {
  if (isDirectory) {
    return path.join(outputDir, "final_output.json");
  }
  return path.join(outputDir, `${path.basename(inputPath)}_extracted.json`);
}

export async function planInputs(inputPath: string, extension: string, outputDir: string): Promise<InputPlan> {
  const { files, isDirectory } = await resolveInputFiles(inputPath, extension);
  return { files, isDirectory, outputPath: resolveOutputPath(inputPath, isDirectory, outputDir) };
}
