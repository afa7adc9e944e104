import fs from "node:fs";
import path from "node:path";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  model: "gpt-4o",
  gatewayBaseUrl: "https://api.openai.com/v1",
  apiKey: undefined,
  gatewayTimeoutMs: 120_000,
  ignoreHttpsErrors: false,
  maxAttempts: 3,
  fragmentCharLimit: 15_000,
  minTableTextLength: 100,
  inputExtension: ".txt",
  outputDir: "output",
  requireFinancialFields: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }

  return pickOverrides(parsed);
}

function pickOverrides(raw: Record<string, unknown>): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const key of ["model", "gatewayBaseUrl", "apiKey", "inputExtension", "outputDir"] as const) {
    const value = raw[key];
    if (typeof value === "string") {
      overrides[key] = value;
    }
  }
  for (const key of ["gatewayTimeoutMs", "maxAttempts", "fragmentCharLimit", "minTableTextLength"] as const) {
    const value = raw[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      overrides[key] = value;
    }
  }
  for (const key of ["ignoreHttpsErrors", "requireFinancialFields"] as const) {
    const value = raw[key];
    if (typeof value === "boolean") {
      overrides[key] = value;
    }
  }
  return overrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    ...merged,
    model: env.MODEL ?? merged.model,
    gatewayBaseUrl: env.GATEWAY_BASE_URL ?? merged.gatewayBaseUrl,
    apiKey: env.OPENAI_API_KEY ?? merged.apiKey,
    gatewayTimeoutMs: toInt(env.GATEWAY_TIMEOUT_MS, merged.gatewayTimeoutMs),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    maxAttempts: Math.max(1, toInt(env.MAX_ATTEMPTS, merged.maxAttempts)),
    fragmentCharLimit: toInt(env.FRAGMENT_CHAR_LIMIT, merged.fragmentCharLimit),
    minTableTextLength: toInt(env.MIN_TABLE_TEXT_LENGTH, merged.minTableTextLength),
    inputExtension: env.INPUT_EXTENSION ?? merged.inputExtension,
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    requireFinancialFields: toBool(env.REQUIRE_FINANCIAL_FIELDS, merged.requireFinancialFields),
  };
}

export { DEFAULT_CONFIG };
