export interface AppConfig {
  model: string;
  gatewayBaseUrl: string;
  apiKey?: string;
  gatewayTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  maxAttempts: number;
  fragmentCharLimit: number;
  minTableTextLength: number;
  inputExtension: string;
  outputDir: string;
  requireFinancialFields: boolean;
}

export type ConfigOverrides = Partial<AppConfig>;
