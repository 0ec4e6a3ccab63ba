export type LanguageModelConfig = {
  enabled: boolean;
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  maxConcurrency: number;
};
