export interface AppConfig {
  query: string;
  limit: number;
  archiveEnabled: boolean;
  outputDir: string;
  linkHost: string;
  searchBaseUrl: string;
  availabilityUrl: string;
  saveUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
}

export type ConfigOverrides = Partial<AppConfig>;
