export interface EngineConfig {
  executable: string;
  poToken?: string;
  timeoutMs?: number;
}

export interface CookieConfig {
  cookiesFile: string;
  browsers: string[];
}

export interface AppConfig {
  downloadBaseDir: string;
  linksFile: string;
  probeTimeoutMs: number;
  engine: EngineConfig;
  cookies: CookieConfig;
  logLevel: string;
  sentryDsn?: string;
}
