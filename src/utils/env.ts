type ServiceConfig = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
};

const DEFAULT_TIMEOUT_MS = 60_000;

function getEnv(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function requireEnv(name: string, context: string): string {
  const value = getEnv(name);
  if (!value) {
    throw new Error(`Missing ${name}. Required for ${context}.`);
  }
  return value;
}

function getTimeoutMs(): number {
  const raw = Number(getEnv("ANALYTICS_TIMEOUT_MS"));
  return Number.isFinite(raw) && raw > 0 ? raw : DEFAULT_TIMEOUT_MS;
}

export function getAnalyticsConfig(): ServiceConfig {
  return {
    apiKey: requireEnv("ANALYTICS_API_TOKEN", "the analytics backend"),
    baseUrl: requireEnv("ANALYTICS_BASE_URL", "the analytics backend"),
    timeoutMs: getTimeoutMs()
  };
}

export function getPort(): number {
  const port = Number(getEnv("PORT") ?? 8080);
  return Number.isInteger(port) && port > 0 ? port : 8080;
}
