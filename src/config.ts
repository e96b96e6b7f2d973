import type { CrawlerConfig, TlsVersion } from "./types";

export const DEFAULT_LISTING_URL = "https://nol.ntu.edu.tw/nol/coursesearch/search_result.php";

const TLS_VERSIONS: readonly TlsVersion[] = ["TLSv1", "TLSv1.1", "TLSv1.2", "TLSv1.3"];

/**
 * Get integer config from environment variable
 */
export function getIntConfig(key: string, env: NodeJS.ProcessEnv = process.env): number | null {
  const value = env[key];
  if (value == null || value.trim() === "") return null;
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) {
    console.error(`Invalid integer config value provided for ${key}: ${value}`);
    return null;
  }
  return n;
}

function getTlsVersion(key: string, env: NodeJS.ProcessEnv): TlsVersion | undefined {
  const value = env[key];
  if (!value) return undefined;
  const version = TLS_VERSIONS.find((v) => v === value);
  if (!version) {
    console.error(`Invalid TLS version provided for ${key}: ${value}`);
  }
  return version;
}

function positive(value: number | null, fallback: number): number {
  return value !== null && value > 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  return {
    listingUrl: env.LISTING_URL || DEFAULT_LISTING_URL,
    cacheSize: positive(getIntConfig("CACHE_SIZE", env), 5),
    pageSize: positive(getIntConfig("PAGE_SIZE", env), 15),
    maxRetries: positive(getIntConfig("MAX_RETRIES", env), 5),
    requestTimeoutMs: positive(getIntConfig("REQUEST_TIMEOUT_MS", env), 30000),
    tls: {
      ciphers: env.TLS_CIPHERS || undefined,
      minVersion: getTlsVersion("TLS_MIN_VERSION", env),
      maxVersion: getTlsVersion("TLS_MAX_VERSION", env),
    },
  };
}
