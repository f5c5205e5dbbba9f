import { z } from 'zod/v4';

export interface AppConfig {
  openshockBaseUrl: string;
  openshockApiToken: string;
  requestTimeoutMs: number;

  /** 0 disables the SHOCK ceiling; values above 100 behave as 100. */
  maxShockIntensity: number;

  serverName: string;
  serverVersion: string;

  mcpAuthToken: string;
  mcpHttpHost: string;
  mcpHttpPort: number;
  /** Host header allowlist; unset keeps the SDK default for the bind host. */
  mcpHttpAllowedHosts: string[] | undefined;
  mcpHttpAllowJsonOnly: boolean;

  logLevel: string;
}

const envSchema = z.object({
  OPENSHOCK_API_URL: z.string().optional(),
  OPENSHOCK_API_TOKEN: z.string().optional(),
  OPENSHOCK_TIMEOUT_MS: z.string().optional(),

  MAX_SHOCK_INTENSITY: z.string().optional(),

  MCP_SERVER_NAME: z.string().optional(),
  MCP_VERSION: z.string().optional(),

  MCP_AUTH_TOKEN: z.string().optional(),
  MCP_HTTP_HOST: z.string().optional(),
  PORT: z.string().optional(),
  MCP_HTTP_ALLOWED_HOSTS: z.string().optional(),
  MCP_HTTP_ALLOW_JSON_ONLY: z.string().optional(),

  MCP_LOG_LEVEL: z.string().optional()
});

export const DEFAULT_OPENSHOCK_API_URL = 'https://api.openshock.app';

function normalizeBaseUrl(raw?: string): string {
  if (!raw || !raw.trim()) {
    return DEFAULT_OPENSHOCK_API_URL;
  }

  const trimmed = raw.trim().replace(/\/+$/, '');
  try {
    const parsed = new URL(trimmed);
    // Credentials belong in OPENSHOCK_API_TOKEN, never in the URL.
    parsed.username = '';
    parsed.password = '';
    return parsed.toString().replace(/\/+$/, '');
  } catch {
    throw new Error(`Invalid OPENSHOCK_API_URL: ${raw}`);
  }
}

function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseStrictInteger(
  name: string,
  raw: string | undefined,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${name}: ${raw} (expected an integer between ${min} and ${max})`);
  }
  return Math.min(max, Math.max(min, Number(trimmed)));
}

function parseStringAllowlist(raw: string | undefined): string[] | undefined {
  if (!raw || !raw.trim() || raw.trim() === '*') {
    return undefined;
  }

  const values = raw
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter(Boolean);

  return values.length ? Array.from(new Set(values)) : undefined;
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const openshockApiToken = parseOptionalString(parsed.OPENSHOCK_API_TOKEN);
  const mcpAuthToken = parseOptionalString(parsed.MCP_AUTH_TOKEN);

  const missing: string[] = [];
  if (!openshockApiToken) {
    missing.push('OPENSHOCK_API_TOKEN');
  }
  if (!mcpAuthToken) {
    missing.push('MCP_AUTH_TOKEN');
  }
  if (!openshockApiToken || !mcpAuthToken) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  return Object.freeze({
    openshockBaseUrl: normalizeBaseUrl(parsed.OPENSHOCK_API_URL),
    openshockApiToken,
    requestTimeoutMs: parseNumber(parsed.OPENSHOCK_TIMEOUT_MS, 30_000, 500, 120_000),

    maxShockIntensity: parseStrictInteger('MAX_SHOCK_INTENSITY', parsed.MAX_SHOCK_INTENSITY, 0, 0, 100),

    serverName: parseOptionalString(parsed.MCP_SERVER_NAME) ?? 'openshock-mcp-server',
    serverVersion: parseOptionalString(parsed.MCP_VERSION) ?? '1.0.0',

    mcpAuthToken,
    mcpHttpHost: parseOptionalString(parsed.MCP_HTTP_HOST) ?? '0.0.0.0',
    mcpHttpPort: parseNumber(parsed.PORT, 8000, 1, 65535),
    mcpHttpAllowedHosts: parseStringAllowlist(parsed.MCP_HTTP_ALLOWED_HOSTS),
    mcpHttpAllowJsonOnly: parseBoolean(parsed.MCP_HTTP_ALLOW_JSON_ONLY, true),

    logLevel: parseOptionalString(parsed.MCP_LOG_LEVEL) ?? 'info'
  });
}
