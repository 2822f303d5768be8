// config.ts - Centralized configuration constants

import type { LogLevel } from "./logger.ts";

// Profile field limits
export const PROFILE_NAME_MAX_LENGTH = 50;
export const PROFILE_LOCATION_MAX_LENGTH = 40;
export const PROFILE_WEBSITE_MAX_LENGTH = 200;

// Usernames: Unicode letters and digits plus dot, underscore and hyphen
export const USERNAME_PATTERN = /^[\p{L}\p{N}_.-]+$/u;

// Content Security Policy directives
export const CSP_DIRECTIVES = [
  "default-src 'self'",
  "style-src 'self' 'unsafe-inline'",
  "font-src 'self'",
  "img-src 'self' data:",
  "connect-src 'self'",
  "script-src 'none'",
  "object-src 'none'",
  "frame-ancestors 'none'",
  "base-uri 'none'",
  "form-action 'self'",
  "upgrade-insecure-requests",
] as const;

export interface AppConfig {
  /** Path the route table is mounted under, with leading and trailing slash */
  mountPrefix: string;
  /** Redirect `/foo` to `/foo/` when only the latter resolves */
  appendSlash: boolean;
  loginUrl: string;
  /** Header an upstream proxy sets to the authenticated username */
  remoteUserHeader: string;
  profilesPerPage: number;
  autocompleteLimit: number;
}

export interface ServerConfig extends AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  seedFile?: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  mountPrefix: "/profiles/",
  appendSlash: true,
  loginUrl: "/account/login/",
  remoteUserHeader: "x-remote-user",
  profilesPerPage: 20,
  autocompleteLimit: 10,
};

const DEFAULT_PORT = 3000;
const DEFAULT_HOST = "0.0.0.0";
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const parsePositive = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const num = Number.parseInt(value, 10);
  if (!Number.isFinite(num) || num < 1) return fallback;
  return num;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
};

const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

/**
 * Normalize a mount prefix so it always starts and ends with a slash.
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/^\/+|\/+$/g, "");
  return trimmed ? `/${trimmed}/` : "/";
}

/**
 * Build the server configuration from environment variables.
 * Missing or malformed values fall back to the defaults.
 */
export function loadConfig(env: Record<string, string | undefined>): ServerConfig {
  const level = env.LOG_LEVEL?.trim().toLowerCase();

  return {
    mountPrefix: normalizePrefix(env.PROFILES_MOUNT_PREFIX ?? DEFAULT_CONFIG.mountPrefix),
    appendSlash: parseBoolean(env.APPEND_SLASH, DEFAULT_CONFIG.appendSlash),
    loginUrl: env.LOGIN_URL || DEFAULT_CONFIG.loginUrl,
    remoteUserHeader: (env.REMOTE_USER_HEADER || DEFAULT_CONFIG.remoteUserHeader).toLowerCase(),
    profilesPerPage: parsePositive(env.PROFILES_PER_PAGE, DEFAULT_CONFIG.profilesPerPage),
    autocompleteLimit: parsePositive(env.AUTOCOMPLETE_LIMIT, DEFAULT_CONFIG.autocompleteLimit),
    port: parsePositive(env.PORT, DEFAULT_PORT),
    host: env.HOST || DEFAULT_HOST,
    logLevel: level && isLogLevel(level) ? level : "info",
    seedFile: env.PROFILES_SEED_FILE || undefined,
  };
}
