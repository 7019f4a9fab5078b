/**
 * Client configuration: validation and environment loading
 */

import type { TravisClientConfig, TravisEndpoint } from "./types.js";

export function validateConfig(config: TravisClientConfig): void {
  const errors: string[] = [];

  if (typeof config.token !== "string" || config.token.trim().length === 0) {
    errors.push("token must be a non-empty string");
  }

  if (config.endpoint !== undefined) {
    const endpoint: TravisEndpoint = config.endpoint;
    if (typeof endpoint === "string") {
      if (endpoint !== "org" && endpoint !== "com") {
        errors.push(`endpoint must be "org", "com" or { enterprise: host }, got "${String(endpoint)}"`);
      }
    } else if (!isBareHost(endpoint.enterprise)) {
      errors.push("endpoint.enterprise must be a host name without scheme or path");
    }
  }

  if (config.timeout !== undefined && (!Number.isFinite(config.timeout) || config.timeout <= 0)) {
    errors.push("timeout must be positive");
  }

  if (config.userAgent !== undefined && config.userAgent.trim().length === 0) {
    errors.push("userAgent must not be empty");
  }

  if (config.transport !== undefined && typeof config.transport.send !== "function") {
    errors.push("transport must implement send(request)");
  }

  if (config.delivery !== undefined && typeof config.delivery.schedule !== "function") {
    errors.push("delivery must implement schedule(task)");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid TravisClient configuration:\n  - ${errors.join("\n  - ")}`);
  }
}

function isBareHost(host: string): boolean {
  if (host.length === 0 || /[\s/?#@]/.test(host)) {
    return false;
  }
  try {
    return new URL(`https://${host}`).host === host.toLowerCase();
  } catch {
    return false;
  }
}

export function parseEndpoint(value: string): TravisEndpoint {
  const trimmed = value.trim();
  if (trimmed === "org" || trimmed === "com") {
    return trimmed;
  }
  return { enterprise: trimmed };
}

/**
 * Reads TRAVIS_TOKEN, TRAVIS_ENDPOINT ("org", "com" or an enterprise host)
 * and TRAVIS_TIMEOUT_MS.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): TravisClientConfig {
  const token = env["TRAVIS_TOKEN"];
  if (token === undefined || token.trim().length === 0) {
    throw new Error("TRAVIS_TOKEN is not set");
  }

  const config: TravisClientConfig = { token };

  const endpoint = env["TRAVIS_ENDPOINT"];
  if (endpoint !== undefined && endpoint.trim().length > 0) {
    config.endpoint = parseEndpoint(endpoint);
  }

  const timeout = env["TRAVIS_TIMEOUT_MS"];
  if (timeout !== undefined && timeout.trim().length > 0) {
    const parsed = Number(timeout);
    if (!Number.isFinite(parsed)) {
      throw new Error(`TRAVIS_TIMEOUT_MS must be a number, got "${timeout}"`);
    }
    config.timeout = parsed;
  }

  return config;
}
