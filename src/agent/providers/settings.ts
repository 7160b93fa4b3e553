import type { ProviderSettings } from "../types.js";

/**
 * First non-empty string among the given keys (callers pass both the
 * snake_case and camelCase spellings).
 */
export function readString(settings: ProviderSettings, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = settings[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return undefined;
}

export function readNumber(settings: ProviderSettings, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = settings[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) return Number(value);
  }
  return undefined;
}

function parseEnvVarReference(value: string): string | null {
  const raw = value.trim();
  if (!raw) return null;
  if (/^\$[A-Z0-9_]+$/.test(raw)) return raw.slice(1);
  const braced = raw.match(/^\$\{([A-Z0-9_]+)\}$/);
  if (braced?.[1]) return braced[1];
  const envPrefix = raw.match(/^env:([A-Z0-9_]+)$/i);
  if (envPrefix?.[1]) return envPrefix[1].toUpperCase();
  return null;
}

/**
 * Resolve `env:NAME`, `$NAME` and `${NAME}` references. A reference to an
 * unset variable resolves to undefined so the provider reports unavailable.
 */
export function resolveSecret(value: string | undefined, fallbackEnv?: string): string | undefined {
  if (value) {
    const ref = parseEnvVarReference(value);
    if (!ref) return value;
    return process.env[ref]?.trim() || undefined;
  }
  if (fallbackEnv) {
    return process.env[fallbackEnv]?.trim() || undefined;
  }
  return undefined;
}

export function previewText(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
