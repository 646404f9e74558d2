// Typed environment variable access.
// Nothing is required: the analyzer boots with an empty environment.

const DEFAULT_CAPTURE_TIMEOUT_MS = 30000;

function optionalEnv(name: string): string | undefined {
  return process.env[name] || undefined;
}

function positiveIntEnv(name: string, fallback: number): number {
  const raw = optionalEnv(name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function flagEnv(name: string): boolean {
  const raw = optionalEnv(name)?.toLowerCase();
  return raw === 'true' || raw === '1';
}

export function readEnv() {
  return {
    // Page capture gives up after this long
    captureTimeoutMs: positiveIntEnv('CAPTURE_TIMEOUT_MS', DEFAULT_CAPTURE_TIMEOUT_MS),

    // Per-phase progress logs from the analysis service
    verboseLogs: flagEnv('ANALYSIS_VERBOSE_LOGS'),
  } as const;
}

export const env = readEnv();
