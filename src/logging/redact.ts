import { LRUCache } from 'lru-cache';

// Credential values seen at runtime, each with its compiled pattern. Anything
// written to a log sink passes through redactSecrets first. Bounded: on a
// shared HTTP server every caller's explicit pair lands here.
export const MAX_REGISTERED_SECRETS = 256;

const secrets = new LRUCache<string, RegExp>({ max: MAX_REGISTERED_SECRETS });

const REDACTED = '***REDACTED***';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function registerSecret(value: string | undefined): void {
  if (!value || value.length < 8) return;
  // a hit refreshes recency
  if (secrets.get(value)) return;
  secrets.set(value, new RegExp(escapeRegExp(value), 'g'));
}

export function clearRegisteredSecrets(): void {
  secrets.clear();
}

export function registeredSecretCount(): number {
  return secrets.size;
}

export function redactSecrets(text: string): string {
  if (!text) return text;

  let redacted = text;
  for (const pattern of secrets.values()) {
    redacted = redacted.replace(pattern, REDACTED);
  }

  // key=... / token=... in query strings
  redacted = redacted.replace(/([?&](?:key|token)=)[^&\s"']+/gi, `$1${REDACTED}`);

  return redacted;
}

export function redactData<T>(data: T): T {
  if (data === undefined || data === null) return data;
  const text = JSON.stringify(data);
  if (text === undefined) return data;
  const parsed: T = JSON.parse(redactSecrets(text));
  return parsed;
}

// Human-readable diagnostics. ALL OUTPUT GOES TO STDERR: under the stdio
// transport stdout carries JSON-RPC only.
function write(message: string, args: unknown[]): void {
  console.error(
    redactSecrets(message),
    ...args.map((arg) => (typeof arg === 'string' ? redactSecrets(arg) : arg))
  );
}

export const safeLog = {
  info: (message: string, ...args: unknown[]) => write(message, args),
  warn: (message: string, ...args: unknown[]) => write(message, args),
  error: (message: string, ...args: unknown[]) => write(message, args),
  debug: (message: string, ...args: unknown[]) => {
    if (process.env.DEBUG) {
      write(message, args);
    }
  },
};
