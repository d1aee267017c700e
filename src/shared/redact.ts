// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /token['":=\s]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":=\s]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /password['":=\s]+['"]?\S+['"]?/gi,
];

/**
 * Redact potential secret values from a string before it reaches a log.
 * Operator-typed text (descriptions, search filters) is logged verbatim otherwise.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

/**
 * Safely stringify an object, redacting known secret keys.
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet();
  return JSON.stringify(
    obj,
    (_key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'string' && /^(token|secret|password|authorization|bearer)$/i.test(_key)) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
