const REDACTION_PLACEHOLDER = '[REDACTED]';

// Common API key prefixes and patterns
const apiKeyPatterns = [
  /sk-[a-zA-Z0-9]{20,}/g, // OpenAI style
  /Bearer\s+[a-zA-Z0-9._~+/-]{16,}=*/g, // Authorization header values
];

// Patterns for environment variables
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

const allPatterns = [...apiKeyPatterns, ...envVarPatterns];

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

/**
 * Deep-copies a value with every secret-looking substring replaced.
 * Used before anything is written to a log file.
 */
export function redactForLogs(input: unknown): unknown {
  if (typeof input === 'string') {
    return redactString(input).redacted;
  }

  if (Array.isArray(input)) {
    return input.map(redactForLogs);
  }

  if (typeof input === 'object' && input !== null) {
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      redactedObj[key] = redactForLogs(value);
    }
    return redactedObj;
  }

  return input;
}
