// Debug logging for metadata codecs.
//
// Uses the `debug` pattern convention (like npm's debug package):
// localStorage.debug in browsers, the DEBUG environment variable in Node.

/** Structured log sink. */
export type Logger = (message: string, data: Record<string, unknown>) => void;

export const DECODE_NAMESPACE = "scale-metadata:decode";
export const ENCODE_NAMESPACE = "scale-metadata:encode";
export const CONVERT_NAMESPACE = "scale-metadata:convert";

function readDebugPattern(): string | null {
  if (typeof localStorage !== "undefined") {
    const stored = localStorage.getItem("debug");
    if (stored) return stored;
  }
  if (typeof process !== "undefined") {
    return process.env.DEBUG ?? null;
  }
  return null;
}

/**
 * Check if a namespace is enabled by the current debug pattern.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string): boolean {
  const debug = readDebugPattern();
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      // Exclusion pattern
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  // Convert glob pattern to regex
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*"); // Convert * to .*

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for a namespace. The pattern is checked on every call, so
 * enabling logging at run time takes effect immediately.
 *
 * ```javascript
 * localStorage.debug = 'scale-metadata:*'  // browser
 * DEBUG=scale-metadata:decode node app.js   // node
 * ```
 */
export function createLogger(namespace: string): Logger {
  return (message, data) => {
    if (!isEnabled(namespace)) return;
    console.log(`${namespace} ${message}`, data);
  };
}
