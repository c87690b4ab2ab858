/**
 * Built-in rule sets for log redaction.
 *
 * Each preset is an ordered array of RedactionRules, rebuilt on every call
 * so engines never share a stateful global RegExp. The replacement text
 * is spliced into each rule; assignment rules keep their key and only
 * replace the value (`password=[REDACTED]`).
 *
 * Order is part of the contract. Keyed assignments run before the bare
 * `bearer`/`basic` scheme rules, so a scheme rule can never swallow a
 * `password=` key while leaving its value behind. With the default
 * replacement text, running the default preset twice gives the same
 * output as running it once.
 */

/**
 * One substitution. Rules run in insertion order, each over the output of
 * the previous one.
 */
export interface RedactionRule {
  /** Shows up in stats and policy error messages. */
  name: string;
  /** Must carry the global flag. */
  pattern: RegExp;
  /** May reference capture groups ($1, $2, ...). */
  replacement: string;
}

export const DEFAULT_REPLACEMENT = "[REDACTED]";

export type PresetName = "default" | "strict";

export const PRESET_NAMES: readonly PresetName[] = ["default", "strict"];

/** Value of a `key=value` pair: runs up to whitespace, a separator or a quote. */
const VALUE = String.raw`[^\s;,&"']+`;

/** `$` is special in replacement strings; make literal text safe to splice. */
function literal(text: string): string {
  return text.replace(/\$/g, "$$$$");
}

function assignmentRule(name: string, key: string, text: string): RedactionRule {
  return {
    name,
    pattern: new RegExp(String.raw`(${key}\s*[=:]\s*["']?)${VALUE}`, "gi"),
    replacement: `$1${literal(text)}`,
  };
}

function defaultRules(text: string): RedactionRule[] {
  return [
    {
      // Server=db;User Id=app;Password=two words;  (value may contain spaces)
      name: "connection-string-password",
      pattern:
        /((?:server|host|data source)\s*=[^\n]*?;\s*(?:password|pwd)\s*=\s*)[^;\n]+/gi,
      replacement: `$1${literal(text)}`,
    },
    assignmentRule("password", "(?:password|passwd|pwd)", text),
    assignmentRule("api-key", "api[_-]?key", text),
    assignmentRule("secret", "secret", text),
    assignmentRule("token", "token", text),
    assignmentRule("credential", "credentials?", text),
    {
      name: "authorization-header",
      pattern: new RegExp(
        String.raw`(authorization\s*[=:]\s*["']?)(?:(?:bearer|basic|digest|token)\s+)?${VALUE}`,
        "gi",
      ),
      replacement: `$1${literal(text)}`,
    },
    {
      name: "bearer-token",
      pattern: /(bearer\s+)[A-Za-z0-9\-._~+/]+=*/gi,
      replacement: `$1${literal(text)}`,
    },
    {
      // Needs a digit, "+", "/" or "=" so ordinary words after "basic" survive.
      name: "basic-auth",
      pattern: /(basic\s+)(?=[A-Za-z0-9+/]*[0-9+/=])[A-Za-z0-9+/]{8,}={0,2}/gi,
      replacement: `$1${literal(text)}`,
    },
    {
      name: "credit-card",
      pattern: /\b\d{4}([ -]?)\d{4}\1\d{4}\1\d{3,4}\b/g,
      replacement: literal(text),
    },
    {
      name: "ssn",
      pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
      replacement: literal(text),
    },
  ];
}

// ---- Strict extras ----
// Broader patterns with a higher false-positive rate: whole key blocks,
// email addresses and IPv4 addresses.

function strictRules(text: string): RedactionRule[] {
  return [
    {
      name: "private-key",
      pattern:
        /-----BEGIN (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----[\s\S]*?-----END (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----/g,
      replacement: literal(text),
    },
    ...defaultRules(text),
    {
      name: "email",
      pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/gi,
      replacement: literal(text),
    },
    {
      name: "ipv4",
      pattern:
        /\b(?:(?:25[0-5]|2[0-4]\d|[01]?\d\d?)\.){3}(?:25[0-5]|2[0-4]\d|[01]?\d\d?)\b/g,
      replacement: literal(text),
    },
  ];
}

/**
 * Fresh rules for a preset. `strict` includes everything in `default`.
 */
export function presetRules(
  preset: PresetName,
  replacementText: string = DEFAULT_REPLACEMENT,
): RedactionRule[] {
  return preset === "strict" ? strictRules(replacementText) : defaultRules(replacementText);
}

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === "string" && PRESET_NAMES.some((name) => name === value);
}
