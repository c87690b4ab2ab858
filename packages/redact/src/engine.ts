/**
 * Redaction engine.
 *
 * Holds an ordered rule list and applies it to log text. Each rule is a
 * global substitution over the output of the previous rule, so later
 * rules see text that earlier ones already scrubbed. Two overlapping
 * rules can therefore both fire on the same region; that is a known
 * property of sequential application, not something the engine tries to
 * detect.
 */

import { InvalidPatternError } from "@appshell/core";

import { DEFAULT_REPLACEMENT, presetRules, type PresetName, type RedactionRule } from "./presets.js";

export interface RedactionStats {
  /** Total number of replacements made across all rules. */
  totalReplacements: number;
  /** Per-rule replacement counts. Only includes rules that matched. */
  byRule: Record<string, number>;
}

/**
 * Create fresh stats for a redaction pass.
 */
export function createStats(): RedactionStats {
  return { totalReplacements: 0, byRule: {} };
}

export interface RedactionEngineOptions {
  /**
   * Initial rule set. "none" starts empty.
   * Default: "default". Ignored when `rules` is given.
   */
  preset?: PresetName | "none";
  /** Explicit initial rules, used as-is (their patterns must be global). */
  rules?: RedactionRule[];
  /** Text substituted for sensitive values. Default: "[REDACTED]". */
  replacementText?: string;
}

/**
 * Compile a user-supplied pattern string.
 *
 * Patterns are always case-insensitive. A leading `(?i)` is accepted for
 * compatibility with other regex dialects and stripped, since JS has no
 * inline flags.
 */
export function compilePattern(source: string, ruleName?: string): RegExp {
  const body = source.startsWith("(?i)") ? source.slice(4) : source;
  try {
    return new RegExp(body, "gi");
  } catch (err: unknown) {
    throw new InvalidPatternError(source, err, ruleName);
  }
}

function withGlobalFlag(pattern: RegExp): RegExp {
  return pattern.global ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, `${pattern.flags}g`);
}

export class RedactionEngine {
  /** Text used when a pattern is added without its own replacement. */
  readonly replacementText: string;
  private rules: RedactionRule[];
  private customCount = 0;

  constructor(options: RedactionEngineOptions = {}) {
    this.replacementText = options.replacementText ?? DEFAULT_REPLACEMENT;
    const preset = options.preset ?? "default";
    if (options.rules) {
      this.rules = [...options.rules];
    } else if (preset === "none") {
      this.rules = [];
    } else {
      this.rules = presetRules(preset, this.replacementText);
    }
  }

  /** Current rules in application order (a copy). */
  get ruleList(): RedactionRule[] {
    return [...this.rules];
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Apply every rule in order. Empty input is returned unchanged.
   */
  redact(text: string): string {
    return this.apply(text, null);
  }

  /**
   * Like {@link redact}, also counting replacements per rule.
   */
  redactWithStats(text: string): { text: string; stats: RedactionStats } {
    const stats = createStats();
    return { text: this.apply(text, stats), stats };
  }

  /**
   * True when any rule matches. Never modifies the text.
   */
  containsSensitiveData(text: string): boolean {
    if (!text) return false;
    for (const rule of this.rules) {
      rule.pattern.lastIndex = 0;
      const hit = rule.pattern.test(text);
      rule.pattern.lastIndex = 0;
      if (hit) return true;
    }
    return false;
  }

  /**
   * Append a rule. String patterns are compiled case-insensitive; RegExp
   * patterns keep their own flags (plus `g`).
   *
   * @throws InvalidPatternError when the pattern does not compile; the
   *   rule list is unchanged in that case.
   */
  addPattern(pattern: string | RegExp, replacement?: string, name?: string): RedactionRule {
    const ruleName = name ?? `custom-${this.customCount + 1}`;
    const compiled =
      typeof pattern === "string" ? compilePattern(pattern, name) : withGlobalFlag(pattern);

    const rule: RedactionRule = {
      name: ruleName,
      pattern: compiled,
      replacement: replacement ?? this.replacementText.replace(/\$/g, "$$$$"),
    };
    this.rules.push(rule);
    this.customCount++;
    return rule;
  }

  /** Remove every rule, defaults included. */
  clearPatterns(): void {
    this.rules = [];
  }

  private apply(text: string, stats: RedactionStats | null): string {
    if (!text) return text;

    let result = text;
    for (const rule of this.rules) {
      rule.pattern.lastIndex = 0;
      if (stats) {
        const hits = result.match(rule.pattern)?.length ?? 0;
        if (hits === 0) continue;
        stats.totalReplacements += hits;
        stats.byRule[rule.name] = (stats.byRule[rule.name] || 0) + hits;
      }
      result = result.replace(rule.pattern, rule.replacement);
    }
    return result;
  }
}
