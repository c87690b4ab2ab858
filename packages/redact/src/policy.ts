/**
 * Policy files for @appshell/redact.
 *
 * A policy is a JSON document describing which rules an engine starts
 * with. Policies can extend a built-in preset and append custom rules.
 *
 * Policy JSON format:
 * {
 *   "extends": "default",            // "default" | "strict" | "none"
 *   "replacementText": "***",        // optional, default "[REDACTED]"
 *   "rules": [                       // appended after the preset rules
 *     {
 *       "id": "employee-id",
 *       "pattern": "EMP-\\d{5}",
 *       "replacement": "[EMPLOYEE_ID]"
 *     }
 *   ]
 * }
 */

import fs from "node:fs";

import { AppShellError } from "@appshell/core";

import { RedactionEngine } from "./engine.js";
import { PRESET_NAMES, isPresetName, type PresetName } from "./presets.js";

// --- Policy JSON schema types ---

export interface PolicyRuleJson {
  /** Unique identifier for this rule, used in stats and errors. */
  id: string;
  /** Regex source. Always compiled case-insensitive and global. */
  pattern: string;
  /** Replacement string. Defaults to the policy's replacement text. */
  replacement?: string;
}

export interface PolicyJson {
  /** Preset to start from. Default: "default". */
  extends?: PresetName | "none";
  replacementText?: string;
  /** Additional rules, applied after the preset rules. */
  rules?: PolicyRuleJson[];
}

// --- Validation ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(message: string): AppShellError {
  return new AppShellError("INVALID_POLICY", `Invalid policy: ${message}`);
}

function parseRule(value: unknown, index: number): PolicyRuleJson {
  if (!isRecord(value)) throw invalid(`rules[${index}] must be an object`);
  const { id, pattern, replacement } = value;
  if (typeof id !== "string" || !id) throw invalid(`rules[${index}].id must be a non-empty string`);
  if (typeof pattern !== "string") throw invalid(`rules[${index}].pattern must be a string`);
  if (replacement !== undefined && typeof replacement !== "string") {
    throw invalid(`rules[${index}].replacement must be a string`);
  }
  return replacement === undefined ? { id, pattern } : { id, pattern, replacement };
}

/**
 * Check the shape of a parsed policy document.
 * Unknown presets are reported by {@link compilePolicy}, not here.
 */
export function parsePolicy(value: unknown): PolicyJson {
  if (!isRecord(value)) throw invalid("expected a JSON object");

  const policy: PolicyJson = {};
  if (value.extends !== undefined) {
    const name = value.extends;
    if (name === "none") {
      policy.extends = "none";
    } else if (isPresetName(name)) {
      policy.extends = name;
    } else {
      throw new Error(
        `Unknown preset: "${String(name)}". Available: ${[...PRESET_NAMES, "none"].join(", ")}`,
      );
    }
  }
  if (value.replacementText !== undefined) {
    if (typeof value.replacementText !== "string") throw invalid("replacementText must be a string");
    policy.replacementText = value.replacementText;
  }
  if (value.rules !== undefined) {
    if (!Array.isArray(value.rules)) throw invalid("rules must be an array");
    policy.rules = value.rules.map(parseRule);
  }
  return policy;
}

// --- Compilation ---

/**
 * Strip // comments and trailing commas from JSON-with-comments.
 * Only whole-line comments are removed, so `//` inside a string value
 * (a URL, say) survives.
 */
export function stripJsonComments(text: string): string {
  let result = text.replace(/^\s*\/\/.*$/gm, "");
  result = result.replace(/,\s*([\]}])/g, "$1");
  return result;
}

/**
 * Build an engine from a policy document.
 *
 * @throws InvalidPatternError naming the rule id when a pattern does not compile.
 */
export function compilePolicy(json: PolicyJson): RedactionEngine {
  const engine = new RedactionEngine({
    preset: json.extends ?? "default",
    replacementText: json.replacementText,
  });
  for (const rule of json.rules ?? []) {
    engine.addPattern(rule.pattern, rule.replacement, rule.id);
  }
  return engine;
}

/**
 * Load a policy from a JSON(C) file. Supports // comments and trailing commas.
 */
export function loadPolicyFile(filePath: string): RedactionEngine {
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(stripJsonComments(raw));
  return compilePolicy(parsePolicy(parsed));
}

/**
 * Engine for a preset with no customizations.
 */
export function fromPreset(preset: PresetName): RedactionEngine {
  return compilePolicy({ extends: preset });
}
