/**
 * @appshell/redact - Pattern-based scrubbing of secrets and personal data
 * in log text.
 *
 * An engine holds an ordered list of rules and applies them one after the
 * other. It starts with a built-in preset (default or strict), can load a
 * JSONC policy file, and accepts extra patterns at runtime.
 *
 * ```typescript
 * import { RedactionEngine } from "@appshell/redact";
 *
 * const engine = new RedactionEngine();
 * engine.redact("login password=hunter2"); // "login password=[REDACTED]"
 * ```
 *
 * @packageDocumentation
 */

export type { PresetName, RedactionRule } from "./presets.js";
export { DEFAULT_REPLACEMENT, PRESET_NAMES, presetRules, isPresetName } from "./presets.js";
export type { RedactionStats, RedactionEngineOptions } from "./engine.js";
export { RedactionEngine, compilePattern, createStats } from "./engine.js";
export type { PolicyJson, PolicyRuleJson } from "./policy.js";
export {
  compilePolicy,
  fromPreset,
  loadPolicyFile,
  parsePolicy,
  stripJsonComments,
} from "./policy.js";
