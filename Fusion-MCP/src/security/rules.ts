/**
 * Denylist rule set: textual patterns per language, plus the module and
 * builtin catalog used by the structural scan of native blocks.
 *
 * Rules are data (`rules/denylist.json`), validated with zod when loaded.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '@fusion/shared/Types/errors.js';
import { LANGUAGE_TAGS, type LanguageTag } from '../languages.js';
import { SEVERITIES, type Severity } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_RULES_PATH = join(__dirname, '../../rules/denylist.json');

const severitySchema = z.enum(SEVERITIES);

const patternRuleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'only i, m, s and u flags are allowed').default(''),
  severity: severitySchema,
  message: z.string().min(1),
});

const moduleRuleSchema = z.object({
  import: severitySchema,
  default: severitySchema,
  message: z.string().min(1),
  capabilities: z.record(severitySchema).default({}),
});

const builtinRuleSchema = z.object({
  severity: severitySchema,
  message: z.string().min(1),
});

export const ruleFileSchema = z.object({
  version: z.literal(1),
  patterns: z.record(z.enum(LANGUAGE_TAGS), z.array(patternRuleSchema)),
  modules: z.record(moduleRuleSchema),
  builtins: z.record(builtinRuleSchema),
});

export type RuleFile = z.infer<typeof ruleFileSchema>;
export type ModuleRule = z.infer<typeof moduleRuleSchema>;
export type BuiltinRule = z.infer<typeof builtinRuleSchema>;

export interface PatternRule {
  id: string;
  regex: RegExp;
  severity: Severity;
  message: string;
}

export interface RuleSet {
  patterns: Record<LanguageTag, PatternRule[]>;
  modules: ReadonlyMap<string, ModuleRule>;
  builtins: ReadonlyMap<string, BuiltinRule>;
}

/** Validate raw rule data and compile its patterns. */
export function compileRules(raw: unknown): RuleSet {
  const parsed = ruleFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid security rules: ${parsed.error.message}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const patterns: Record<LanguageTag, PatternRule[]> = {
    py: [], cpp: [], js: [], java: [], php: [], rust: [],
  };
  for (const tag of LANGUAGE_TAGS) {
    for (const rule of parsed.data.patterns[tag] ?? []) {
      let regex: RegExp;
      try {
        regex = new RegExp(rule.pattern, rule.flags);
      } catch (err) {
        throw new ConfigurationError(`Invalid pattern in rule '${rule.id}'`, {
          pattern: rule.pattern,
          reason: err instanceof Error ? err.message : String(err),
        });
      }
      patterns[tag].push({ id: rule.id, regex, severity: rule.severity, message: rule.message });
    }
  }

  return {
    patterns,
    modules: new Map(Object.entries(parsed.data.modules)),
    builtins: new Map(Object.entries(parsed.data.builtins)),
  };
}

export function loadRules(path: string): RuleSet {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read security rules at ${path}`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Security rules at ${path} are not valid JSON`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return compileRules(raw);
}

let defaults: RuleSet | null = null;

/** The bundled denylist, loaded once. */
export function defaultRules(): RuleSet {
  defaults ??= loadRules(DEFAULT_RULES_PATH);
  return defaults;
}
