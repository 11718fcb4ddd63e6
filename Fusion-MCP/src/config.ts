/**
 * Fusion MCP Configuration
 *
 * Zod-validated environment config, forbidden path checking,
 * and environment stripping for subprocess toolchains.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@fusion/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

export const SECURITY_LEVELS = ['low', 'medium', 'high', 'strict'] as const;
export type SecurityLevel = (typeof SECURITY_LEVELS)[number];

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

const configSchema = z.object({
  sandboxDir: z.string().default('~/.fusion/sandbox'),
  logDir: z.string().default('~/.fusion/logs'),
  defaultTimeoutMs: z.coerce.number().int().positive().default(20_000),
  maxTimeoutMs: z.coerce.number().int().positive().default(300_000),
  compileTimeoutMs: z.coerce.number().int().positive().default(60_000),
  maxOutputChars: z.coerce.number().int().positive().default(10_000),
  truncationHead: z.coerce.number().int().positive().default(4_000),
  truncationTail: z.coerce.number().int().positive().default(4_000),
  securityLevel: z.enum(SECURITY_LEVELS).default('medium'),
  strictToolchains: booleanFlag.default(false),
  maxProcesses: z.coerce.number().int().positive().default(64),
  maxFileSizeBytes: z.coerce.number().int().positive().default(52_428_800), // 50MB
  toolchains: z.object({
    gxx: z.string().min(1).default('g++'),
    node: z.string().min(1).default('node'),
    javac: z.string().min(1).default('javac'),
    java: z.string().min(1).default('java'),
    php: z.string().min(1).default('php'),
    rustc: z.string().min(1).default('rustc'),
  }).default({}),
});

export type FusionConfig = z.infer<typeof configSchema>;
export type ToolchainCommands = FusionConfig['toolchains'];

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

function definedOnly(raw: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(raw).filter(([, v]) => v !== undefined));
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: FusionConfig | null = null;

export function getConfig(): FusionConfig {
  if (cached) return cached;

  const env = process.env;
  const raw = definedOnly({
    sandboxDir: env.FUSION_SANDBOX_DIR,
    logDir: env.FUSION_LOG_DIR,
    defaultTimeoutMs: env.FUSION_DEFAULT_TIMEOUT_MS,
    maxTimeoutMs: env.FUSION_MAX_TIMEOUT_MS,
    compileTimeoutMs: env.FUSION_COMPILE_TIMEOUT_MS,
    maxOutputChars: env.FUSION_MAX_OUTPUT_CHARS,
    truncationHead: env.FUSION_TRUNCATION_HEAD,
    truncationTail: env.FUSION_TRUNCATION_TAIL,
    securityLevel: env.FUSION_SECURITY_LEVEL,
    strictToolchains: env.FUSION_STRICT_TOOLCHAINS,
    maxProcesses: env.FUSION_MAX_PROCESSES,
    maxFileSizeBytes: env.FUSION_MAX_FILE_SIZE_BYTES,
    // Strip undefined keys so Zod defaults kick in
    toolchains: definedOnly({
      gxx: env.FUSION_GXX,
      node: env.FUSION_NODE,
      javac: env.FUSION_JAVAC,
      java: env.FUSION_JAVA,
      php: env.FUSION_PHP,
      rustc: env.FUSION_RUSTC,
    }),
  });

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Fusion config error: ${result.error.message}`, {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  // Expand ~ in paths
  const config = result.data;
  config.sandboxDir = resolve(expandHome(config.sandboxDir));
  config.logDir = resolve(expandHome(config.logDir));

  cached = config;
  return config;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Forbidden Paths ──────────────────────────────────────────────────────────

const FORBIDDEN_PREFIXES = [
  '~/.ssh',
  '~/.gnupg',
  '~/.aws',
  '~/.config',
  '/etc',
  '/var',
].map((p) => resolve(expandHome(p)));

/**
 * Check if an absolute path falls under a forbidden prefix.
 */
export function isForbiddenPath(absolutePath: string): boolean {
  const normalized = resolve(absolutePath);
  return FORBIDDEN_PREFIXES.some(
    (prefix) => normalized === prefix || normalized.startsWith(prefix + '/'),
  );
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'HOME', 'LANG', 'TERM', 'TMPDIR', 'USER', 'JAVA_HOME', 'RUSTUP_HOME', 'CARGO_HOME'];

/**
 * Minimal environment for toolchain processes: only allowlisted variables
 * pass through, never API keys or tokens.
 */
export function getStrippedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of ENV_ALLOWLIST) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}
