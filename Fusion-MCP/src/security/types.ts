/**
 * Security scan types.
 */

import type { SecurityLevel } from '../config.js';
import type { LanguageTag } from '../languages.js';

export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/**
 * Lowest severity that blocks execution at a level; `null` means the level
 * only reports.
 */
export function blockingSeverityFor(level: SecurityLevel): Severity | null {
  switch (level) {
    case 'low': return null;
    case 'medium': return 'high';
    case 'high': return 'medium';
    case 'strict': return 'low';
  }
}

export interface SecurityFinding {
  /** `null` for findings raised by directives rather than a block. */
  blockIndex: number | null;
  line: number;
  language: LanguageTag;
  severity: Severity;
  ruleId: string;
  message: string;
  source: 'pattern' | 'structural';
}

export type SeverityCounts = Record<Severity, number>;

export interface SecurityReport {
  level: SecurityLevel;
  blockingSeverity: Severity | null;
  verdict: 'allowed' | 'blocked';
  findings: SecurityFinding[];
  sourceHash: string;
  counts: SeverityCounts;
}
