/**
 * Security scanner: pattern rules for every block, plus a syntax-tree scan
 * of native blocks. Pure: the same program, rules and level always give the
 * same report, and nothing is executed.
 */

import { Logger } from '@fusion/shared/Utils/logger.js';
import type { SecurityLevel } from '../config.js';
import { NATIVE_TAG } from '../languages.js';
import { parseModule } from '../python/parser.js';
import { PySyntaxError } from '../python/errors.js';
import { sourceLineOf } from '../source/assembler.js';
import type { CodeBlock, Program } from '../source/types.js';
import { defaultRules, type RuleSet } from './rules.js';
import { StructuralScanner, type StructuralHit } from './structural.js';
import {
  blockingSeverityFor,
  severityRank,
  type SecurityFinding,
  type SecurityReport,
  type SeverityCounts,
} from './types.js';

const logger = new Logger('fusion:security');

function lineAt(content: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (content.charCodeAt(i) === 10) line++;
  }
  return line;
}

function patternFindings(block: CodeBlock, blockIndex: number, rules: RuleSet): SecurityFinding[] {
  const findings: SecurityFinding[] = [];
  for (const rule of rules.patterns[block.language]) {
    const match = rule.regex.exec(block.content);
    if (!match) continue;
    findings.push({
      blockIndex,
      line: sourceLineOf(block, lineAt(block.content, match.index)),
      language: block.language,
      severity: rule.severity,
      ruleId: rule.id,
      message: rule.message,
      source: 'pattern',
    });
  }
  return findings;
}

function structuralFindings(block: CodeBlock, blockIndex: number, structural: StructuralScanner): SecurityFinding[] {
  let hits: StructuralHit[];
  try {
    hits = structural.scanModule(parseModule(block.content));
  } catch (err) {
    if (!(err instanceof PySyntaxError)) throw err;
    return [{
      blockIndex,
      line: sourceLineOf(block, err.line),
      language: block.language,
      severity: 'medium',
      ruleId: 'py.syntax-error',
      message: `block does not parse: ${err.detail}`,
      source: 'structural',
    }];
  }
  return hits.map((hit) => ({
    blockIndex,
    line: sourceLineOf(block, hit.line),
    language: block.language,
    severity: hit.severity,
    ruleId: hit.ruleId,
    message: hit.message,
    source: 'structural' as const,
  }));
}

export function scan(program: Program, level: SecurityLevel, rules: RuleSet = defaultRules()): SecurityReport {
  const structural = new StructuralScanner(rules);
  const findings: SecurityFinding[] = [];

  for (const directive of program.directives.native_import ?? []) {
    const hit = structural.importDirective(directive.value, directive.line);
    if (hit) {
      findings.push({ blockIndex: null, language: NATIVE_TAG, ...hit, source: 'structural' });
    }
  }

  program.blocks.forEach((block, index) => {
    findings.push(...patternFindings(block, index, rules));
    if (block.language === NATIVE_TAG) {
      findings.push(...structuralFindings(block, index, structural));
    }
  });

  const counts: SeverityCounts = { low: 0, medium: 0, high: 0, critical: 0 };
  for (const finding of findings) counts[finding.severity]++;

  const blockingSeverity = blockingSeverityFor(level);
  const blocked =
    blockingSeverity !== null &&
    findings.some((f) => severityRank(f.severity) >= severityRank(blockingSeverity));

  const report: SecurityReport = {
    level,
    blockingSeverity,
    verdict: blocked ? 'blocked' : 'allowed',
    findings,
    sourceHash: program.sourceHash,
    counts,
  };
  logger.debug('Scan complete', { level, verdict: report.verdict, counts });
  return report;
}

/** Findings that block execution under the report's level. */
export function blockingFindings(report: SecurityReport): SecurityFinding[] {
  const threshold = report.blockingSeverity;
  if (threshold === null) return [];
  return report.findings.filter((f) => severityRank(f.severity) >= severityRank(threshold));
}
