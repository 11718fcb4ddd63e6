import { describe, it, expect } from 'vitest';
import { buildProgram } from '../../src/ir/builder.js';
import { parseModule } from '../../src/python/parser.js';
import { compileRules, defaultRules } from '../../src/security/rules.js';
import { blockingFindings, scan } from '../../src/security/scanner.js';
import { AliasTable, MAX_ALIAS_HOPS, StructuralScanner } from '../../src/security/structural.js';
import * as securityTypes from '../../src/security/types.js';
import { blockingSeverityFor } from '../../src/security/types.js';
import { ConfigurationError } from '@fusion/shared/Types/errors.js';

function structuralHits(code: string) {
  return new StructuralScanner(defaultRules()).scanModule(parseModule(code));
}

describe('blockingSeverityFor', () => {
  it('maps each level to the lowest blocking severity', () => {
    expect(blockingSeverityFor('low')).toBeNull();
    expect(blockingSeverityFor('medium')).toBe('high');
    expect(blockingSeverityFor('high')).toBe('medium');
    expect(blockingSeverityFor('strict')).toBe('low');
  });
});

describe('security types', () => {
  it('exports only the severity helpers the scanner uses', () => {
    expect(Object.keys(securityTypes).sort()).toEqual(['SEVERITIES', 'blockingSeverityFor', 'severityRank']);
  });
});

describe('scan', () => {
  const { program } = buildProgram('py.import os\npy.os.system("ls")');

  it('blocks a process-spawning call at medium', () => {
    const report = scan(program, 'medium');

    expect(report.verdict).toBe('blocked');
    expect(report.blockingSeverity).toBe('high');
    expect(report.findings).toEqual([
      {
        blockIndex: 0,
        line: 1,
        language: 'py',
        severity: 'high',
        ruleId: 'py.import.os',
        message: "import of 'os' (operating-system interface)",
        source: 'structural',
      },
      {
        blockIndex: 1,
        line: 2,
        language: 'py',
        severity: 'critical',
        ruleId: 'py.process-spawn',
        message: 'process-spawning call',
        source: 'pattern',
      },
      {
        blockIndex: 1,
        line: 2,
        language: 'py',
        severity: 'critical',
        ruleId: 'py.capability.os',
        message: "call to 'os.system' (operating-system interface)",
        source: 'structural',
      },
    ]);
    expect(report.counts).toEqual({ low: 0, medium: 0, high: 1, critical: 2 });
    expect(report.sourceHash).toBe(program.sourceHash);
  });

  it('only reports at low', () => {
    const report = scan(program, 'low');
    expect(report.verdict).toBe('allowed');
    expect(report.blockingSeverity).toBeNull();
    expect(report.findings).toHaveLength(3);
    expect(blockingFindings(report)).toEqual([]);
  });

  it('is deterministic', () => {
    expect(scan(program, 'high')).toEqual(scan(program, 'high'));
  });

  it('allows a clean program at strict', () => {
    const clean = buildProgram('py.x = [1, 2, 3]\njs.console.log(x.length)').program;
    const report = scan(clean, 'strict');
    expect(report.findings).toEqual([]);
    expect(report.verdict).toBe('allowed');
  });

  it('maps pattern matches inside a multi-line block to their source line', () => {
    const source = [
      '#name "multi"',
      'js.function boot() {',
      'js.  const cp = require("child_process");',
      'js.}',
    ].join('\n');
    const report = scan(buildProgram(source).program, 'medium');
    expect(report.findings).toEqual([
      expect.objectContaining({ blockIndex: 0, line: 3, ruleId: 'js.child-process', severity: 'critical' }),
    ]);
  });

  it('reports native_import directives before any block', () => {
    const { program: imported } = buildProgram('#native_import "socket"\npy.x = 1');
    const report = scan(imported, 'low');
    expect(report.findings[0]).toMatchObject({ blockIndex: null, line: 1, ruleId: 'py.import.socket' });
  });

  it('turns a native block that does not parse into a medium finding', () => {
    const report = scan(buildProgram('py.x = = 1').program, 'high');
    expect(report.findings).toHaveLength(1);
    expect(report.findings[0]).toMatchObject({ ruleId: 'py.syntax-error', severity: 'medium', line: 1 });
    expect(report.findings[0].message).toMatch(/^block does not parse: /);
    expect(report.verdict).toBe('blocked');
  });

  it('gates open() by its mode', () => {
    const write = scan(buildProgram('py.f = open("out.txt", "w")').program, 'medium');
    expect(write.findings.map((f) => f.ruleId)).toEqual(['py.file-write']);
    expect(write.verdict).toBe('blocked');

    const read = scan(buildProgram('py.f = open("in.txt", "r")').program, 'medium');
    expect(read.findings).toEqual([]);
  });
});

describe('StructuralScanner', () => {
  it('follows aliases up to the hop bound', () => {
    const hits = structuralHits([
      'import os as o',
      'a = o',
      'b = a',
      'c = b',
      'd = c',
      'c.system("x")',
      'd.system("x")',
    ].join('\n'));

    expect(MAX_ALIAS_HOPS).toBe(3);
    expect(hits).toEqual([
      { line: 1, severity: 'high', ruleId: 'py.import.os', message: "import of 'os' (operating-system interface)" },
      { line: 6, severity: 'critical', ruleId: 'py.capability.os', message: "call to 'os.system' (operating-system interface)" },
    ]);
  });

  it('resolves names bound by from-imports', () => {
    const hits = structuralHits('from os import system as run_cmd\nrun_cmd("x")');
    expect(hits.map((h) => [h.line, h.ruleId, h.message])).toEqual([
      [1, 'py.import.os', "import from 'os' (operating-system interface)"],
      [2, 'py.capability.os', "call to 'os.system' (operating-system interface)"],
    ]);
  });

  it('resolves getattr with a constant name', () => {
    const hits = structuralHits('import subprocess\ngetattr(subprocess, "run")("ls")');
    expect(hits.slice(1).map((h) => h.message)).toEqual([
      "call to 'subprocess.run' (process spawning)",
      "dynamic access to 'subprocess.run' (process spawning)",
    ]);
  });

  it('flags getattr with a computed name', () => {
    const hits = structuralHits('import os\nname = "sys" + "tem"\ngetattr(os, name)');
    expect(hits[1]).toEqual({
      line: 3,
      severity: 'high',
      ruleId: 'py.dynamic-attribute',
      message: "dynamic attribute access on 'os'",
    });
  });

  it('flags dangerous builtins unless the name was rebound', () => {
    expect(structuralHits('eval("1")')).toEqual([
      { line: 1, severity: 'high', ruleId: 'py.builtin.eval', message: 'dynamic code evaluation: eval()' },
    ]);
    expect(structuralHits('import os\neval = os.getcwd\neval()').map((h) => h.ruleId)).toEqual([
      'py.import.os',
      'py.capability.os',
    ]);
  });

  it('forgets an alias once it is rebound to something else', () => {
    const hits = structuralHits('import os\nos = 1\nos.system("x")');
    expect(hits.map((h) => h.ruleId)).toEqual(['py.import.os']);
  });

  it('walks class bodies and set displays', () => {
    const hits = structuralHits(['class Runner:', '    def go(self):', '        eval("1")', 'items = {eval("2")}'].join('\n'));
    expect(hits.map((h) => [h.line, h.ruleId])).toEqual([
      [3, 'py.builtin.eval'],
      [4, 'py.builtin.eval'],
    ]);
  });

  it('carries the alias table across scans', () => {
    const aliases = new AliasTable();
    const scanner = new StructuralScanner(defaultRules(), aliases);
    scanner.scanModule(parseModule('import shutil as sh'));
    expect(aliases.get('sh')).toEqual({ module: 'shutil', attrs: [], hops: 0 });
    expect(scanner.scanModule(parseModule('sh.rmtree("/tmp/x")'))).toHaveLength(1);
  });
});

describe('compileRules', () => {
  it('rejects rule files that do not match the schema', () => {
    expect(() => compileRules({ version: 1, patterns: { py: [{ id: 'x' }] }, modules: {}, builtins: {} })).toThrow(
      ConfigurationError,
    );
  });

  it('rejects patterns that are not valid regular expressions', () => {
    const raw = {
      version: 1,
      patterns: { py: [{ id: 'bad', pattern: '(', severity: 'low', message: 'bad' }] },
      modules: {},
      builtins: {},
    };
    expect(() => compileRules(raw)).toThrow(ConfigurationError);
  });
});
