import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildProgram, compile } from '../../src/ir/builder.js';
import { hashSource, normalizeSource, canonicalJson } from '../../src/ir/hash.js';
import {
  decodeArtifact,
  encodeArtifact,
  readArtifact,
  writeArtifact,
  verifySource,
  FORMAT_VERSION,
} from '../../src/ir/artifact.js';
import { ProgramCache } from '../../src/ir/cache.js';
import { IntegrityError } from '../../src/errors.js';

const SOURCE = [
  '#name "Hello"',
  '#native_import "math"',
  'py.def area(r):',
  'py.    return math.pi * r ** 2',
  'py.message = "Hi"',
  'js.console.log("done")',
].join('\n');

describe('hashSource', () => {
  it('ignores trailing whitespace and line-ending style', () => {
    const unix = 'py.x = 1\npy.y = 2\n';
    const windows = 'py.x = 1   \r\npy.y = 2\t\r\n\r\n';
    expect(hashSource(unix)).toBe(hashSource(windows));
    expect(hashSource('\uFEFF' + unix)).toBe(hashSource(unix));
  });

  it('changes when code changes', () => {
    expect(hashSource('py.x = 1')).not.toBe(hashSource('py.x = 2'));
  });

  it('normalizes to LF-joined trimmed lines', () => {
    expect(normalizeSource('a  \r\nb\r\r\n')).toBe('a\nb');
  });
});

describe('canonicalJson', () => {
  it('sorts object keys at every level', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"y":0,"z":1}]},"b":1}',
    );
  });
});

describe('buildProgram', () => {
  it('builds directives, blocks and stats', () => {
    const { program, stats, diagnostics } = buildProgram(SOURCE);

    expect(diagnostics).toEqual([]);
    expect(program.directives.name).toEqual([{ name: 'name', value: 'Hello', line: 1 }]);
    expect(program.blocks.map((b) => [b.line, b.language])).toEqual([
      [3, 'py'],
      [5, 'py'],
      [6, 'js'],
    ]);
    expect(stats).toEqual({ total_lines: 6, directive_count: 2, code_block_count: 3 });
    expect(program.sourceHash).toBe(hashSource(SOURCE));
  });
});

describe('artifact', () => {
  it('round-trips a program through encode and decode', () => {
    const { program, artifact } = compile(SOURCE, { sourcePath: 'demo/hello.fu' });

    expect(artifact.format_version).toBe(FORMAT_VERSION);
    expect(artifact.metadata.source_file).toBe('hello.fu');
    expect(artifact.program.code_blocks[0]).toMatchObject({ line: 3, type: 'py' });
    expect(decodeArtifact(artifact)).toEqual(program);
  });

  it('round-trips directives named after object builtins through JSON', () => {
    const source = [
      '#constructor "a"',
      '#toString "b"',
      '#hasOwnProperty "c"',
      '#__proto__ "d"',
      'py.x = 1',
    ].join('\n');
    const { program, artifact } = compile(source);
    const restored = decodeArtifact(JSON.parse(JSON.stringify(artifact)));

    expect(restored).toEqual(program);
    expect(Object.keys(restored.directives)).toEqual(['constructor', 'toString', 'hasOwnProperty', '__proto__']);
    expect(restored.directives['__proto__']).toEqual([{ name: '__proto__', value: 'd', line: 4 }]);
  });

  it('re-encodes a decoded program to the same record apart from timestamps', () => {
    const fixed = () => new Date('2026-01-01T00:00:00.000Z');
    const { artifact } = compile(SOURCE, { now: fixed });
    const again = encodeArtifact(decodeArtifact(artifact), {
      metadata: artifact.metadata,
      parseTime: artifact.program.parse_time,
      stats: artifact.program.stats,
    });
    expect(again).toEqual(artifact);
  });

  it('rejects a tampered block', () => {
    const { artifact } = compile(SOURCE);
    const tampered = structuredClone(artifact);
    tampered.program.code_blocks[1].content = 'message = "Bye"';
    tampered.program.code_blocks[1].fragments[0].text = 'message = "Bye"';

    expect(() => decodeArtifact(tampered)).toThrow(IntegrityError);
    expect(() => decodeArtifact(tampered)).toThrow('Artifact block digest mismatch');
  });

  it('rejects content that disagrees with its fragments', () => {
    const { artifact } = compile(SOURCE);
    const tampered = structuredClone(artifact);
    tampered.program.code_blocks[2].content = 'console.log("other")';
    expect(() => decodeArtifact(tampered)).toThrow('Block 2 content does not match its fragments');
  });

  it('rejects malformed records', () => {
    expect(() => decodeArtifact({ format_version: 'LSF-1.0' })).toThrow('Malformed artifact');
  });

  it('verifies the source it was compiled from', () => {
    const { artifact } = compile(SOURCE);
    expect(() => verifySource(artifact, SOURCE.replace(/\n/g, '\r\n') + '  ')).not.toThrow();
    expect(() => verifySource(artifact, SOURCE + '\npy.x = 1')).toThrow(IntegrityError);
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'fusion-ir-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes and reads an artifact', async () => {
      const { artifact } = compile(SOURCE);
      const path = join(dir, 'out', 'hello.lsf');
      await writeArtifact(path, artifact);
      expect(await readArtifact(path)).toEqual(artifact);
    });

    it('reports non-JSON files as integrity errors', async () => {
      const path = join(dir, 'broken.lsf');
      await writeFile(path, '{not json', 'utf-8');
      await expect(readArtifact(path)).rejects.toThrow(IntegrityError);
    });
  });
});

describe('ProgramCache', () => {
  it('keeps the first result for a hash', () => {
    const cache = new ProgramCache();
    const first = buildProgram('py.x = 1');
    const second = buildProgram('py.x = 1  \n');

    expect(cache.insertIfAbsent(first)).toBe(first);
    expect(cache.insertIfAbsent(second)).toBe(first);
    expect(cache.size).toBe(1);
  });

  it('builds only on a miss', () => {
    const cache = new ProgramCache();
    const result = buildProgram('py.y = 2');
    let builds = 0;
    const build = () => {
      builds++;
      return result;
    };
    cache.getOrCompile(result.program.sourceHash, build);
    cache.getOrCompile(result.program.sourceHash, build);
    expect(builds).toBe(1);
  });
});
