/**
 * How each subprocess language turns a block into a program and runs it.
 *
 * A block that is already a whole program (it has a `main`, a class or an
 * opening `<?php`) keeps its shape and only gains the marshalled
 * declarations; anything else is wrapped in the language's entry point.
 */

import type { ToolchainCommands } from '../config.js';
import type { LanguageTag } from '../languages.js';

export type SubprocessLanguage = Exclude<LanguageTag, 'py'>;
export type ToolName = keyof ToolchainCommands;

export interface SourceFile {
  name: string;
  content: string;
}

export interface ToolStep {
  phase: 'compile' | 'run';
  command: string;
  args: string[];
}

export interface Toolchain {
  language: SubprocessLanguage;
  /** Tools that must all answer the version check. */
  tools: readonly ToolName[];
  versionArgs: readonly string[];
  render(code: string, declarations: readonly string[]): SourceFile;
  steps(file: SourceFile, commands: ToolchainCommands): ToolStep[];
}

const CPP_HEADERS = ['<cstdio>', '<iostream>', '<string>', '<vector>', '<map>', '<cmath>', '<cstdlib>'];

function lines(...parts: ReadonlyArray<string | readonly string[]>): string {
  return parts.flat().join('\n') + '\n';
}

/** Insert `text` right after the first `{` at or past `from`. */
function insertAfterBrace(code: string, from: number, text: readonly string[]): string {
  const brace = code.indexOf('{', from);
  if (brace === -1 || text.length === 0) return code;
  return `${code.slice(0, brace + 1)}\n${text.join('\n')}\n${code.slice(brace + 1)}`;
}

const cpp: Toolchain = {
  language: 'cpp',
  tools: ['gxx'],
  versionArgs: ['--version'],
  render(code, declarations) {
    const headers = CPP_HEADERS.map((h) => `#include ${h}`);
    if (/\bint\s+main\s*\(/.test(code)) {
      return { name: 'main.cpp', content: lines(headers, declarations, code) };
    }
    return {
      name: 'main.cpp',
      content: lines(headers, 'using namespace std;', declarations, 'int main() {', code, 'return 0;', '}'),
    };
  },
  steps(file, commands) {
    return [
      { phase: 'compile', command: commands.gxx, args: ['-std=c++17', '-O2', '-o', 'main', file.name] },
      { phase: 'run', command: './main', args: [] },
    ];
  },
};

const js: Toolchain = {
  language: 'js',
  tools: ['node'],
  versionArgs: ['--version'],
  render(code, declarations) {
    // A block scope lets the code redeclare a marshalled name.
    const content = declarations.length > 0 ? lines(declarations, '{', code, '}') : lines(code);
    return { name: 'main.js', content };
  },
  steps(file, commands) {
    return [{ phase: 'run', command: commands.node, args: [file.name] }];
  },
};

const CLASS_DECLARATION = /\b(?:public\s+)?(?:final\s+)?class\s+([A-Za-z_$][\w$]*)/;

const java: Toolchain = {
  language: 'java',
  tools: ['javac', 'java'],
  versionArgs: ['-version'],
  render(code, declarations) {
    const match = CLASS_DECLARATION.exec(code);
    if (match) {
      const fields = insertAfterBrace(code, match.index + match[0].length, declarations);
      return { name: `${match[1]}.java`, content: lines(fields) };
    }
    return {
      name: 'Main.java',
      content: lines(
        'public class Main {',
        declarations,
        'public static void main(String[] args) throws Exception {',
        code,
        '}',
        '}',
      ),
    };
  },
  steps(file, commands) {
    const className = file.name.replace(/\.java$/, '');
    return [
      { phase: 'compile', command: commands.javac, args: [file.name] },
      { phase: 'run', command: commands.java, args: ['-cp', '.', className] },
    ];
  },
};

const PHP_OPEN = /^\s*<\?php\b/;

const php: Toolchain = {
  language: 'php',
  tools: ['php'],
  versionArgs: ['--version'],
  render(code, declarations) {
    const match = PHP_OPEN.exec(code);
    if (match) {
      const rest = code.slice(match[0].length);
      return { name: 'main.php', content: lines('<?php', declarations, rest) };
    }
    return { name: 'main.php', content: lines('<?php', declarations, code) };
  },
  steps(file, commands) {
    return [{ phase: 'run', command: commands.php, args: [file.name] }];
  },
};

const RUST_MAIN = /\bfn\s+main\s*\(\s*\)/;

const rust: Toolchain = {
  language: 'rust',
  tools: ['rustc'],
  versionArgs: ['--version'],
  render(code, declarations) {
    const match = RUST_MAIN.exec(code);
    if (match) {
      return { name: 'main.rs', content: lines(insertAfterBrace(code, match.index, declarations)) };
    }
    return { name: 'main.rs', content: lines('#![allow(unused)]', 'fn main() {', declarations, code, '}') };
  },
  steps(file, commands) {
    return [
      { phase: 'compile', command: commands.rustc, args: [file.name, '-o', 'main'] },
      { phase: 'run', command: './main', args: [] },
    ];
  },
};

export const TOOLCHAINS: Record<SubprocessLanguage, Toolchain> = { cpp, js, java, php, rust };
