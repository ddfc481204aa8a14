#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  lexOnly: boolean;
  emitTokens: boolean;
  emitAst: boolean;
};

function usage(): string {
  return [
    'lolmd [options] <entry.lol>',
    '',
    'Options:',
    '  -o, --output <file>   HTML output path (must end in .html)',
    '      --lex-only        Tokenize only; print "valid" on success',
    '      --tokens          Also write <base>.tokens.txt',
    '      --ast             Also write <base>.ast.json',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - Sidecar artifacts are written next to the HTML output using its base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  for (let dir = dirname(fileURLToPath(import.meta.url)); ; dir = dirname(dir)) {
    const candidate = resolve(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = require(candidate);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
        return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
      }
      return '0.0.0';
    }
    if (dirname(dir) === dir) return '0.0.0';
  }
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let lexOnly = false;
  let emitTokens = false;
  let emitAst = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) break;
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const v = a.startsWith('--output=') ? a.slice('--output='.length) : argv[++i];
      if (!v) fail(`${a.startsWith('--output=') ? '--output' : a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '--lex-only') {
      lexOnly = true;
      continue;
    }
    if (a === '--tokens') {
      emitTokens = true;
      continue;
    }
    if (a === '--ast') {
      emitAst = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined) {
      fail(`Expected exactly one <entry.lol> argument`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.lol> argument`);
  }

  if (outputPath && extname(outputPath).toLowerCase() !== '.html') {
    fail(`--output must end with ".html"`);
  }
  if (lexOnly && emitAst) fail(`--ast cannot be combined with --lex-only`);

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    lexOnly,
    emitTokens,
    emitAst,
  };
}

function artifactBase(entryFile: string, outputPath?: string): string {
  const primary = resolve(outputPath ?? entryFile);
  const ext = extname(primary);
  return ext.length > 0 ? primary.slice(0, -ext.length) : primary;
}

function artifactPath(base: string, artifact: Artifact): string {
  switch (artifact.kind) {
    case 'html':
      return `${base}.html`;
    case 'tokens':
      return `${base}.tokens.txt`;
    case 'ast':
      return `${base}.ast.json`;
  }
}

function artifactText(artifact: Artifact): string {
  return artifact.kind === 'ast' ? `${JSON.stringify(artifact.json, null, 2)}\n` : artifact.text;
}

/**
 * Write every artifact beside `base` and return the written paths in artifact order.
 */
async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<string[]> {
  await mkdir(dirname(base), { recursive: true });
  const paths = artifacts.map((a) => artifactPath(base, a));
  await Promise.all(artifacts.map((a, i) => writeFile(paths[i] ?? base, artifactText(a), 'utf8')));
  return paths;
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      { lexOnly: parsed.lexOnly, emitTokens: parsed.emitTokens, emitAst: parsed.emitAst },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    const base = artifactBase(parsed.entryFile, parsed.outputPath);
    const written = await writeArtifacts(base, res.artifacts);
    // Lex-only runs have no HTML to point at.
    process.stdout.write(parsed.lexOnly ? 'valid\n' : `${written[0] ?? `${base}.html`}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`lolmd: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  let real = resolved;
  try {
    real = realpathSync.native(resolved);
  } catch {
    // Not on disk (yet); compare the resolved spelling.
  }
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // npm bin shims name the built entry through a symlink.
  return normalizePathForCompare(invokedAs).endsWith('/dist/src/cli.js') && self.endsWith('cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
