#!/usr/bin/env node
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { parseFile } from './parseFile.js';

type CliExit = { code: number };

type OutputFormat = 'json' | 'asm';

type CliOptions = {
  entryFile: string;
  format: OutputFormat;
  outputPath?: string;
};

function usage(): string {
  return [
    'evm-asm-parse [options] <entry.etk>',
    '',
    'Options:',
    '  -f, --format <fmt>    Output format: json|asm (default: json)',
    '  -o, --output <file>   Write the output to <file> instead of stdout',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <entry.etk> must be the last argument.',
    '  - Included and imported files are not read; they appear as directive nodes.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function packageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from sources, dist/src/cli.js when built.
  const candidates = [
    resolve(here, '..', 'package.json'),
    resolve(here, '..', '..', 'package.json'),
  ];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = readFileSync(candidate, 'utf8');
    const pkg = JSON.parse(raw) as { name?: unknown; version?: unknown };
    if (pkg.name === 'evm-asm-parser') return String(pkg.version ?? '0.0.0');
  }
  return '0.0.0';
}

function parseFormat(v: string | undefined, flag: string): OutputFormat {
  if (!v) fail(`${flag} expects a value`);
  if (v !== 'json' && v !== 'asm') fail(`Unsupported --format "${v}" (expected json|asm)`);
  return v;
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let format: OutputFormat = 'json';
  let outputPath: string | undefined;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a.startsWith('--format=')) {
      format = parseFormat(a.slice('--format='.length), '--format');
      continue;
    }
    if (a === '-f' || a === '--format') {
      format = parseFormat(argv[++i], a);
      continue;
    }
    if (a.startsWith('--output=')) {
      const v = a.slice('--output='.length);
      if (!v) fail(`--output expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '-o' || a === '--output') {
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <entry.etk> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.etk> argument (and it must be last)`);
  }

  return { entryFile, format, ...(outputPath ? { outputPath } : {}) };
}

function renderArtifact(artifact: Artifact): string {
  return artifact.kind === 'json' ? JSON.stringify(artifact.json, null, 2) + '\n' : artifact.text;
}

function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}\n`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await parseFile(
      parsed.entryFile,
      { emitJson: parsed.format === 'json', emitAsm: parsed.format === 'asm' },
      { formats: defaultFormatWriters },
    );

    for (const d of res.diagnostics) {
      process.stderr.write(formatDiagnostic(d));
    }
    if (res.diagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    const artifact = res.artifacts.find((a) => a.kind === parsed.format);
    if (!artifact) fail(`No ${parsed.format} output was produced`);
    const text = renderArtifact(artifact);

    if (parsed.outputPath) {
      const outPath = resolve(parsed.outputPath);
      await mkdir(dirname(outPath), { recursive: true });
      await writeFile(outPath, text, 'utf8');
      process.stdout.write(`${outPath}\n`);
    } else {
      process.stdout.write(text);
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`evm-asm-parse: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = existsSync(resolved) ? realpathSync.native(resolved) : resolved;
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(self);
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
