import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, describe, expect, it } from 'vitest';

import type { AsmNode } from '../src/frontend/ast.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import { parseFile } from '../src/parseFile.js';
import { label, op, push } from './test-helpers.js';

const fixture = fileURLToPath(new URL('./fixtures/erc20_dispatch.etk', import.meta.url));
const deps = { formats: defaultFormatWriters };

const workDirs: string[] = [];

async function entryWith(text: string): Promise<string> {
  const work = await mkdtemp(join(tmpdir(), 'evm-asm-parse-'));
  workDirs.push(work);
  const entry = join(work, 'main.etk');
  await writeFile(entry, text, 'utf8');
  return entry;
}

afterEach(async () => {
  await Promise.all(workDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe('parseFile', () => {
  it('parses the dispatcher fixture', async () => {
    const res = await parseFile(fixture, {}, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.nodes).toHaveLength(25);
    expect(res.nodes[0]).toEqual<AsmNode>({ kind: 'Import', path: 'lib/math.etk' });
    expect(res.nodes[6]).toEqual(push('push4', '06fdde03'));
    expect(res.nodes[11]).toEqual(push('push4', 'a9059cbb'));
    expect(res.nodes[13]).toEqual<AsmNode>({
      kind: 'Instruction',
      op: { kind: 'Push', immediate: { kind: 'LabelRef', name: 'transfer_impl' } },
    });
    expect(res.nodes.slice(18, 21)).toEqual<AsmNode[]>([
      label('name_impl'),
      op('jumpdest'),
      { kind: 'Include', path: 'name.etk' },
    ]);
    expect(res.nodes[24]).toEqual(op('stop'));
  });

  it('emits only the JSON artifact by default', async () => {
    const res = await parseFile(await entryWith('stop\n'), {}, deps);
    expect(res.artifacts.map((a) => a.kind)).toEqual(['json']);
  });

  it('emits only asm when asked for asm alone', async () => {
    const res = await parseFile(await entryWith('stop\n'), { emitAsm: true }, deps);
    expect(res.artifacts).toEqual([{ kind: 'asm', text: 'stop\n' }]);
  });

  it('emits both artifacts when both are requested', async () => {
    const res = await parseFile(await entryWith('stop\n'), { emitJson: true, emitAsm: true }, deps);
    expect(res.artifacts.map((a) => a.kind)).toEqual(['json', 'asm']);
  });

  it('reports a parse error as a located diagnostic', async () => {
    const entry = await entryWith('push1 0x01\nbogus\n');
    const res = await parseFile(entry, {}, deps);
    expect(res.nodes).toEqual([]);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      {
        id: 'EAS100',
        severity: 'error',
        message: 'Unknown instruction "bogus"',
        file: entry,
        line: 2,
        column: 1,
      },
    ]);
  });

  it('reports an unreadable entry file', async () => {
    const work = await mkdtemp(join(tmpdir(), 'evm-asm-parse-'));
    workDirs.push(work);
    const missing = join(work, 'missing.etk');
    const res = await parseFile(missing, {}, deps);
    expect(res.nodes).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({ id: 'EAS001', severity: 'error', file: missing });
    expect(res.diagnostics[0]?.message.startsWith('Failed to read entry file: ')).toBe(true);
  });
});
