import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SCENE_PARSER_USAGE, runSceneParserCli, toSortedJson, type SceneParserReport } from './cli.js';

const DEMO_SOURCE = 'game Demo\nobject Player {}\nimport "ship.obj"\n';

const DEMO_IR = {
  assets: ['ship.obj'],
  audio: {},
  objects: [{ name: 'Player', position: [0, 0, 0], rotation: [0, 0, 0], scale: 1 }],
  physics: {},
  ui: [],
};

describe('runSceneParserCli', () => {
  let workDir: string;
  let out: string[];
  let err: string[];
  const io = {
    print: (text: string) => out.push(text),
    printError: (text: string) => err.push(text),
  };

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'nex-parse-'));
    out = [];
    err = [];
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('prints the IR of a single file as sorted JSON', async () => {
    const input = join(workDir, 'demo.nex');
    writeFileSync(input, DEMO_SOURCE);

    await expect(runSceneParserCli(['--input', input], io)).resolves.toBe(0);

    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0]!)).toEqual(DEMO_IR);
    expect(out[0]!.startsWith('{\n  "assets": [\n    "ship.obj"\n  ],\n  "audio": {},')).toBe(true);
    expect(err).toEqual([]);
  });

  it('writes a single file to --output', async () => {
    const input = join(workDir, 'demo.nex');
    const output = join(workDir, 'out', 'demo.json');
    writeFileSync(input, DEMO_SOURCE);

    await expect(runSceneParserCli(['-i', input, '-o', output], io)).resolves.toBe(0);

    expect(readFileSync(output, 'utf-8')).toBe(toSortedJson(DEMO_IR) + '\n');
    expect(out).toEqual([`${input} → ${output} (1 object(s), 1 asset(s))`]);
  });

  it('converts a directory tree and reports failures', async () => {
    const sceneDir = join(workDir, 'scenes');
    const outputDir = join(workDir, 'json');
    const reportPath = join(workDir, 'report.json');
    mkdirSync(join(sceneDir, 'levels'), { recursive: true });
    writeFileSync(join(sceneDir, 'demo.nex'), DEMO_SOURCE);
    writeFileSync(join(sceneDir, 'levels', 'two.nex'), 'game Two\nobject A {}\nobject B {}\n');
    writeFileSync(join(sceneDir, 'levels', 'broken.nex'), 'object A {}\n');
    writeFileSync(join(sceneDir, 'notes.txt'), 'not a scene');

    const code = await runSceneParserCli(['--dir', sceneDir, '--output', outputDir, '--report', reportPath], io);

    expect(code).toBe(1);
    expect(JSON.parse(readFileSync(join(outputDir, 'demo.json'), 'utf-8'))).toEqual(DEMO_IR);
    const two = JSON.parse(readFileSync(join(outputDir, 'levels', 'two.json'), 'utf-8')) as { objects: { name: string }[] };
    expect(two.objects.map((object) => object.name)).toEqual(['A', 'B']);

    const brokenPath = join(sceneDir, 'levels', 'broken.nex');
    expect(err).toEqual([`[ERROR] ${brokenPath}: Nex code must start with 'game'`]);

    const report = JSON.parse(readFileSync(reportPath, 'utf-8')) as SceneParserReport;
    expect(report.mode).toBe('directory');
    expect(report.files.map((file) => [file.objects, file.assets])).toEqual([[1, 1], [2, 0]]);
    expect(report.failures).toEqual([
      { inputPath: brokenPath, message: `${brokenPath}: Nex code must start with 'game'` },
    ]);
    expect(out).toContain('  Failures: 1');
  });

  it('prints statistics on request', async () => {
    const input = join(workDir, 'demo.nex');
    const output = join(workDir, 'demo.json');
    writeFileSync(input, DEMO_SOURCE);

    await runSceneParserCli(['--input', input, '--output', output, '--stats'], io);

    expect(out.slice(1)).toEqual([
      'Summary:',
      '  Files:    1',
      '  Objects:  1',
      '  Assets:   1',
      '  Failures: 0',
    ]);
  });

  it('exits 1 when the input cannot be read', async () => {
    const input = join(workDir, 'missing.nex');

    await expect(runSceneParserCli(['--input', input], io)).resolves.toBe(1);
    expect(err[0]).toMatch(/^\[ERROR\] Failed to load source ".*missing\.nex": /);
  });

  it('validates arguments', async () => {
    await expect(runSceneParserCli([], io)).resolves.toBe(1);
    expect(err).toEqual(['Error: --input or --dir is required\n', SCENE_PARSER_USAGE]);

    err = [];
    await expect(runSceneParserCli(['--dir', workDir], io)).resolves.toBe(1);
    expect(err[0]).toBe('Error: --output is required with --dir\n');

    await expect(runSceneParserCli(['--help'], io)).resolves.toBe(0);
    expect(out).toEqual([SCENE_PARSER_USAGE]);
  });
});
