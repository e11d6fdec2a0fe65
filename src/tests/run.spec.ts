import { afterEach, describe, it, expect } from 'vitest';
import { readFile, readdir, stat } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { compileManifest, loadManifest } from '../orchestrator/compiler.js';
import { planLines, runManifest } from '../orchestrator/run.js';
import { DEFAULT_MANIFEST } from '../config.js';
import { FakeDrive, FakeRunner, fakeFetch, makeContext, removeTempDirs, tempDir } from './helpers.js';

afterEach(removeTempDirs);
import type { CommandRunner } from '../types/tools.js';

const YOLO = 'https://pjreddie.com/media/files/yolov3.weights';

describe('runManifest', () => {
  it('provisions the full research workspace', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const root = await tempDir();
    const runner = new FakeRunner();
    const drive = new FakeDrive();
    const ff = fakeFetch();

    const result = await runManifest({ manifest, ctx: makeContext(root, { runner, drive, fetch: ff.fetch }) });

    expect(result.ok).toBe(true);
    expect(result.outcomes.map(o => o.ordinal)).toEqual(manifest.steps.map(s => s.ordinal));
    expect(result.outcomes.every(o => o.status === 'done')).toBe(true);
    expect((await stat(path.join(root, 'data', 'yolov3.weights'))).size).toBeGreaterThan(0);
    expect((await readdir(path.join(root, 'drn'))).length).toBeGreaterThan(0);
    expect(existsSync(path.join(root, 'conv_reg_vot', 'vgg_model', 'VGG_16_layers_py3.npz'))).toBe(true);
    expect(existsSync(path.join(root, 'data', 'VGG_16_layers_py3.npz'))).toBe(false);
    expect(existsSync(path.join(root, 'data', 'faster_rcnn_resnet101_coco_2018_01_28'))).toBe(true);
    expect(existsSync(path.join(root, 'CARLA_0.8.4', 'CARLA_0.8.4.tar.gz'))).toBe(true);
    expect(ff.urls).toHaveLength(6);
    expect(drive.calls.map(c => path.relative(root, c.outputPath))).toEqual([
      'data/VGG_16_layers_py3.npz.part',
      'data/SiamRPNVOT.model.part',
      'data/SiamRPNBIG.model.part',
      'data/SiamRPNOTB.model.part',
      'CARLA_0.8.4/CARLA_0.8.4.tar.gz.part'
    ]);
    expect(runner.calls.map(c => [c.cmd, ...c.args.slice(0, 2)].join(' '))).toEqual([
      `tar -xf ${path.join(root, 'data', 'faster_rcnn_resnet101_coco_2018_01_28.tar.gz')}`,
      `tar -xf ${path.join(root, 'data', 'ssd_mobilenet_v1_coco_2018_01_28.tar.gz')}`,
      `tar -xf ${path.join(root, 'data', 'ssd_resnet50_v1_fpn_shared_box_predictor_640x640_coco14_sync_2018_07_03.tar.gz')}`,
      'pip install --user',
      'pip install --user',
      'sudo apt-get -y',
      'git clone https://github.com/ICGog/DaSiamRPN.git',
      'pip install --user',
      'git clone https://github.com/ICGog/drn.git',
      'git clone https://github.com/ICGog/CenterNet.git',
      `tar -xf ${path.join(root, 'CARLA_0.8.4', 'CARLA_0.8.4.tar.gz')}`
    ]);
  });

  it('does not fetch or truncate anything on a second run', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const root = await tempDir();
    const ff = fakeFetch();
    const drive = new FakeDrive();
    const ctx = makeContext(root, { runner: new FakeRunner(), drive, fetch: ff.fetch });

    expect((await runManifest({ manifest, ctx })).ok).toBe(true);
    const before = await readFile(path.join(root, 'data', 'yolov3.weights'), 'utf-8');

    const again = await runManifest({ manifest, ctx });
    expect(again.ok).toBe(true);
    expect(ff.urls).toHaveLength(6);
    expect(drive.calls).toHaveLength(5);
    expect(await readFile(path.join(root, 'data', 'yolov3.weights'), 'utf-8')).toBe(before);
    const byKind = (kind: string) => again.outcomes.filter(o => o.kind === kind).map(o => o.status);
    expect(byKind('fetch-file')).toEqual(['skipped', 'skipped', 'skipped', 'skipped', 'skipped', 'skipped']);
    expect(byKind('clone-repository')).toEqual(['skipped', 'skipped', 'skipped']);
    expect(byKind('drive-download')).toEqual(['skipped', 'skipped', 'skipped', 'skipped', 'skipped']);
    expect(byKind('move-file')).toEqual(['skipped']);
    expect(await readFile(path.join(root, 'conv_reg_vot', 'vgg_model', 'VGG_16_layers_py3.npz'), 'utf-8'))
      .toBe('drive:0B1sg8Yyw1JCDOUNsYkpQTGdLYVU');
    expect(existsSync(path.join(root, 'data', 'VGG_16_layers_py3.npz'))).toBe(false);
    expect(byKind('make-directory')).toEqual(['skipped', 'skipped', 'skipped']);
    expect(byKind('extract-archive')).toEqual(['done', 'done', 'done', 'done']);
  });

  it('halts at the first failing fetch and creates nothing listed after it', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const root = await tempDir();
    const runner = new FakeRunner();
    const result = await runManifest({ manifest, ctx: makeContext(root, { runner, fetch: fakeFetch({ unreachable: ['pjreddie.com'] }).fetch }) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failed.ordinal).toBe(3);
    expect(result.failed.kind).toBe('fetch-file');
    expect(result.failed.error.code).toBe('fetch_failed');
    expect(result.failed.error.message).toBe(`GET ${YOLO} failed: fetch failed`);
    expect(result.outcomes.map(o => o.ordinal)).toEqual([1, 2]);
    expect(runner.calls).toEqual([]);
    expect((await readdir(root)).sort()).toEqual(['data']);
    expect(await readdir(path.join(root, 'data'))).toEqual(['drn_d_22_cityscapes.pth']);
  });

  it('fails the first step when the workspace root is missing', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const root = path.join(await tempDir(), 'dependencies');
    const ff = fakeFetch();
    const runner = new FakeRunner();
    const result = await runManifest({ manifest, ctx: makeContext(root, { runner, fetch: ff.fetch }) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failed.ordinal).toBe(1);
    expect(result.failed.error.code).toBe('missing_prerequisite');
    expect(result.failed.error.message).toBe(`workspace root ${root} does not exist`);
    expect(result.outcomes).toEqual([]);
    expect(ff.urls).toEqual([]);
    expect(runner.calls).toEqual([]);
    expect(existsSync(root)).toBe(false);
  });

  it('stops when a clone fails and keeps the tool output', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const root = await tempDir();
    const runner = new FakeRunner((cmd, args) => cmd === 'git' && args[1].endsWith('/drn.git'));
    const result = await runManifest({ manifest, ctx: makeContext(root, { runner }) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failed.ordinal).toBe(22);
    expect(result.failed.error.code).toBe('clone_failed');
    expect(result.failed.error.stderr).toBe('fatal: git failed');
    expect(existsSync(path.join(root, 'CenterNet'))).toBe(false);
    expect(existsSync(path.join(root, 'CARLA_0.8.4'))).toBe(false);
  });

  it('turns missing outputs into a failure', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const root = await tempDir();
    const inner = new FakeRunner();
    // git "succeeds" without leaving a checkout behind
    const runner: CommandRunner = {
      run: (cmd, args, opts) =>
        cmd === 'git' ? Promise.resolve({ ok: true, stdout: '', stderr: '', exit_code: 0 }) : inner.run(cmd, args, opts)
    };
    const result = await runManifest({ manifest, ctx: makeContext(root, { runner }) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.outcomes).toHaveLength(26);
    expect(result.failed.ordinal).toBe(0);
    expect(result.failed.error.code).toBe('missing_output');
    expect(result.failed.error.message).toBe([
      'expected outputs are missing:',
      'DaSiamRPN (step 20): directory is missing or empty',
      'drn (step 22): directory is missing or empty',
      'CenterNet (step 23): directory is missing or empty'
    ].join('\n'));

    const unchecked = await runManifest({ manifest, ctx: makeContext(root, { runner }), verifyOutputs: false });
    expect(unchecked.ok).toBe(true);
  });

  it('notices an extraction that unpacked nothing', async () => {
    const manifest = compileManifest({
      name: 'one-model',
      steps: [
        { ordinal: 1, phase: 'workspace', kind: 'make-directory', target: 'data' },
        { ordinal: 2, phase: 'models', kind: 'fetch-file', source: 'https://models.test/m/model.tar.gz', target: 'data' },
        { ordinal: 3, phase: 'models', kind: 'extract-archive', source: 'data/model.tar.gz', target: 'data', creates: 'model' }
      ]
    });
    const root = await tempDir();
    // tar "succeeds" without writing anything
    const runner: CommandRunner = { run: () => Promise.resolve({ ok: true, stdout: '', stderr: '', exit_code: 0 }) };
    const result = await runManifest({ manifest, ctx: makeContext(root, { runner }) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failed.error.code).toBe('missing_output');
    expect(result.failed.error.message).toBe('expected outputs are missing:\ndata/model (step 3): directory is missing or empty');
  });

  it('writes a JSON journal when given a run id', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const root = await tempDir();
    const journalDir = await tempDir('journal-');
    await runManifest({ manifest, ctx: makeContext(root), journal: { baseDir: journalDir, runId: 'r1' } });

    const files = await readdir(path.join(journalDir, 'r1'));
    expect(files).toContain('step-01-make-directory.json');
    expect(files).toContain('step-26-extract-archive.json');
    const result = JSON.parse(await readFile(path.join(journalDir, 'r1', 'result.json'), 'utf-8'));
    expect(result.ok).toBe(true);
    expect(result.outcomes).toHaveLength(26);
  });
});

describe('planLines', () => {
  it('lists every step in order', async () => {
    const manifest = await loadManifest(DEFAULT_MANIFEST);
    const lines = planLines(manifest);
    expect(lines).toHaveLength(26);
    expect(lines[0]).toBe(' 1. [workspace] make-directory   mkdir data');
    expect(lines[18]).toBe('19. [repositories] install-package  apt install python-tk (system)');
    expect(lines[16]).toBe('17. [repositories] move-file        mv data/VGG_16_layers_py3.npz conv_reg_vot/vgg_model/');
  });
});
