import {
  describe,
  it,
  expect,
  vi,
  beforeAll,
  afterAll,
  beforeEach,
  afterEach,
  type MockInstance,
} from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { run } from './program';

const CONFLICT_A_B =
  "Plugin 'RootA:1.0' requires version '1.0' but plugin 'RootB:1.0' requires '2.0' for plugin 'Dep'";
const CONFLICT_B_A =
  "Plugin 'RootB:1.0' requires version '2.0' but plugin 'RootA:1.0' requires '1.0' for plugin 'Dep'";

describe('plugver CLI', () => {
  let dir: string;
  let rootA: string;
  let rootB: string;
  let clean: string;
  let logSpy: MockInstance<Parameters<typeof console.log>, void>;
  let errSpy: MockInstance<Parameters<typeof console.error>, void>;

  const logged = () => logSpy.mock.calls.map((c) => String(c[0]));

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'plugver-cli-'));
    rootA = path.join(dir, 'a.yaml');
    rootB = path.join(dir, 'b.yaml');
    clean = path.join(dir, 'clean.yaml');
    await writeFile(rootA, 'roots:\n  - plugin: RootA:1.0\n    requires:\n      - Dep:1.0\n');
    await writeFile(rootB, 'roots:\n  - plugin: RootB:1.0\n    requires:\n      - Dep:2.0\n');
    await writeFile(clean, 'roots:\n  - plugin: RootC:1.0\n    requires:\n      - Dep:1.0\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('verify', () => {
    it('exits 0 when the manifests agree', async () => {
      expect(await run(['verify', rootA, clean])).toBe(0);
      expect(logged().join('\n')).toContain('No plugin version conflicts.');
    });

    it('exits 1 and lists both orderings of a conflict', async () => {
      expect(await run(['verify', rootA, rootB])).toBe(1);
      expect(logged()).toContain(`  - ${CONFLICT_A_B}`);
      expect(logged()).toContain(`  - ${CONFLICT_B_A}`);
    });

    it('exits 0 with --warn-only', async () => {
      expect(await run(['verify', '--warn-only', rootA, rootB])).toBe(0);
      expect(logged()).toContain(`  - ${CONFLICT_A_B}`);
    });

    it('sorts messages with --sort', async () => {
      expect(await run(['--json', 'verify', '--sort', rootB, rootA])).toBe(1);
      expect(JSON.parse(logged()[0])).toEqual({
        status: 'FAILURE',
        manifests: [rootB, rootA],
        conflicts: [CONFLICT_A_B, CONFLICT_B_A],
      });
    });

    it('keeps insertion order without --sort', async () => {
      await run(['--json', 'verify', rootB, rootA]);
      expect(JSON.parse(logged()[0]).conflicts).toEqual([CONFLICT_B_A, CONFLICT_A_B]);
    });

    it('exits 2 and reports a missing manifest', async () => {
      const missing = path.join(dir, 'nope.yaml');
      expect(await run(['verify', missing])).toBe(2);
      expect(errSpy).toHaveBeenCalledWith(`❌ Error: Cannot read manifest: ${missing}`);
    });

    it('reports errors as JSON with --json', async () => {
      const missing = path.join(dir, 'nope.yaml');
      expect(await run(['--json', 'verify', missing])).toBe(2);
      expect(JSON.parse(logged()[0])).toEqual({
        error: { code: 'ConfigError', message: `Cannot read manifest: ${missing}` },
      });
    });

    it('logs progress with --verbose', async () => {
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
      await run(['--verbose', 'verify', rootA]);
      expect(debugSpy).toHaveBeenCalledWith(`[cmd=verify file=${rootA}] Loaded 1 root plugin(s)`);
      expect(infoSpy).toHaveBeenCalledWith(
        '[cmd=verify] 0 conflict message(s) across 1 manifest(s)',
      );
    });

    it('exits 2 and reports a usage error when no manifest is given', async () => {
      expect(await run(['verify'])).toBe(2);
      expect(errSpy).toHaveBeenCalledWith(
        "❌ Error: error: missing required argument 'manifests'",
      );
    });

    it('reports usage errors as JSON with --json', async () => {
      expect(await run(['--json', 'verify'])).toBe(2);
      expect(JSON.parse(logged()[0])).toEqual({
        error: { code: 'UsageError', message: "error: missing required argument 'manifests'" },
      });
    });
  });

  describe('check', () => {
    it('exits 0 when every identifier is valid', async () => {
      expect(await run(['--json', 'check', 'git:3.10.0', 'job_dsl:1.77'])).toBe(0);
      expect(JSON.parse(logged()[0])).toEqual({
        plugins: [
          { input: 'git:3.10.0', valid: true },
          { input: 'job_dsl:1.77', valid: true },
        ],
      });
    });

    it('exits 2 and reports the invalid identifiers', async () => {
      expect(await run(['--json', 'check', 'git:3.10.0', 'bad'])).toBe(2);
      expect(JSON.parse(logged()[0]).plugins[1]).toEqual({
        input: 'bad',
        valid: false,
        error: "invalid plugin format 'bad'",
      });
    });

    it('logs invalid identifiers with --verbose', async () => {
      await run(['--verbose', 'check', 'bad']);
      expect(errSpy).toHaveBeenCalledWith(
        '[cmd=check] Invalid plugin identifier bad',
        expect.any(Error),
      );
    });
  });

  it('exits 0 for --version', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    expect(await run(['--version'])).toBe(0);
    expect(writeSpy).toHaveBeenCalledWith('0.1.0\n');
  });
});
