/**
 * Tests for CLI commands, run in-process against a temporary database.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { TestDb } from '../../test-utils/db.js';
import { createTestDb, silentLogger } from '../../test-utils/db.js';
import type { CliIo } from './io.js';
import { createProgram } from './program.js';

/** Captured result of one CLI invocation. */
interface CliResult {
  out: string[];
  err: string[];
  exitCode: number;
}

describe('CLI', () => {
  let testDb: TestDb;
  let configPath: string;

  /** Run one command line with captured output. */
  async function cli(
    args: string[],
    env: Record<string, string> = {},
  ): Promise<CliResult> {
    const out: string[] = [];
    const err: string[] = [];
    let exitCode = 0;
    const io: CliIo = {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      setExitCode: (code) => {
        exitCode = code;
      },
      env,
      createLogger: () => silentLogger,
    };

    const program = createProgram(io).exitOverride();
    program.commands.forEach((command) => command.exitOverride());
    await program.parseAsync(args, { from: 'user' });
    return { out, err, exitCode };
  }

  /** Run a registry command against the test config. */
  const run = (...args: string[]) => cli([...args, '--config', configPath]);

  const registerDoublet = (resultPath = '/doublet_results/agnn01') =>
    run(
      'register',
      '--stage',
      'doublet',
      '--dataset',
      '/doublet_data/hitgraphs_med_002',
      '--result',
      resultPath,
      '--size',
      'medium',
    );

  const registerTriplet = (resultPath = '/triplet_results/agnn01') =>
    run(
      'register',
      '-s',
      'triplet',
      '-d',
      '/triplet_data/hitgraphs_med',
      '-r',
      resultPath,
      '--size',
      'medium',
    );

  beforeEach(() => {
    testDb = createTestDb();
    configPath = join(testDb.dir, 'run-ledger.config.json');
    writeFileSync(
      configPath,
      JSON.stringify({ dbPath: testDb.dbPath, log: { level: 'silent' } }),
    );
  });

  afterEach(() => {
    testDb.cleanup();
  });

  it('should list runs when the registry is empty', async () => {
    expect((await run('list')).out).toEqual(['No runs registered.']);
  });

  it('should register a run', async () => {
    const result = await registerDoublet();

    expect(result.out).toEqual(['Run 1 registered (doublet).']);
    expect(result.exitCode).toBe(0);

    const rows = testDb.db
      .prepare<[], { id: number; result_path: string }>(
        'SELECT id, result_path FROM runs',
      )
      .all();
    expect(rows).toEqual([{ id: 1, result_path: '/doublet_results/agnn01' }]);
  });

  it('should link a triplet run and show its lineage', async () => {
    await registerDoublet();
    await registerTriplet();

    expect((await run('link', '2', '1')).out).toEqual([
      'Run 2 linked to doublet run 1.',
    ]);
    expect((await run('lineage', '2')).out).toEqual([
      '1  doublet  size=medium  graphs=-  duration=-  upstream=-  /doublet_results/agnn01',
    ]);

    const relink = await run('link', '2', '1');
    expect(relink.err).toEqual([
      'AlreadyLinked: Run 2 is already linked to run 1; unlink it first',
    ]);
    expect(relink.exitCode).toBe(9);
  });

  it('should report a run without upstream runs', async () => {
    await registerDoublet();

    expect((await run('lineage', '1')).out).toEqual([
      'Run 1 has no upstream runs.',
    ]);
  });

  it('should unlink a triplet run', async () => {
    await registerDoublet();
    await registerTriplet();
    await run('link', '2', '1');

    expect((await run('unlink', '2')).out).toEqual(['Run 2 unlinked.']);
    expect((await run('list', '--stage', 'triplet', '--unlinked')).out).toEqual([
      '2  triplet  size=medium  graphs=-  duration=-  upstream=-  /triplet_results/agnn01',
    ]);
  });

  it('should reject a reused result path', async () => {
    await registerDoublet('/doublet_results/agnn01');
    const result = await registerDoublet('/doublet_results/agnn01/');

    expect(result.err).toEqual([
      'DuplicateResultPath: Result path /doublet_results/agnn01 is already claimed by run 1',
    ]);
    expect(result.exitCode).toBe(4);
  });

  it('should reject an unknown stage', async () => {
    const result = await run(
      'register',
      '--stage',
      'quad',
      '--dataset',
      '/d',
      '--result',
      '/r',
    );

    expect(result.err[0]).toMatch(/^InvalidInput: Invalid stage: /);
    expect(result.exitCode).toBe(2);
  });

  it('should reject a blank graph count', async () => {
    const result = await run(
      'register',
      '-s',
      'doublet',
      '-d',
      '/d',
      '-r',
      '/r1',
      '--graphs',
      ' ',
    );

    expect(result.err).toEqual([
      'InvalidInput: Invalid graph count: must be a non-negative integer',
    ]);
    expect(result.exitCode).toBe(2);
    expect((await run('list')).out).toEqual(['No runs registered.']);
  });

  it('should reject a blank epoch', async () => {
    await registerDoublet();

    const result = await run('artifacts', '1', '--epoch', '');

    expect(result.err).toEqual([
      'InvalidInput: Invalid epoch: must be a non-negative integer',
    ]);
    expect(result.exitCode).toBe(2);
  });

  it('should reject a missing required option', async () => {
    await expect(
      cli(['register', '--stage', 'doublet', '--config', configPath]),
    ).rejects.toMatchObject({ code: 'commander.missingMandatoryOptionValue' });
  });

  it('should complete a run', async () => {
    await registerDoublet();

    const result = await run(
      'complete',
      '1',
      '--duration',
      '12h',
      '--graphs',
      '2048',
    );

    expect(result.out).toEqual([
      '1  doublet  size=medium  graphs=2048  duration=12h  upstream=-  /doublet_results/agnn01',
    ]);
  });

  it('should reject an invalid duration', async () => {
    await registerDoublet();

    const result = await run('complete', '1', '--duration', 'soon');

    expect(result.exitCode).toBe(2);
    expect(result.err[0]).toMatch(/^InvalidInput: Invalid duration format: soon/);
  });

  it('should annotate a run', async () => {
    await registerDoublet();

    expect((await run('annotate', '1', '-n', 'first')).out).toEqual([
      'Run 1 notes updated.',
    ]);
    await run('annotate', '1', '-n', 'second', '--append');

    const shown: unknown = JSON.parse(
      (await run('show', '1', '--json')).out.join('\n'),
    );
    expect(shown).toMatchObject({ id: 1, notes: 'first\nsecond' });
  });

  it('should show run details', async () => {
    await registerDoublet();

    const { out } = await run('show', '1');

    expect(out.slice(0, 9)).toEqual([
      'id: 1',
      'stage: doublet',
      'size: medium',
      'graphs: -',
      'duration: -',
      'dataset: /doublet_data/hitgraphs_med_002',
      'result: /doublet_results/agnn01',
      'upstream: -',
      'notes: -',
    ]);
  });

  it('should report a missing run', async () => {
    const result = await run('show', '99');

    expect(result.err).toEqual(['NotFound: Run 99 not found']);
    expect(result.exitCode).toBe(6);
  });

  it('should reject a malformed run ID', async () => {
    const result = await run('show', 'abc');

    expect(result.err).toEqual(['InvalidInput: Invalid run ID: must be a number']);
    expect(result.exitCode).toBe(2);
  });

  it('should refuse to purge a run with dependents', async () => {
    await registerDoublet();
    await registerTriplet();
    await run('link', '2', '1');

    const result = await run('purge', '1');

    expect(result.err).toEqual([
      'ReferencedByDependents: Run 1 is the upstream of run(s) 2; unlink them first',
    ]);
    expect(result.exitCode).toBe(10);
  });

  it('should purge an unreferenced run', async () => {
    await registerDoublet();

    expect((await run('purge', '1')).out).toEqual(['Run 1 purged.']);
    expect((await run('list')).out).toEqual(['No runs registered.']);
  });

  it('should reject --linked together with --unlinked', async () => {
    const result = await run('list', '--linked', '--unlinked');

    expect(result.err).toEqual([
      'InvalidInput: --linked and --unlinked are mutually exclusive',
    ]);
    expect(result.exitCode).toBe(2);
  });

  it('should list runs as JSON', async () => {
    await registerDoublet();
    await registerTriplet();

    const runs: unknown = JSON.parse((await run('list', '--json')).out.join('\n'));

    expect(runs).toMatchObject([
      { id: 1, stage: 'doublet' },
      { id: 2, stage: 'triplet' },
    ]);
  });

  it('should show artifact locations', async () => {
    await registerDoublet();

    expect((await run('artifacts', '1', '--epoch', '7')).out).toEqual([
      'config: /doublet_results/agnn01/config.pkl',
      'summaries: /doublet_results/agnn01/summaries_0.csv',
      'checkpoints: /doublet_results/agnn01/checkpoints',
      'checkpoint: /doublet_results/agnn01/checkpoints/model_checkpoint_007.pth.tar',
    ]);
  });

  it('should audit the registry', async () => {
    await registerDoublet();
    await registerTriplet();

    expect((await run('audit')).out).toEqual([
      'Unlinked triplet runs: 2',
      'Runs without a duration: 1, 2',
      'Integrity: ok',
    ]);
  });

  it('should import a ledger file', async () => {
    const ledgerPath = join(testDb.dir, 'ledger.json');
    writeFileSync(
      ledgerPath,
      JSON.stringify([
        {
          stage: 'doublet',
          datasetPath: '/doublet_data/hitgraphs_med_002',
          resultPath: '/doublet_results/agnn01',
          duration: '12h',
        },
        {
          stage: 'triplet',
          datasetPath: '/triplet_data/hitgraphs_med',
          resultPath: '/triplet_results/agnn01',
          upstreamResultPath: '/doublet_results/agnn01',
        },
      ]),
    );

    expect((await run('import', ledgerPath)).out).toEqual(['Imported 2 runs.']);
    expect((await run('lineage', '2')).out).toEqual([
      '1  doublet  size=-  graphs=-  duration=12h  upstream=-  /doublet_results/agnn01',
    ]);
  });

  it('should reject a ledger file that is not valid JSON', async () => {
    const ledgerPath = join(testDb.dir, 'ledger.json');
    writeFileSync(ledgerPath, '{not json');

    const result = await run('import', ledgerPath);

    expect(result.err[0]).toMatch(
      /^InvalidInput: Invalid JSON in ledger file .*ledger\.json: /,
    );
    expect(result.exitCode).toBe(2);
  });

  it('should reject a missing ledger file', async () => {
    const result = await run('import', join(testDb.dir, 'missing.json'));

    expect(result.err[0]).toMatch(
      /^InvalidInput: Cannot read ledger file .*missing\.json: ENOENT/,
    );
    expect(result.exitCode).toBe(2);
  });

  it('should take the database path from the environment', async () => {
    const result = await cli(['config-show'], {
      RUN_LEDGER_DB_PATH: testDb.dbPath,
    });

    const shown: unknown = JSON.parse(result.out.join('\n'));
    expect(shown).toMatchObject({ dbPath: testDb.dbPath, port: 3120 });
  });

  describe('config commands', () => {
    it('should validate a config file', async () => {
      const result = await cli(['validate', '--config', configPath]);

      expect(result.out.slice(0, 2)).toEqual([
        '✅ Config valid',
        `  Database: ${testDb.dbPath}`,
      ]);
    });

    it('should report invalid JSON', async () => {
      const badPath = join(testDb.dir, 'bad.json');
      writeFileSync(badPath, '{ not json');

      const result = await cli(['validate', '--config', badPath]);

      expect(result.err[0]).toMatch(/^❌ Invalid JSON: /);
      expect(result.exitCode).toBe(2);
    });

    it('should report schema violations', async () => {
      const badPath = join(testDb.dir, 'bad.json');
      writeFileSync(badPath, JSON.stringify({ port: 'x' }));

      const result = await cli(['validate', '--config', badPath]);

      expect(result.err).toEqual([
        '❌ Config invalid: InvalidInput: port: Expected number, received string',
      ]);
      expect(result.exitCode).toBe(2);
    });

    it('should write a starter config once', async () => {
      const outputPath = join(testDb.dir, 'starter.json');

      const first = await cli(['init', '--output', outputPath]);
      expect(first.out[0]).toBe(`✅ Wrote ${outputPath}`);
      expect(existsSync(outputPath)).toBe(true);
      const written: unknown = JSON.parse(readFileSync(outputPath, 'utf-8'));
      expect(written).toMatchObject({ port: 3120, paths: { case: 'preserve' } });

      const second = await cli(['init', '--output', outputPath]);
      expect(second.exitCode).toBe(1);
    });
  });
});
