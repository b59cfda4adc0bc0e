/**
 * CLI Program Tests
 *
 * Drives the commander program end to end with in-process collaborators,
 * an explicit empty environment and a temp working directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createProgram, EXIT_CODES, type ExitCode } from '../../../cli/program.js';
import {
  captureSink,
  createWorld,
  match,
  quietLogger,
  type CapturedSink,
  type FakeWorld,
} from '../../utils/fakes.js';

describe('provenance-engine CLI', () => {
  let dir: string;
  let world: FakeWorld;
  let sink: CapturedSink;
  let exits: ExitCode[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'provenance-program-'));
    world = createWorld({ A: ['B', 'C'] }, { 'A-B': match(0.5) });
    sink = captureSink();
    exits = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function run(args: readonly string[], signal?: AbortSignal): Promise<ExitCode | undefined> {
    sink.lines.out.length = 0;
    sink.lines.err.length = 0;
    const program = createProgram({
      sink,
      env: {},
      cwd: dir,
      engine: {
        collaborators: world.collaborators,
        descriptorComputer: world.descriptors,
        logger: quietLogger,
      },
      onExit: (code) => exits.push(code),
      ...(signal !== undefined && { signal }),
    });
    await program.parseAsync(['node', 'provenance-engine', ...args]);
    return exits.at(-1);
  }

  function jsonOutput(): unknown {
    return JSON.parse(sink.lines.out.join('\n'));
  }

  describe('analyze', () => {
    it('prints the summary of a completed analysis', async () => {
      expect(await run(['analyze', 'A', '--max-depth', '1'])).toBe(EXIT_CODES.SUCCESS);

      expect(sink.lines.out).toContain('Status:     completed');
      expect(sink.lines.out).toContain('  - A, B');
      expect(sink.lines.out).toContain('  A -- B  weight=0.500');
      expect(world.retrieval.calls[0]).toEqual({ imageId: 'A', topK: 10, ownerIds: ['local'] });
    });

    it('passes analysis options through', async () => {
      await run(['--owner', 'alice', 'analyze', 'A', '--top-k', '1', '--no-check-flip', '--variant', 'cv_sift']);

      expect(world.retrieval.calls[0]).toEqual({ imageId: 'A', topK: 1, ownerIds: ['alice'] });
      expect(world.verification.calls[0]).toMatchObject({ variant: 'cv_sift', checkFlip: false });
    });

    it('writes the job as JSON and the result document to a file', async () => {
      const output = join(dir, 'graph.json');

      expect(await run(['--json', 'analyze', 'A', '--output', output])).toBe(EXIT_CODES.SUCCESS);

      expect(jsonOutput()).toMatchObject({ status: 'completed', owner: 'local' });
      const document: unknown = JSON.parse(await readFile(output, 'utf-8'));
      expect(document).toMatchObject({ components: [['A', 'B']], truncated: null });
    });

    it('reads extra seeds from a file', async () => {
      const seedsFile = join(dir, 'seeds.txt');
      await writeFile(seedsFile, '# panel\nQ\n');

      await run(['analyze', 'A', '--seeds-file', seedsFile, '--max-depth', '1']);

      expect(world.retrieval.calls.map((call) => call.imageId)).toEqual(['A', 'Q', 'B']);
    });

    it('fails on invalid analysis options', async () => {
      expect(await run(['analyze', 'A', '--min-area', '2'])).toBe(EXIT_CODES.ERRORS);

      expect(sink.lines.err.some((line) => line.includes('minArea: minArea must be <= 1'))).toBe(true);
    });

    it('refuses a global scope without admin', async () => {
      expect(await run(['analyze', 'A', '--scope', 'global'])).toBe(EXIT_CODES.ERRORS);

      expect(
        sink.lines.err.some((line) => line.includes('Global search scope requires admin privileges'))
      ).toBe(true);
    });

    it('reports an interrupted analysis as cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      expect(await run(['analyze', 'A'], controller.signal)).toBe(EXIT_CODES.USER_CANCELLED);
      expect(sink.lines.out).toContain('Status:     cancelled');
    });
  });

  describe('jobs', () => {
    it('reads jobs back from the database in later invocations', async () => {
      const database = join(dir, 'db', 'provenance.db');

      await run(['--json', '--database', database, 'analyze', 'A']);
      const submitted = jsonOutput();
      expect(submitted).toHaveProperty('jobId');
      const jobId = typeof submitted === 'object' && submitted !== null && 'jobId' in submitted
        ? String(submitted.jobId)
        : '';

      expect(await run(['--json', '--database', database, 'jobs', 'list'])).toBe(EXIT_CODES.SUCCESS);
      expect(jsonOutput()).toEqual([
        expect.objectContaining({ job: jobId, owner: 'local', status: 'completed', seeds: 1 }),
      ]);

      expect(await run(['--json', '--database', database, 'jobs', 'status', jobId])).toBe(
        EXIT_CODES.SUCCESS
      );
      expect(jsonOutput()).toMatchObject({ jobId, result: { components: [['A', 'B']] } });

      expect(await run(['--json', '--database', database, '--owner', 'mallory', 'jobs', 'status', jobId])).toBe(
        EXIT_CODES.ERRORS
      );
    });

    it('reports an unknown job', async () => {
      expect(await run(['jobs', 'cancel', 'job-missing'])).toBe(EXIT_CODES.ERRORS);
      expect(sink.lines.err.some((line) => line.includes('Job job-missing not found'))).toBe(true);
    });

    it('purges for admins only', async () => {
      expect(await run(['jobs', 'purge'])).toBe(EXIT_CODES.ERRORS);
      expect(await run(['--admin', 'jobs', 'purge'])).toBe(EXIT_CODES.SUCCESS);
      expect(sink.lines.out).toEqual(['Archived 0 expired job(s)']);
    });
  });

  describe('cache', () => {
    it('warms descriptors and reports failures', async () => {
      world.descriptors.failing.add('B');

      expect(await run(['cache', 'warm', 'A', 'B', 'A'])).toBe(EXIT_CODES.ERRORS);

      expect(sink.lines.out).toEqual([
        'Computed: 1',
        'Cached:   0',
        'Failed:   1',
        '  [FAIL] B: cannot read B',
      ]);
      expect(world.descriptors.calls).toEqual([
        { imageId: 'A', variant: 'cv_rsift' },
        { imageId: 'B', variant: 'cv_rsift' },
      ]);
    });

    it('cleans up for admins only and validates the age', async () => {
      expect(await run(['cache', 'cleanup', '--older-than', '30d'])).toBe(EXIT_CODES.ERRORS);
      expect(await run(['--admin', 'cache', 'cleanup', '--older-than', 'soon'])).toBe(EXIT_CODES.ERRORS);
      expect(await run(['--admin', 'cache', 'cleanup', '--older-than', '30d'])).toBe(EXIT_CODES.SUCCESS);
      expect(sink.lines.out).toEqual(['Removed 0 descriptor(s)']);
    });
  });

  describe('health', () => {
    it('prints the health report', async () => {
      expect(await run(['health'])).toBe(EXIT_CODES.SUCCESS);

      expect(sink.lines.out).toContain('  [ok] retrieval');
      expect(sink.lines.out).toContain('       retrieval ok');
    });

    it('fails when a collaborator is unhealthy', async () => {
      world.retrieval.healthStatus = { healthy: false, message: 'index offline' };

      expect(await run(['health'])).toBe(EXIT_CODES.ERRORS);
    });
  });

  describe('configuration', () => {
    it('exits with the config error code on a missing config file', async () => {
      const missing = join(dir, 'nope.yaml');

      expect(await run(['--config', missing, 'health'])).toBe(EXIT_CODES.CONFIG_ERROR);
      expect(sink.lines.err).toEqual([`Configuration error: Config file not found: ${missing}`]);
    });
  });
});
