/**
 * Execution context tests
 *
 * DirectContext runs /bin/sh locally; DockerContext is checked by the
 * command line it would run.
 */

import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DirectContext, DockerContext, type Invocation } from '../core/sandbox';
import { removeTree } from '../__fixtures__/fakes';

describe('DirectContext', () => {
  let workDir: string;
  const context = new DirectContext();

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'hostfetch-sandbox-test-'));
  });

  afterEach(() => {
    removeTree(workDir);
  });

  const sh = (command: string, extra: Partial<Invocation> = {}): Invocation => ({
    builder: '/bin/sh',
    args: ['-c', command],
    env: { out: join(workDir, 'out') },
    network: false,
    workDir,
    ...extra,
  });

  it('reports the produced output', async () => {
    const result = await context.run(sh('printf hello > "$out"'));

    expect(result).toEqual({ exitCode: 0, stderr: '', producedPath: join(workDir, 'out') });
    expect(readFileSync(join(workDir, 'out'), 'utf-8')).toBe('hello');
  });

  it('passes only a sanitized environment', async () => {
    process.env.HOSTFETCH_LEAK_CHECK = 'leaked';
    try {
      await context.run(
        sh('printf "%s|%s|%s" "$HOME" "${HOSTFETCH_LEAK_CHECK:-unset}" "$GIVEN" > "$out"', {
          env: { out: join(workDir, 'out'), GIVEN: 'given' },
        })
      );
    } finally {
      delete process.env.HOSTFETCH_LEAK_CHECK;
    }
    expect(readFileSync(join(workDir, 'out'), 'utf-8')).toBe('/homeless-shelter|unset|given');
  });

  it('returns failures with their stderr', async () => {
    const result = await context.run(sh('echo oops >&2; exit 3'));
    expect(result).toEqual({ exitCode: 3, stderr: 'oops\n', producedPath: null });
  });

  it('reports a missing builder as exit 127', async () => {
    const result = await context.run(sh('', { builder: join(workDir, 'no-such-tool'), args: [] }));
    expect(result.exitCode).toBe(127);
    expect(result.stderr.startsWith(`Failed to spawn ${join(workDir, 'no-such-tool')}`)).toBe(true);
  });

  it('rejects when aborted', async () => {
    const controller = new AbortController();
    const running = context.run(sh('sleep 5', { signal: controller.signal }));
    setTimeout(() => controller.abort(), 20);
    await expect(running).rejects.toMatchObject({ name: 'AbortError' });
  });
});

describe('DockerContext', () => {
  const user =
    typeof process.getuid === 'function' && typeof process.getgid === 'function'
      ? ['--user', `${process.getuid()}:${process.getgid()}`]
      : [];

  const invocation: Invocation = {
    builder: '/bin/sh',
    args: ['-c', 'true'],
    env: { out: '/scratch/out', TMPDIR: '/scratch/tmp' },
    network: false,
    workDir: '/scratch',
  };

  it('isolates the network unless asked for', () => {
    const docker = new DockerContext({ image: 'debian:bookworm-slim' });

    expect(docker.dockerArgs(invocation)).toEqual([
      'run', '--rm',
      '--network', 'none',
      ...user,
      '-v', '/scratch:/scratch:rw',
      '-e', 'HOME=/homeless-shelter',
      '-e', 'out=/scratch/out',
      '-e', 'TMPDIR=/scratch/tmp',
      '-w', '/scratch',
      'debian:bookworm-slim',
      '/bin/sh', '-c', 'true',
    ]);
    expect(docker.dockerArgs({ ...invocation, network: true })).not.toContain('--network');
  });
});
