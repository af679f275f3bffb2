/**
 * In-process stand-ins for the execution context and archive tools.
 */

import { chmodSync, existsSync, lstatSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { ExecutionContext, Invocation, InvocationResult } from '../core/sandbox';
import type { ArchiveTools } from '../core/normalize';

/** Writes into `inv.env.out`; returns an exit code (default 0) */
export type Handler = (inv: Invocation, call: number) => number | void;

export class FakeContext implements ExecutionContext {
  readonly kind = 'fake';
  readonly calls: Invocation[] = [];

  constructor(private readonly handler: Handler) {}

  async run(inv: Invocation): Promise<InvocationResult> {
    this.calls.push(inv);
    const exitCode = this.handler(inv, this.calls.length) ?? 0;
    return {
      exitCode,
      stderr: exitCode === 0 ? '' : `fake failure ${exitCode}`,
      producedPath: existsSync(inv.env.out) ? inv.env.out : null,
    };
  }
}

/** Extraction commands the FakeContext can recognise by their builder */
export const FAKE_EXTRACT = 'fake-extract';

export const fakeArchiveTools: ArchiveTools = {
  command(format, archive, dest) {
    return { builder: FAKE_EXTRACT, args: [format, archive, dest] };
  },
};

/** Create files (and their parent directories) below `root` */
export function writeTree(root: string, files: Record<string, string>): void {
  mkdirSync(root, { recursive: true });
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}

/** rm -rf that also works on read-only store entries */
export function removeTree(path: string): void {
  if (!existsSync(path)) return;
  const makeWritable = (p: string): void => {
    const stat = lstatSync(p);
    if (stat.isSymbolicLink()) return;
    if (stat.isDirectory()) {
      chmodSync(p, 0o755);
      for (const entry of readdirSync(p)) makeWritable(join(p, entry));
    }
  };
  makeWritable(path);
  rmSync(path, { recursive: true, force: true });
}

/** A zip local-file-header signature followed by filler */
export function fakeZipBytes(): Buffer {
  return Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.alloc(60, 1)]);
}
