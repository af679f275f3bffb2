/**
 * Archive normalizer tests
 *
 * Extraction runs through a FakeContext that lays out the "extracted"
 * files itself, so no archive tool is needed.
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  archiveTools,
  collapseWrapper,
  detectArchiveFormat,
  extract,
  normalize,
  resultShape,
  selectSubPath,
  splitSubPath,
  type NormalizeEnv,
} from '../core/normalize';
import {
  Cancelled,
  ExtractionFailed,
  InvalidOptions,
  LocatorNotFound,
  UnsupportedArchiveFormat,
  UnsupportedLocatorShape,
} from '../core/errors';
import { FAKE_EXTRACT, FakeContext, fakeArchiveTools, fakeZipBytes, removeTree, writeTree } from '../__fixtures__/fakes';

describe('detectArchiveFormat', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'hostfetch-detect-test-'));
  });

  afterEach(() => {
    removeTree(tempDir);
  });

  const file = (name: string, content: Buffer) => {
    const path = join(tempDir, name);
    writeFileSync(path, content);
    return path;
  };

  it('detects by magic bytes regardless of name', () => {
    expect(detectArchiveFormat(file('download', fakeZipBytes()))).toBe('zip');
    expect(detectArchiveFormat(file('a.bin', Buffer.from([0x1f, 0x8b, 0x08, 0x00])))).toBe('tar.gz');
    expect(detectArchiveFormat(file('b.bin', Buffer.from('BZh91AY')))).toBe('tar.bz2');
    expect(detectArchiveFormat(file('c.bin', Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00, 0x00])))).toBe('tar.xz');
    expect(detectArchiveFormat(file('d.bin', Buffer.from([0x28, 0xb5, 0x2f, 0xfd, 0x00])))).toBe('tar.zst');
    expect(detectArchiveFormat(file('e.bin', Buffer.from([0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c, 0x00])))).toBe('7z');
    expect(detectArchiveFormat(file('f.bin', Buffer.from('Rar!\x1a\x07\x00', 'latin1')))).toBe('rar');
  });

  it('detects plain tar by its ustar header', () => {
    const header = Buffer.alloc(512);
    header.write('ustar', 257, 'latin1');
    expect(detectArchiveFormat(file('archive', header))).toBe('tar');
  });

  it('falls back to the extension', () => {
    expect(detectArchiveFormat(file('src.tgz', Buffer.from('plain')))).toBe('tar.gz');
    expect(detectArchiveFormat(file('SRC.TAR', Buffer.from('plain')))).toBe('tar');
    expect(detectArchiveFormat(file('pack.7z', Buffer.from('plain')))).toBe('7z');
  });

  it('rejects unknown content', () => {
    expect(() => detectArchiveFormat(file('notes.txt', Buffer.from('just text')), 'loc')).toThrow(
      UnsupportedArchiveFormat
    );
  });
});

describe('archiveTools', () => {
  const tools = archiveTools({ tar: '/usr/bin/tar' });

  it('maps tarballs to tar', () => {
    expect(tools.command('tar.xz', '/a.tar.xz', '/dest')).toEqual({
      builder: '/usr/bin/tar',
      args: ['--no-same-owner', '-xf', '/a.tar.xz', '-C', '/dest'],
    });
  });

  it('maps zip to unzip', () => {
    expect(tools.command('zip', '/a.zip', '/dest')).toEqual({
      builder: 'unzip',
      args: ['-qq', '/a.zip', '-d', '/dest'],
    });
  });

  it('maps 7z and rar to unar', () => {
    expect(tools.command('rar', '/a.rar', '/dest')).toEqual({
      builder: 'unar',
      args: ['-quiet', '-no-directory', '-output-directory', '/dest', '/a.rar'],
    });
  });
});

describe('Sub-paths', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'hostfetch-subpath-test-'));
    writeTree(root, { 'notes.txt': 'n', 'docs/guide.md': 'g' });
  });

  afterEach(() => {
    removeTree(root);
  });

  it('splits relative paths', () => {
    expect(splitSubPath('docs/guide.md')).toEqual(['docs', 'guide.md']);
    expect(splitSubPath('docs/')).toEqual(['docs']);
  });

  it('rejects paths that could leave the root', () => {
    for (const bad of ['/etc/passwd', '../x', 'a/../b', './a', 'a//b', '', '/']) {
      expect(() => splitSubPath(bad)).toThrow(UnsupportedLocatorShape);
    }
  });

  it('selects a file', () => {
    expect(selectSubPath(root, 'docs/guide.md')).toBe(join(root, 'docs', 'guide.md'));
  });

  it('selects a directory with a trailing slash', () => {
    expect(selectSubPath(root, 'docs/')).toBe(join(root, 'docs'));
  });

  it('refuses a directory without a trailing slash', () => {
    expect(() => selectSubPath(root, 'docs')).toThrow("'docs' is not a regular file; write 'docs/' to select a directory");
  });

  it('refuses a file with a trailing slash', () => {
    expect(() => selectSubPath(root, 'notes.txt/')).toThrow(UnsupportedLocatorShape);
  });

  it('reports missing entries as not found', () => {
    expect(() => selectSubPath(root, 'missing.txt', 'loc')).toThrow(LocatorNotFound);
  });

  describe('symlinks', () => {
    let outside: string;

    beforeEach(() => {
      outside = mkdtempSync(join(tmpdir(), 'hostfetch-outside-test-'));
      writeTree(outside, { 'secret.txt': 's' });
      symlinkSync(outside, join(root, 'link'));
      symlinkSync(join(outside, 'secret.txt'), join(root, 'docs', 'alias.txt'));
    });

    afterEach(() => {
      removeTree(outside);
    });

    it('refuses to pass through a symlinked directory', () => {
      expect(() => selectSubPath(root, 'link/secret.txt', 'loc')).toThrow(
        "'link/secret.txt' passes through the symlink 'link'"
      );
      expect(() => selectSubPath(root, 'link/', 'loc')).toThrow(UnsupportedLocatorShape);
    });

    it('refuses a symlink as the selected entry', () => {
      expect(() => selectSubPath(root, 'docs/alias.txt', 'loc')).toThrow(
        "'docs/alias.txt' passes through the symlink 'docs/alias.txt'"
      );
    });
  });
});

describe('resultShape', () => {
  it('predicts the hashed shape', () => {
    expect(resultShape('file', {})).toBe('file');
    expect(resultShape('directory', {})).toBe('directory');
    expect(resultShape('file', { unpack: true })).toBe('directory');
    expect(resultShape('directory', { subPath: 'notes.txt' })).toBe('file');
    expect(resultShape('directory', { subPath: 'docs/' })).toBe('directory');
    expect(resultShape('file', { unpack: true, subPath: 'bin/tool' })).toBe('file');
    expect(resultShape('directory', { unpack: true, subPath: 'src.zip' })).toBe('directory');
  });
});

describe('Extraction', () => {
  let workDir: string;
  let archive: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'hostfetch-extract-test-'));
    archive = join(workDir, 'out');
    writeFileSync(archive, fakeZipBytes());
  });

  afterEach(() => {
    removeTree(workDir);
  });

  /** Context whose fake extractor writes `files` into the destination */
  const extractingContext = (files: Record<string, string>, exitCode = 0) =>
    new FakeContext(inv => {
      if (inv.builder !== FAKE_EXTRACT) return 1;
      writeTree(inv.args[2], files);
      return exitCode;
    });

  const env = (context: FakeContext): NormalizeEnv => ({ context, tools: fakeArchiveTools, locator: 'loc' });

  it('runs the tool for the detected format without network', async () => {
    const context = extractingContext({ 'a.txt': 'a', 'b.txt': 'b' });
    const dest = join(workDir, 'unpacked');

    expect(await extract(archive, dest, env(context))).toBe(dest);

    expect(context.calls).toHaveLength(1);
    expect(context.calls[0].args).toEqual(['zip', archive, dest]);
    expect(context.calls[0].network).toBe(false);
  });

  it('collapses a single wrapper directory', async () => {
    const context = extractingContext({ 'pkg-1.0/a.txt': 'a', 'pkg-1.0/b/c.txt': 'c' });
    const dest = join(workDir, 'unpacked');
    expect(await extract(archive, dest, env(context))).toBe(join(dest, 'pkg-1.0'));
  });

  it('keeps the wrapper when stripRoot is off', async () => {
    const context = extractingContext({ 'pkg-1.0/a.txt': 'a' });
    const dest = join(workDir, 'unpacked');
    expect(await extract(archive, dest, env(context), { stripRoot: false })).toBe(dest);
  });

  it('collapses only one level', async () => {
    const context = extractingContext({ 'outer/inner/a.txt': 'a' });
    const dest = join(workDir, 'unpacked');
    expect(await extract(archive, dest, env(context))).toBe(join(dest, 'outer'));
  });

  it('fails on a non-zero exit', async () => {
    const context = extractingContext({ 'a.txt': 'a' }, 2);
    await expect(extract(archive, join(workDir, 'unpacked'), env(context))).rejects.toThrow(
      'fake-extract failed on zip archive (exit 2): fake failure 2'
    );
  });

  it('runs in the given work directory', async () => {
    const context = extractingContext({ 'a.txt': 'a' });
    await extract(archive, join(workDir, 'unpacked'), env(context), { workDir });
    expect(context.calls[0].workDir).toBe(workDir);
  });

  it('does not retry tools that cannot run', async () => {
    const context = extractingContext({ 'a.txt': 'a' }, 127);
    const err = await extract(archive, join(workDir, 'unpacked'), env(context)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InvalidOptions);
    expect(err instanceof Error ? err.message : err).toBe(
      'cannot execute fake-extract (exit 127); check the archive tool settings'
    );
  });

  it('reports an aborted run as cancelled', async () => {
    const controller = new AbortController();
    const context = new FakeContext(() => {
      controller.abort();
      const aborted = new Error('The operation was aborted');
      aborted.name = 'AbortError';
      throw aborted;
    });

    await expect(
      extract(archive, join(workDir, 'unpacked'), { ...env(context), signal: controller.signal })
    ).rejects.toThrow(Cancelled);
  });

  it('reports a run that could not start as an extraction failure', async () => {
    const context = new FakeContext(() => {
      throw new Error('spawn failed');
    });

    await expect(extract(archive, join(workDir, 'unpacked'), env(context))).rejects.toThrow(
      new ExtractionFailed('loc', 'could not run fake-extract')
    );
  });

  it('fails when nothing was extracted', async () => {
    const context = extractingContext({});
    await expect(extract(archive, join(workDir, 'unpacked'), env(context))).rejects.toThrow(ExtractionFailed);
  });

  describe('collapseWrapper', () => {
    it('keeps roots with several entries or a single file', () => {
      const several = join(workDir, 'several');
      writeTree(several, { 'a/x': '1', 'b': '2' });
      expect(collapseWrapper(several)).toBe(several);

      const single = join(workDir, 'single');
      writeTree(single, { 'only.txt': '1' });
      expect(collapseWrapper(single)).toBe(single);
    });

    it('does not follow a symlinked directory', () => {
      const linked = join(workDir, 'linked');
      mkdirSync(linked);
      symlinkSync(workDir, join(linked, 'up'));
      expect(collapseWrapper(linked)).toBe(linked);
    });
  });

  describe('normalize', () => {
    it('returns the fetch result untouched without post-fetch steps', async () => {
      const context = extractingContext({});
      expect(await normalize(archive, {}, workDir, env(context))).toBe(archive);
      expect(context.calls).toHaveLength(0);
    });

    it('selects inside a fetched directory', async () => {
      const fetched = join(workDir, 'folder');
      writeTree(fetched, { 'notes.txt': 'n', 'other.txt': 'o' });
      const context = extractingContext({});
      expect(await normalize(fetched, { subPath: 'notes.txt' }, workDir, env(context))).toBe(
        join(fetched, 'notes.txt')
      );
    });

    it('unpacks a fetched archive', async () => {
      const context = extractingContext({ 'src/main.c': 'int main;' });
      const result = await normalize(archive, { unpack: true }, workDir, env(context));
      expect(result).toBe(join(workDir, 'unpacked', 'src'));
      expect(readFileSync(join(result, 'main.c'), 'utf-8')).toBe('int main;');
    });

    it('selects inside the extracted archive', async () => {
      const context = extractingContext({ 'pkg/bin/tool': 'tool', 'pkg/README': 'r' });
      const result = await normalize(archive, { unpack: true, subPath: 'bin/tool' }, workDir, env(context));
      expect(result).toBe(join(workDir, 'unpacked', 'pkg', 'bin', 'tool'));
    });

    it('unpacks an archive selected from a fetched directory', async () => {
      const fetched = join(workDir, 'folder');
      mkdirSync(fetched);
      writeFileSync(join(fetched, 'src.zip'), fakeZipBytes());
      writeFileSync(join(fetched, 'other.txt'), 'o');
      const context = extractingContext({ 'a.txt': 'a', 'b.txt': 'b' });

      const result = await normalize(fetched, { unpack: true, subPath: 'src.zip' }, workDir, env(context));

      expect(result).toBe(join(workDir, 'unpacked'));
      expect(context.calls[0].args[1]).toBe(join(fetched, 'src.zip'));
    });

    it('refuses to unpack a directory', async () => {
      const fetched = join(workDir, 'folder');
      writeTree(fetched, { 'a.txt': 'a' });
      await expect(normalize(fetched, { unpack: true }, workDir, env(extractingContext({})))).rejects.toThrow(
        InvalidOptions
      );
    });

    it('refuses a sub-path into a plain file', async () => {
      await expect(
        normalize(archive, { subPath: 'a.txt' }, workDir, env(extractingContext({})))
      ).rejects.toThrow(UnsupportedLocatorShape);
      expect(existsSync(join(workDir, 'unpacked'))).toBe(false);
    });
  });
});
