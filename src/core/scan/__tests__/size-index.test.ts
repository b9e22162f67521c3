// src/core/scan/__tests__/size-index.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { buildSizeIndex, pruneSizeIndex } from '../size-index.js';
import { ErrorCode } from '../../errors.js';
import type { ScanIssue } from '../../types/index.js';
import { makeTree, removeTree } from '../../__tests__/fixtures.js';

jest.mock('fs/promises', () => {
  const actual = jest.requireActual<typeof import('fs/promises')>('fs/promises');
  return { ...actual, readdir: jest.fn(actual.readdir) };
});

const actualFs = jest.requireActual<typeof import('fs/promises')>('fs/promises');
type ReaddirMock = jest.Mock<(dir: string, options?: unknown) => Promise<unknown>>;
const readdirMock = fs.readdir as unknown as ReaddirMock;

describe('buildSizeIndex', () => {
  let root: string;
  let issues: ScanIssue[];
  const onIssue = (issue: ScanIssue) => {
    issues.push(issue);
  };

  beforeEach(() => {
    issues = [];
  });

  afterEach(async () => {
    readdirMock.mockImplementation((dir, options) => actualFs.readdir(dir, options as never));
    await removeTree(root);
  });

  it('groups files by exact byte size', async () => {
    root = await makeTree({
      'a.txt': 'hello',
      'b.txt': 'world',
      'c.txt': 'hi',
    });

    const index = await buildSizeIndex([root], { recursive: true, onIssue });

    expect(index.filesScanned).toBe(3);
    expect(index.groups.get(5)?.map((e) => e.path)).toEqual([
      path.join(root, 'a.txt'),
      path.join(root, 'b.txt'),
    ]);
    expect(index.groups.get(2)).toEqual([
      { path: path.join(root, 'c.txt'), realPath: await fs.realpath(path.join(root, 'c.txt')), size: 2 },
    ]);
    expect(issues).toEqual([]);
  });

  it('walks depth-first with entries sorted by name', async () => {
    root = await makeTree({
      'b.txt': 'same',
      'a.txt': 'same',
      '0dir/c.txt': 'same',
    });

    const index = await buildSizeIndex([root], { recursive: true, onIssue });

    expect(index.groups.get(4)?.map((e) => path.relative(root, e.path))).toEqual([
      path.join('0dir', 'c.txt'),
      'a.txt',
      'b.txt',
    ]);
  });

  it('skips subdirectories when not recursive', async () => {
    root = await makeTree({
      'a.txt': 'same',
      'nested/b.txt': 'same',
    });

    const index = await buildSizeIndex([root], { recursive: false, onIssue });

    expect(index.filesScanned).toBe(1);
    expect(index.groups.get(4)?.map((e) => e.path)).toEqual([path.join(root, 'a.txt')]);
  });

  it('warns about missing or non-directory roots and scans the rest', async () => {
    root = await makeTree({ 'a.txt': 'data' });
    const missing = path.join(root, 'does-not-exist');
    const file = path.join(root, 'a.txt');

    const index = await buildSizeIndex([missing, file, root], { recursive: true, onIssue });

    expect(index.filesScanned).toBe(1);
    expect(issues.map((issue) => [issue.stage, issue.code, issue.path])).toEqual([
      ['traverse', ErrorCode.ROOT_NOT_FOUND, missing],
      ['traverse', ErrorCode.NOT_A_DIRECTORY, file],
    ]);
  });

  it('reports a root that exists but cannot be read', async () => {
    root = await makeTree({ 'a.txt': 'data' });
    const blocked = path.join(root, 'a.txt', 'sub');

    const index = await buildSizeIndex([blocked, root], { recursive: true, onIssue });

    expect(index.filesScanned).toBe(1);
    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe(ErrorCode.ROOT_UNREADABLE);
    expect(issues[0].path).toBe(blocked);
    expect(issues[0].message).toContain(`Cannot access '${blocked}', skipped: ENOTDIR`);
  });

  it('warns about an unreadable subdirectory and indexes its siblings', async () => {
    root = await makeTree({
      'a.txt': 'same',
      'locked/hidden.txt': 'same',
      'z.txt': 'same',
    });
    const locked = path.join(root, 'locked');
    readdirMock.mockImplementation(async (dir, options) => {
      if (dir === locked) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: 'EACCES' });
      }
      return actualFs.readdir(dir, options as never);
    });

    const index = await buildSizeIndex([root], { recursive: true, onIssue });

    expect(index.filesScanned).toBe(2);
    expect(index.groups.get(4)?.map((e) => path.basename(e.path))).toEqual(['a.txt', 'z.txt']);
    expect(issues).toEqual([
      {
        stage: 'traverse',
        code: ErrorCode.READ_DIR_FAILED,
        path: locked,
        message: `EACCES: permission denied, scandir '${locked}'`,
      },
    ]);
  });

  it('records a file once when roots overlap', async () => {
    root = await makeTree({
      'top.txt': 'abc',
      'sub/inner.txt': 'abc',
    });

    const index = await buildSizeIndex([root, path.join(root, 'sub')], { recursive: true, onIssue });

    expect(index.filesScanned).toBe(2);
    expect(index.groups.get(3)?.map((e) => path.relative(root, e.path))).toEqual([
      path.join('sub', 'inner.txt'),
      'top.txt',
    ]);
  });

  it('follows file symlinks but never pairs a link with its own target', async () => {
    root = await makeTree({
      'a.txt': 'same',
      'dir/x.txt': 'other',
    });
    await fs.symlink(path.join(root, 'a.txt'), path.join(root, 'link.txt'));
    await fs.symlink(path.join(root, 'dir'), path.join(root, 'zlink'));

    const index = await buildSizeIndex([root], { recursive: true, onIssue });

    expect(index.filesScanned).toBe(2);
    expect(index.groups.get(4)?.map((e) => e.path)).toEqual([path.join(root, 'a.txt')]);
    expect(index.groups.get(5)?.map((e) => e.path)).toEqual([path.join(root, 'dir', 'x.txt')]);
  });

  it('reports a file whose size cannot be read and keeps going', async () => {
    root = await makeTree({ 'a.txt': 'data' });
    const broken = path.join(root, 'broken');
    await fs.symlink(path.join(root, 'gone.txt'), broken);

    const index = await buildSizeIndex([root], { recursive: true, onIssue });

    expect(index.filesScanned).toBe(1);
    expect(issues).toHaveLength(1);
    expect(issues[0].stage).toBe('stat');
    expect(issues[0].code).toBe(ErrorCode.STAT_FAILED);
    expect(issues[0].path).toBe(broken);
    expect(issues[0].message).toContain('ENOENT');
  });

  it('emits a progress event every 100 files', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 205; i++) {
      files[`f${String(i).padStart(3, '0')}.txt`] = String(i);
    }
    root = await makeTree(files);
    const onProgress = jest.fn();

    await buildSizeIndex([root], { recursive: true, onIssue, onProgress });

    expect(onProgress.mock.calls).toEqual([
      [{ stage: 'scan', processed: 100 }],
      [{ stage: 'scan', processed: 200 }],
    ]);
  });

  it('stops when the signal is aborted', async () => {
    root = await makeTree({ 'a.txt': 'data' });
    const controller = new AbortController();
    controller.abort();

    await expect(
      buildSizeIndex([root], { recursive: true, onIssue, signal: controller.signal })
    ).rejects.toMatchObject({ code: ErrorCode.CANCELLED });
  });
});

describe('pruneSizeIndex', () => {
  it('drops sizes held by a single file', () => {
    const groups = new Map([
      [5, [{ path: '/a', realPath: '/a', size: 5 }, { path: '/b', realPath: '/b', size: 5 }]],
      [7, [{ path: '/c', realPath: '/c', size: 7 }]],
    ]);

    const pruned = pruneSizeIndex(groups);

    expect([...pruned.keys()]).toEqual([5]);
    expect(groups.size).toBe(2);
  });
});
