// src/core/__tests__/index.test.ts
import { describe, it, expect, afterEach } from '@jest/globals';
import * as path from 'path';
import { DuplicateFinder, DuplicateResolver, formatSize, recoverableSpace } from '../index.js';
import { makeTree, removeTree } from './fixtures.js';

describe('public API', () => {
  let root: string;

  afterEach(async () => {
    await removeTree(root);
  });

  it('finds and resolves duplicates through the package entry point', async () => {
    root = await makeTree({ 'a/photo.jpg': 'jpeg-bytes', 'b/photo.jpg': 'jpeg-bytes' });

    const { sets } = await new DuplicateFinder().find([root]);
    expect(formatSize(recoverableSpace(sets))).toBe('10.00 B');

    const summary = await new DuplicateResolver().resolve(sets, { assumeYes: true });
    expect(summary.deleted.map((entry) => entry.path)).toEqual([path.join(root, 'b', 'photo.jpg')]);
  });
});
