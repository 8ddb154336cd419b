import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { LocalRelocator } from '../../lib/relocation/local';

describe('LocalRelocator', () => {
  let tempDir: string;
  let sourceRoot: string;
  let targetRoot: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'local-relocator-'));
    sourceRoot = path.join(tempDir, 'Papers2');
    targetRoot = path.join(tempDir, 'Linked');
    await fs.mkdir(path.join(sourceRoot, 'Articles', 'Abe'), { recursive: true });
    await fs.writeFile(path.join(sourceRoot, 'Articles', 'Abe', 'Abe 2008.pdf'), 'PDFDATA');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should resolve slash-separated paths under each root', () => {
    const relocator = new LocalRelocator({ sourceRoot, targetRoot });

    expect(relocator.resolveSource('Articles/Abe/Abe 2008.pdf'))
      .toBe(path.join(sourceRoot, 'Articles', 'Abe', 'Abe 2008.pdf'));
    expect(relocator.resolveTarget('Journal Article/Abe 2008.pdf'))
      .toBe(path.join(targetRoot, 'Journal Article', 'Abe 2008.pdf'));
  });

  it('should copy into nested target folders and keep the source', async () => {
    const relocator = new LocalRelocator({ sourceRoot, targetRoot });

    const moved = await relocator.move('Articles/Abe/Abe 2008.pdf', 'Journal Article/2008/Abe 2008.pdf');

    expect(moved).toBe(true);
    expect(await fs.readFile(path.join(targetRoot, 'Journal Article', '2008', 'Abe 2008.pdf'), 'utf-8')).toBe('PDFDATA');
    expect(await fs.readFile(path.join(sourceRoot, 'Articles', 'Abe', 'Abe 2008.pdf'), 'utf-8')).toBe('PDFDATA');
  });

  it('should remove the source in move mode', async () => {
    const relocator = new LocalRelocator({ sourceRoot, targetRoot, mode: 'move' });

    expect(await relocator.move('Articles/Abe/Abe 2008.pdf', 'Abe 2008.pdf')).toBe(true);

    expect(await fs.readFile(path.join(targetRoot, 'Abe 2008.pdf'), 'utf-8')).toBe('PDFDATA');
    await expect(fs.access(path.join(sourceRoot, 'Articles', 'Abe', 'Abe 2008.pdf'))).rejects.toThrow();
  });

  it('should return false when the source is missing', async () => {
    const relocator = new LocalRelocator({ sourceRoot, targetRoot });

    expect(await relocator.move('Articles/missing.pdf', 'missing.pdf')).toBe(false);
    await expect(fs.access(path.join(targetRoot, 'missing.pdf'))).rejects.toThrow();
  });
});
