import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { uploadRelativeImages } from '../src/markdown/uploadRelativeImages.js';
import { MissingImageError } from '../src/shared/errors.js';
import { RecordingUploader, captureLogger, makeTempDir, pathExists, writeFiles } from './helpers/fixtures.js';

describe('uploadRelativeImages', () => {
  let root: string;
  let markdownPath: string;
  let outputPath: string;

  beforeEach(async () => {
    root = await makeTempDir();
    markdownPath = path.join(root, 'post.md');
    outputPath = path.join(root, 'post.absolute.md');
    await writeFiles(root, { 'img/a.png': 'a', 'img/b.png': 'b' });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('copies a document without images unchanged', async () => {
    await writeFiles(root, { 'post.md': '# Hello\n\nNo pictures here.\n' });
    const uploader = new RecordingUploader();

    const result = await uploadRelativeImages({ markdownPath, outputPath, uploader });

    expect(result).toEqual({});
    expect(uploader.calls).toEqual([]);
    await expect(fs.readFile(outputPath, 'utf8')).resolves.toBe('# Hello\n\nNo pictures here.\n');
  });

  it('uploads each image once and replaces every occurrence', async () => {
    await writeFiles(root, {
      'post.md': '![a](img/a.png)\n![again](img/a.png)\n![b](img/b.png)\n![web](https://example.com/c.png)\n',
    });
    const uploader = new RecordingUploader();

    const result = await uploadRelativeImages({ markdownPath, outputPath, uploader });

    expect(result).toEqual({ 'img/a.png': 'https://cdn.test/a.png', 'img/b.png': 'https://cdn.test/b.png' });
    expect(uploader.calls).toEqual([
      { imagePath: path.join(root, 'img', 'a.png'), override: false },
      { imagePath: path.join(root, 'img', 'b.png'), override: false },
    ]);
    await expect(fs.readFile(outputPath, 'utf8')).resolves.toBe(
      '![a](https://cdn.test/a.png)\n![again](https://cdn.test/a.png)\n![b](https://cdn.test/b.png)\n![web](https://example.com/c.png)\n'
    );
  });

  it('replaces two spellings of the same image', async () => {
    await writeFiles(root, { 'post.md': '![x](img/a.png) ![y](./img/a.png)' });
    const uploader = new RecordingUploader();

    const result = await uploadRelativeImages({ markdownPath, outputPath, uploader });

    expect(result).toEqual({ 'img/a.png': 'https://cdn.test/a.png', './img/a.png': 'https://cdn.test/a.png' });
    await expect(fs.readFile(outputPath, 'utf8')).resolves.toBe('![x](https://cdn.test/a.png) ![y](https://cdn.test/a.png)');
  });

  it('passes override to the uploader', async () => {
    await writeFiles(root, { 'post.md': '![a](img/a.png)' });
    const uploader = new RecordingUploader();

    await uploadRelativeImages({ markdownPath, outputPath, uploader, override: true });

    expect(uploader.calls).toEqual([{ imagePath: path.join(root, 'img', 'a.png'), override: true }]);
  });

  it('overwrites an existing output file', async () => {
    await writeFiles(root, { 'post.md': '![a](img/a.png)', 'post.absolute.md': 'stale' });
    const { logger, lines } = captureLogger();

    await uploadRelativeImages({ markdownPath, outputPath, uploader: new RecordingUploader(), logger });

    await expect(fs.readFile(outputPath, 'utf8')).resolves.toBe('![a](https://cdn.test/a.png)');
    expect(lines).toEqual([expect.objectContaining({ event: 'document.written', images: 1, outputPath })]);
  });

  it('uploads nothing when an image is missing', async () => {
    await writeFiles(root, { 'post.md': '![a](img/a.png) ![x](img/missing.png)' });
    const uploader = new RecordingUploader();

    await expect(uploadRelativeImages({ markdownPath, outputPath, uploader })).rejects.toBeInstanceOf(MissingImageError);

    expect(uploader.calls).toEqual([]);
    await expect(pathExists(outputPath)).resolves.toBe(false);
  });

  it('writes no output when an upload fails', async () => {
    await writeFiles(root, { 'post.md': '![a](img/a.png) ![b](img/b.png)' });
    const uploader = new RecordingUploader({ failOn: 'b.png' });

    await expect(uploadRelativeImages({ markdownPath, outputPath, uploader })).rejects.toThrow('upload refused for b.png');

    expect(uploader.calls).toHaveLength(2);
    await expect(pathExists(outputPath)).resolves.toBe(false);
  });
});
