/**
 * Tests for writing the render context
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { writeContext, CONTEXT_FILENAME } from '../../src/render/writer';
import type { RenderContext } from '../../src/render/context';

const context: RenderContext = {
  site: { name: 'Test Digest', nav: [{ key: 'water', label: 'Water', href: 'water.html' }] },
  updatedAt: '2024-03-01 08:05 UTC',
  generatedAt: '2024-03-01T08:05:00.000Z',
  categories: {
    water: [
      {
        title: 'Dam opens',
        link: 'https://example.org/dam',
        source: 'River Watch',
        summary: 'Gates open',
        category: 'water',
        publishedAt: '2024-01-01T10:00:00.000Z',
        publishedLabel: '2024-01-01 10:00 UTC',
      },
    ],
  },
  all: [],
};

describe('writeContext', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'digest-writer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create the output directory and write context.json', async () => {
    const outputDir = path.join(dir, 'nested', 'site');
    const written = await writeContext(context, outputDir);

    expect(written).toBe(path.join(outputDir, CONTEXT_FILENAME));

    const text = await readFile(written, 'utf-8');
    expect(text.endsWith('\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(context);
  });
});
