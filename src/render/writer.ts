/**
 * Environ Digest — Context Writer
 *
 * Persists the render context for the template step.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { RenderContext } from './context';
import { logger } from '../lib/logger';

export const CONTEXT_FILENAME = 'context.json';

export function serializeContext(context: RenderContext): string {
  return `${JSON.stringify(context, null, 2)}\n`;
}

/**
 * Write `context.json` into `outputDir`, creating it if needed.
 * Returns the written path.
 */
export async function writeContext(context: RenderContext, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const target = path.join(outputDir, CONTEXT_FILENAME);
  await writeFile(target, serializeContext(context), 'utf-8');

  logger.info('Render context written', {
    path: target,
    categories: Object.keys(context.categories).length,
    items: context.all.length,
  });

  return target;
}
