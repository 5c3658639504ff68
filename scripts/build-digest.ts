/**
 * Environ Digest — Build Script
 *
 * Fetches every configured feed and writes the render context.
 *
 * Usage:
 *   npm run digest                      # writes <OUTPUT_DIR>/context.json
 *   npm run digest -- --dry-run         # fetch and log only
 *   npm run digest -- --output <dir>    # override OUTPUT_DIR
 *
 * Exits 1 when the source list cannot be loaded (or on an unexpected error);
 * failing sources and unusable site or environment settings do not fail the run.
 */

import 'dotenv/config';
import path from 'path';
import { loadEnvironmentConfig } from '../src/config/environment';
import { loadDigestConfig } from '../src/config/loader';
import { runPipeline } from '../src/pipeline';
import { writeContext } from '../src/render/writer';
import { ConfigInvalidError, errorMessage } from '../src/lib/errors';
import { logger, setLogLevel, timeOperation } from '../src/lib/logger';

interface BuildOptions {
  dryRun: boolean;
  outputDir?: string;
}

function parseArgs(): BuildOptions {
  const args = process.argv.slice(2);
  const options: BuildOptions = { dryRun: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--dry-run') {
      options.dryRun = true;
    } else if (args[i] === '--output' && args[i + 1]) {
      options.outputDir = path.resolve(args[i + 1]);
      i++;
    }
  }

  return options;
}

async function main(): Promise<number> {
  const options = parseArgs();

  try {
    const env = loadEnvironmentConfig();
    setLogLevel(env.logLevel);

    const config = await loadDigestConfig(env, env.fetch);
    const result = await runPipeline(config);

    for (const summary of result.summaries) {
      console.log(
        `${summary.category.padEnd(20)} ${String(summary.itemsKept).padStart(4)} items ` +
        `(${summary.sourcesAttempted - summary.sourcesFailed}/${summary.sourcesAttempted} sources)`
      );
    }

    if (options.dryRun) {
      logger.info('Dry run, context not written');
    } else {
      const outputDir = options.outputDir ?? env.outputDir;
      await timeOperation('Write context', () => writeContext(result.context, outputDir));
    }

    return 0;
  } catch (error) {
    if (error instanceof ConfigInvalidError) {
      logger.error('Configuration invalid', { path: error.configPath, issues: error.issues });
      console.error(`\n${error.message}`);
      return 1;
    }
    // Anything else is a bug, not a feed problem
    logger.error('Build failed', { error: errorMessage(error) });
    return 1;
  }
}

main().then(code => {
  process.exitCode = code;
});
