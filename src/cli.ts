#!/usr/bin/env node
/**
 * postsignal - CLI
 *
 * Usage:
 *   postsignal --posts posts.json         # Analyse exported posts
 *   postsignal --demo                     # Analyse the bundled demo dataset
 *   postsignal --config postsignal.json --target someone --min-confidence 0.5
 */

import { config } from 'dotenv';
config();

import { parseArgs } from 'util';
import type { AnalysisConfig, AnalysisConfigInput } from './postsignal/config.js';
import { loadConfig, loadConfigFile } from './postsignal/config.js';
import { loadDemoPosts, loadPostsFile } from './postsignal/posts/loader.js';
import { createSignalPipeline } from './postsignal/index.js';
import { logDemoMode, logError, printBanner, printReport } from './postsignal/reporter.js';
import { ConfigurationError, isUsageError } from './postsignal/errors.js';

const USAGE = `Usage: postsignal [--posts file] [--config file] [--target handle] [--limit n] [--min-confidence x] [--demo]`;

function parseNumberFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = Number(value);
  if (Number.isNaN(num)) {
    throw new ConfigurationError(`--${name} must be a number, got '${value}'`);
  }
  return num;
}

function main(argv: string[]): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      posts: { type: 'string', short: 'p' },
      config: { type: 'string', short: 'c' },
      target: { type: 'string', short: 't' },
      limit: { type: 'string', short: 'l' },
      'min-confidence': { type: 'string' },
      demo: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const overrides: AnalysisConfigInput = {
    targetHandle: values.target,
    limit: parseNumberFlag('limit', values.limit),
    minConfidence: parseNumberFlag('min-confidence', values['min-confidence']),
  };
  const analysisConfig: AnalysisConfig = values.config
    ? loadConfigFile(values.config, overrides)
    : loadConfig(overrides);

  const useDemo = values.demo || !values.posts;
  const posts = values.posts && !values.demo ? loadPostsFile(values.posts) : loadDemoPosts();

  printBanner(analysisConfig.targetHandle);
  if (useDemo) logDemoMode();

  const result = createSignalPipeline(analysisConfig).run(posts);
  printReport(result);
  return 0;
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (error) {
  const err = error instanceof Error ? error : new Error(String(error));
  logError(err);
  if (isUsageError(err)) {
    console.error(USAGE);
  }
  process.exitCode = 1;
}
