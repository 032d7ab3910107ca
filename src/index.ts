#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig, ConfigurationError } from './config.js';
import type { Config } from './config.js';
import { createGitHubClient } from './github/client.js';
import { ClaudeClient } from './generation/claude-client.js';
import { runReview } from './runner.js';
import { logger, generateReviewId, describeError } from './observability/logger.js';

dotenv.config();

async function main(): Promise<number> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error('configuration', 'Configuration error', {
      error: describeError(error),
      issues: error instanceof ConfigurationError ? error.issues : undefined,
    });
    return 1;
  }

  logger.setLevel(config.logLevel);

  const reviewId = generateReviewId();
  logger.setContext({
    reviewId,
    repository: `${config.github.owner}/${config.github.repo}`,
    pullNumber: config.github.pullNumber,
  });

  try {
    const octokit = await createGitHubClient(config.github.auth);
    const generator = new ClaudeClient(config.anthropic);
    const finalState = await runReview(config, { octokit, generator }, reviewId);

    // A FAIL verdict is reported through the commit status, not the exit code.
    logger.info('exit', `Review completed with ${finalState.decision}`);
    return 0;
  } catch (error) {
    logger.error('review_failed', 'Unhandled error during review', {
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  } finally {
    logger.clearContext();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error('fatal', 'Review process crashed', { error: describeError(error) });
    process.exitCode = 1;
  });
