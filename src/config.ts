import { z } from 'zod';
import { LOG_THRESHOLDS } from './observability/logger.js';
import type { LogThreshold } from './observability/logger.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

const optionalSetting = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

// dotenv writes `KEY=` as an empty string
function unsetWhenBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);
}

const envSchema = z
  .object({
    GITHUB_TOKEN: optionalSetting,
    GITHUB_APP_ID: optionalSetting,
    GITHUB_PRIVATE_KEY: optionalSetting,
    GITHUB_INSTALLATION_ID: unsetWhenBlank(z.coerce.number().int().positive().optional()),
    GITHUB_REPOSITORY: z
      .string({ required_error: 'Required' })
      .regex(/^[^/\s]+\/[^/\s]+$/, 'Expected "owner/repo"'),
    GITHUB_SERVER_URL: unsetWhenBlank(z.string().url().default('https://github.com')),
    GITHUB_RUN_ID: optionalSetting,
    PR_NUMBER: z
      .string({ required_error: 'Required' })
      .trim()
      .min(1, 'Required')
      .pipe(z.coerce.number().int().positive()),
    ANTHROPIC_API_KEY: z.string({ required_error: 'Required' }).min(1, 'Required'),
    ANTHROPIC_MODEL: unsetWhenBlank(z.string().min(1).default(DEFAULT_MODEL)),
    ANTHROPIC_MAX_TOKENS: unsetWhenBlank(z.coerce.number().int().positive().default(4096)),
    LOG_LEVEL: unsetWhenBlank(
      z.preprocess(
        value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
        z.enum(LOG_THRESHOLDS)
      ).default('info')
    ),
  })
  .superRefine((env, ctx) => {
    if (env.GITHUB_TOKEN) {
      return;
    }
    const missing = (['GITHUB_APP_ID', 'GITHUB_PRIVATE_KEY', 'GITHUB_INSTALLATION_ID'] as const).filter(
      key => env[key] === undefined
    );
    if (missing.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GITHUB_TOKEN'],
        message: `Required unless GitHub App credentials are set (missing ${missing.join(', ')})`,
      });
    }
  });

export type GitHubAuth =
  | { type: 'token'; token: string }
  | { type: 'app'; appId: string; privateKey: string; installationId: number };

export interface Config {
  github: {
    auth: GitHubAuth;
    owner: string;
    repo: string;
    pullNumber: number;
    serverUrl: string;
    runId?: string;
  };
  anthropic: {
    apiKey: string;
    model: string;
    maxTokens: number;
  };
  logLevel: LogThreshold;
}

export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

function resolveAuth(env: z.output<typeof envSchema>): GitHubAuth {
  if (env.GITHUB_TOKEN) {
    return { type: 'token', token: env.GITHUB_TOKEN };
  }
  if (env.GITHUB_APP_ID && env.GITHUB_PRIVATE_KEY && env.GITHUB_INSTALLATION_ID) {
    return {
      type: 'app',
      appId: env.GITHUB_APP_ID,
      privateKey: env.GITHUB_PRIVATE_KEY.replace(/\\n/g, '\n'),
      installationId: env.GITHUB_INSTALLATION_ID,
    };
  }
  throw new ConfigurationError(['GITHUB_TOKEN: no GitHub credentials configured']);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const [owner, repo] = parsed.GITHUB_REPOSITORY.split('/');

  return {
    github: {
      auth: resolveAuth(parsed),
      owner,
      repo,
      pullNumber: parsed.PR_NUMBER,
      serverUrl: parsed.GITHUB_SERVER_URL.replace(/\/+$/, ''),
      runId: parsed.GITHUB_RUN_ID,
    },
    anthropic: {
      apiKey: parsed.ANTHROPIC_API_KEY,
      model: parsed.ANTHROPIC_MODEL,
      maxTokens: parsed.ANTHROPIC_MAX_TOKENS,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}

export function workflowRunUrl(config: Config): string | undefined {
  const { serverUrl, owner, repo, runId } = config.github;
  return runId ? `${serverUrl}/${owner}/${repo}/actions/runs/${runId}` : undefined;
}
