import { createAppAuth } from '@octokit/auth-app';
import { Octokit } from '@octokit/rest';
import type { GitHubAuth } from '../config.js';

export async function createGitHubClient(auth: GitHubAuth): Promise<Octokit> {
  if (auth.type === 'token') {
    return new Octokit({ auth: auth.token });
  }

  const appAuth = createAppAuth({
    appId: auth.appId,
    privateKey: auth.privateKey,
  });

  const installationAuth = await appAuth({
    type: 'installation',
    installationId: auth.installationId,
  });

  return new Octokit({
    auth: installationAuth.token,
  });
}
