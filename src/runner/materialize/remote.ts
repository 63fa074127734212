/* src/runner/materialize/remote.ts
 * Resolve the canonical URL of the repository that owns materialized branches.
 */
import { RemoteNotFoundError } from '@/runner/errors';
import type { Git } from '@/runner/git';

export type ResolveRemoteArgs = {
  git: Git;
  env?: NodeJS.ProcessEnv;
};

/**
 * Resolve the URL for `remoteName`.
 *
 * A CI-provided `GITHUB_REPOSITORY` ("owner/repo") wins and is turned into a
 * web URL (honoring `GITHUB_SERVER_URL`); otherwise the locally configured
 * remote URL is returned as is.
 *
 * @throws RemoteNotFoundError when neither source yields a value.
 */
export const resolveRemote = async (
  remoteName: string,
  { git, env = process.env }: ResolveRemoteArgs,
): Promise<string> => {
  const coordinate = env.GITHUB_REPOSITORY?.trim();
  if (coordinate) {
    const server = (env.GITHUB_SERVER_URL?.trim() || 'https://github.com')
      .replace(/\/+$/, '');
    return `${server}/${coordinate}`;
  }
  const res = await git.run(['remote', 'get-url', remoteName]);
  const url = res.stdout.trim();
  if (res.code === 0 && url.length > 0) return url;
  throw new RemoteNotFoundError(remoteName);
};

/** Lazily resolved, memoized remote URL for one run. */
export type RemoteIdentity = {
  readonly name: string;
  url: () => Promise<string>;
};

export const createRemoteIdentity = (
  name: string,
  args: ResolveRemoteArgs,
): RemoteIdentity => {
  let pending: Promise<string> | undefined;
  return {
    name,
    url: () => {
      pending ??= resolveRemote(name, args);
      return pending;
    },
  };
};
