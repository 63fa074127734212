/* src/index.ts
 * Library surface: materialization engine, reaper, and CLI factory.
 */
export { makeCli } from './cli';
export { loadConfigSync, type LoadedConfig } from './cli/config/load';
export * from './runner/errors';
export { type CommandResult, type CommandRunner, runCommand } from './runner/exec/command';
export { Git } from './runner/git';
export {
  branchId,
  branchRef,
  DEFAULT_NAMESPACE,
  parseBranchId,
  worktreePath,
} from './runner/materialize/branch';
export { CacheStore, DEFAULT_NOTES_REF, formatRecord, parseRecord } from './runner/materialize/cache';
export { SnapshotExecutor } from './runner/materialize/executor';
export { createRemoteIdentity, resolveRemote } from './runner/materialize/remote';
export { Materializer, type SnapshotSource } from './runner/materialize/service';
export {
  rewriteGitmodulesText,
  rewriteSubmodules,
} from './runner/materialize/submodules';
export { type ArtifactTarget, GitArtifactTarget, gitTargets } from './runner/materialize/target';
export type * from './runner/materialize/types';
export { deleteBranch, listMaterialized, reap } from './runner/reap/service';
export { locateSnippets, snippetsInDocument } from './runner/snippets/locate';
export { parsePragmas, toSnippet } from './runner/snippets/annotations';
export { fingerprint } from './runner/util/hash';
