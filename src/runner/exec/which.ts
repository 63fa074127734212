/* src/runner/exec/which.ts
 * PATH lookup for `# pragma: requires` tools.
 */
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { delimiter, join } from 'node:path';

const isExecutable = async (abs: string): Promise<boolean> => {
  try {
    await access(abs, constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/** True when `tool` resolves to an executable on PATH. */
export const hasTool = async (
  tool: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<boolean> => {
  if (tool.includes('/')) return isExecutable(tool);
  const dirs = (env.PATH ?? '').split(delimiter).filter((d) => d.length > 0);
  for (const dir of dirs) {
    if (await isExecutable(join(dir, tool))) return true;
  }
  return false;
};

/** Tools from `requires` that are not on PATH, in declaration order. */
export const missingTools = async (
  requires: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<string[]> => {
  const out: string[] = [];
  for (const t of requires) if (!(await hasTool(t, env))) out.push(t);
  return out;
};
