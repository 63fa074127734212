// src/common/config/parse.ts
import YAML from 'yaml';

import { toError } from '@/runner/errors';

/**
 * Parse configuration text by file extension: JSON for ".json", YAML
 * otherwise. An empty document parses to `{}`.
 *
 * @throws Error naming the file when the text does not parse.
 */
export const parseConfigText = (p: string, text: string): unknown => {
  try {
    const v: unknown = p.endsWith('.json') ? JSON.parse(text) : YAML.parse(text);
    return v ?? {};
  } catch (e) {
    throw new Error(
      `docbranch: cannot parse ${p.replace(/\\/g, '/')}: ${toError(e).message}`,
    );
  }
};
