/* src/cli/config/schema.ts
 * Zod schema for docbranch.config.* (all keys optional).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

const segment = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9._-]+$/, {
    message: 'must be a single ref segment (letters, digits, ".", "_", "-")',
  });

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
    push: coerceBool,
  })
  .strict()
  .optional();
export type CliDefaults = z.infer<typeof cliDefaultsSchema>;

export const configSchema = z
  .object({
    contentDir: z.string().min(1).optional(),
    namespace: segment.optional(),
    notesRef: z
      .string()
      .regex(/^refs\/notes\/\S+$/, { message: 'must start with refs/notes/' })
      .optional(),
    remote: z.string().min(1).optional(),
    /** seconds */
    gitTimeout: z.coerce.number().int().positive().optional(),
    /** seconds; a snippet's own `timeout` pragma wins */
    snippetTimeout: z.coerce.number().int().positive().optional(),
    cliDefaults: cliDefaultsSchema,
  })
  .strict();
export type Config = z.infer<typeof configSchema>;
