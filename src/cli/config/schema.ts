/* src/cli/config/schema.ts
 * Zod schema for relcheck.config.* (all keys optional; CLI flags win).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

const nonEmpty = z.string().min(1, { message: 'must be a non-empty string' });

const argvSchema = z
  .array(nonEmpty)
  .min(1, { message: 'operation must name a command' });

const quickTestSchema = z.union([
  z.object({ test: nonEmpty }).strict(),
  z.object({ examples: nonEmpty }).strict(),
  z.object({ read: nonEmpty }).strict(),
]);

const sessionSchema = z
  .object({
    command: nonEmpty.optional(),
    memory: z
      .string()
      .regex(/^\d+[kmgKMG]?$/, { message: 'memory: expected e.g. 1g, 512m' })
      .optional(),
  })
  .strict()
  .optional();

const buildSchema = z
  .object({
    clean: argvSchema.optional(),
    configure: argvSchema.optional(),
    make: argvSchema.optional(),
  })
  .strict()
  .optional();

const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
    verbose: coerceBool,
    keep: coerceBool,
  })
  .strict()
  .optional();

export const configSchema = z
  .object({
    roots: z.union([nonEmpty, z.array(nonEmpty).min(1)]).optional(),
    pkgDir: nonEmpty.optional(),
    pkgName: nonEmpty.optional(),
    loadName: nonEmpty.optional(),
    companion: nonEmpty.optional(),
    dependencies: z.array(nonEmpty).optional(),
    toggle: nonEmpty.optional(),
    quickTests: z.array(quickTestSchema).optional(),
    session: sessionSchema,
    build: buildSchema,
    progress: z
      .object({ intervalMs: z.coerce.number().int().positive().optional() })
      .strict()
      .optional(),
    logDir: nonEmpty.optional(),
    cliDefaults: cliDefaultsSchema,
  })
  .strict();

export type RelcheckConfig = z.infer<typeof configSchema>;
export type CliDefaults = NonNullable<RelcheckConfig['cliDefaults']>;
