/**
 * Schema for the optional `.promote.yaml` project file.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const REF_NAME_PATTERN = /^[A-Za-z0-9._\-/]+$/;

/**
 * Whether a branch or remote name is safe to hand to git.
 * A subset of git-check-ref-format: no leading dash, no "..", no "//",
 * no leading or trailing slash, no trailing dot or ".lock".
 */
export function isValidRefName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length < 256 &&
    REF_NAME_PATTERN.test(name) &&
    !name.startsWith('-') &&
    !name.startsWith('/') &&
    !name.endsWith('/') &&
    !name.endsWith('.') &&
    !name.endsWith('.lock') &&
    !name.includes('..') &&
    !name.includes('//')
  );
}

export const RefNameSchema = z.string().refine(isValidRefName, {
  message: 'must be a valid git ref name',
});

/** Branch names used by the workflow. */
export const BranchesSchema = z.object({
  /** Source branch merged into main */
  dev: RefNameSchema.default('dev'),
  /** Target branch that receives the merge and is pushed */
  main: RefNameSchema.default('main'),
});

export const ConfigSchema = z.object({
  /** Remote fetched from and pushed to */
  remote: RefNameSchema.default('origin'),
  branches: withDefaults(BranchesSchema),
});

/** A config file's top level; an empty file parses to null. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

export type Config = z.infer<typeof ConfigSchema>;
export type BranchesConfig = z.infer<typeof BranchesSchema>;
