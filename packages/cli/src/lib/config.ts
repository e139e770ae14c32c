/**
 * Zod schema for resolved CLI configuration
 */

import { z } from "zod";
import { InvalidArgumentError } from "commander";
import { isSingleCodePoint } from "@wildtrie/core";
import { resolveDictionaryPath, selectDictionary, selectWildcard } from "./env.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  dict?: string;
  wildcard?: string;
  strict?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export const CliConfigSchema = z.object({
  dictionary: z
    .string()
    .min(1, "dictionary path must be non-empty")
    .transform((value) => resolveDictionaryPath(value)),
  wildcard: z.string().superRefine((value, ctx) => {
    if (!isSingleCodePoint(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "wildcard must be exactly one character",
      });
    }
  }),
  strict: z.boolean(),
  verbose: z.boolean(),
  quiet: z.boolean(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Merge CLI options with the environment and validate the result
 * @throws InvalidArgumentError listing every invalid setting
 */
export function resolveConfig(opts: GlobalOptions): CliConfig {
  const result = CliConfigSchema.safeParse({
    dictionary: selectDictionary(opts.dict),
    wildcard: selectWildcard(opts.wildcard),
    strict: opts.strict ?? false,
    verbose: opts.verbose ?? false,
    quiet: opts.quiet ?? false,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid configuration: ${details}`);
  }

  return result.data;
}
