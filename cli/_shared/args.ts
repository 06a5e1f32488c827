import minimist from "minimist";
import { z } from "zod";
import { InvalidArgumentsError } from "@promogen/shared";

export interface FlagOptions {
  boolean?: readonly string[];
  string?: readonly string[];
  alias?: Readonly<Record<string, string>>;
}

/**
 * Optional string flag. A repeated flag arrives as an array and is rejected;
 * a flag given without a value counts as not given.
 */
export const optionalFlag = z
  .string({ invalid_type_error: "Expected a single value" })
  .optional()
  .transform((value) => (value?.trim() ? value : undefined));

export const requiredFlag = z.string({
  required_error: "Required",
  invalid_type_error: "Expected a single value",
});

export function isHelpRequested(argv: readonly string[]): boolean {
  return argv.includes("--help") || argv.includes("-h");
}

/**
 * Parse command flags with minimist. Anything the command does not declare,
 * positional arguments included, is an error.
 * @throws InvalidArgumentsError
 */
export function parseFlags(
  argv: readonly string[],
  options: FlagOptions,
): Record<string, unknown> {
  const unexpected: string[] = [];

  const parsed = minimist([...argv], {
    boolean: [...(options.boolean ?? []), "help"],
    string: [...(options.string ?? [])],
    alias: { h: "help", ...options.alias },
    unknown: (arg) => {
      unexpected.push(arg);
      return false;
    },
  });

  if (unexpected.length > 0) {
    throw new InvalidArgumentsError(
      `Unknown argument: ${unexpected.join(", ")}`,
    );
  }

  return parsed;
}

function describeFlagIssue(issue: z.ZodIssue): string {
  const flag = issue.path.join(".");
  return flag ? `--${flag}: ${issue.message}` : issue.message;
}

/**
 * @throws InvalidArgumentsError listing every bad flag
 */
export function validateFlags<T extends z.ZodTypeAny>(
  schema: T,
  flags: Record<string, unknown>,
): z.output<T> {
  const result = schema.safeParse(flags);

  if (!result.success) {
    throw new InvalidArgumentsError(
      `Invalid arguments: ${result.error.issues.map(describeFlagIssue).join("; ")}`,
    );
  }

  return result.data;
}
