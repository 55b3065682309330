import { z } from "zod";
import { ConfigurationError, formatZodError } from "../errors";

export class ProcessedEnvVar<T> {
  constructor(public value: T) {}
}

type EnvLeaf = z.ZodTypeAny | ProcessedEnvVar<unknown>;

export type EnvSchema = {
  [K: string]: EnvLeaf | EnvSchema;
};

export type InferEnv<T> =
  T extends z.ZodTypeAny
    ? z.infer<T>
    : T extends ProcessedEnvVar<infer U>
      ? U
      : T extends object
        ? { [K in keyof T]: InferEnv<T[K]> }
        : never;

export type EnvSource = Record<string, string | undefined>;

const isZodType = (x: unknown): x is z.ZodTypeAny => x instanceof z.ZodType;

const parseNode = (node: EnvLeaf | EnvSchema, path: string[], source: EnvSource): unknown => {
  if (isZodType(node)) {
    const key = path.join("_");
    const parsed = node.safeParse(source[key]);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Environment variable validation error for ${key}: ${parsed.error.message}`,
        { variable: key, issues: formatZodError(parsed.error) }
      );
    }
    return parsed.data;
  }

  if (node instanceof ProcessedEnvVar) {
    return node.value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(node)) {
    result[key] = parseNode(child, [...path, key], source);
  }
  return result;
};

/**
 * Parses a value that does not come from the variable the schema path names,
 * e.g. a setting supplied by the host.
 */
export function envVariable<Z extends z.ZodTypeAny>(
  source: string | undefined,
  zodType: Z
): ProcessedEnvVar<z.infer<Z>> {
  const parsed = zodType.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Environment variable validation error: ${parsed.error.message}`,
      { issues: formatZodError(parsed.error) }
    );
  }
  return new ProcessedEnvVar(parsed.data);
}

/**
 * Builds a typed settings object from nested zod schemas. Nested keys are
 * joined with underscores to form the variable name:
 *
 * ```typescript
 * const env = createEnv({ SYNC: { DATA_DIR: z.string() } });
 * env.SYNC.DATA_DIR; // reads SYNC_DATA_DIR
 * ```
 */
export const createEnv = <S extends EnvSchema>(
  schema: S,
  source: EnvSource = process.env
): InferEnv<S> => {
  return parseNode(schema, [], source) as InferEnv<S>;
};

export const envBoolean = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(defaultValue ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

export const envInteger = (defaultValue: number, min = 0) =>
  z.coerce.number().int().min(min).default(defaultValue);

export const envOptionalString = () =>
  z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));
