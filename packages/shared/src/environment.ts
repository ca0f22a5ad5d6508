import { z } from "zod";

type ZodSchemaShape = z.ZodRawShape;

export const logLevelNames = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export const statsModes = ["disabled", "performance-only", "extended"] as const;

export const environmentSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  LOG_LEVEL: z.enum(logLevelNames).optional(),
  HUFF_STATS_MODE: z.enum(statsModes).default("disabled"),
  HUFF_TRIM_TRAILING_WHITESPACE: z.boolean().default(false),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Reads every key of the schema from `source` and coerces the raw strings
 * into the type the schema expects, so that `safeParse` sees numbers and
 * booleans rather than their string spellings.
 */
export function buildDynamic<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  source: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const envVarsToParse: Record<string, unknown> = {};
  for (const key of Object.keys(schema.shape)) {
    envVarsToParse[key] = coerceValue(key, source[key], schema);
  }
  return envVarsToParse;
}

function coerceValue<T extends ZodSchemaShape>(
  key: string,
  value: string | undefined,
  schema: z.ZodObject<T>
): unknown {
  if (value === undefined || value === "") return undefined;

  let fieldSchema: z.ZodTypeAny = schema.shape[key];

  // Unwrap ZodDefault and ZodOptional to get the underlying type
  while (
    fieldSchema instanceof z.ZodDefault ||
    fieldSchema instanceof z.ZodOptional
  ) {
    fieldSchema = fieldSchema._def.innerType;
  }

  if (fieldSchema instanceof z.ZodNumber) {
    return Number(value);
  } else if (fieldSchema instanceof z.ZodBoolean) {
    const normalized = value.trim().toLowerCase();
    return normalized === "true" || normalized === "1";
  }

  return value;
}

// Lazy validation utility for environment variables
export function lazilyValidate<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  environmentMap: Record<string, unknown>
): z.infer<z.ZodObject<T>> {
  let _variables: z.infer<z.ZodObject<T>> | null = null;

  function validateEnvironment(): z.infer<z.ZodObject<T>> {
    if (_variables) return _variables;

    const parsed = schema.safeParse(environmentMap);

    if (!parsed.success) {
      console.error(parsed.error.format());
      throw new Error(`Missing or invalid environment variables.`);
    }

    _variables = parsed.data;
    return _variables;
  }

  return new Proxy({} as z.infer<z.ZodObject<T>>, {
    get(_target, prop) {
      return Reflect.get(validateEnvironment(), prop);
    },
  });
}

export function createEnvironment(
  source: NodeJS.ProcessEnv = process.env
): Environment {
  return lazilyValidate(environmentSchema, buildDynamic(environmentSchema, source));
}

export const variables = createEnvironment();
