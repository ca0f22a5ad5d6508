import { test, expect, describe } from "vitest";
import { z } from "zod";
import {
  buildDynamic,
  createEnvironment,
  environmentSchema,
  lazilyValidate,
} from "../environment";

describe("buildDynamic", () => {
  test("coerces booleans and leaves enums as strings", () => {
    const result = buildDynamic(environmentSchema, {
      HUFF_TRIM_TRAILING_WHITESPACE: "TRUE",
      HUFF_STATS_MODE: "extended",
    });

    expect(result).toEqual({
      NODE_ENV: undefined,
      LOG_LEVEL: undefined,
      HUFF_STATS_MODE: "extended",
      HUFF_TRIM_TRAILING_WHITESPACE: true,
    });
  });

  test("coerces numbers through optional and default wrappers", () => {
    const schema = z.object({
      PORT: z.number().default(4000),
      RETRIES: z.number().optional(),
    });

    expect(buildDynamic(schema, { PORT: "4001", RETRIES: "3" })).toEqual({
      PORT: 4001,
      RETRIES: 3,
    });
  });

  test("treats empty strings as unset", () => {
    const result = buildDynamic(environmentSchema, { NODE_ENV: "" });
    expect(result.NODE_ENV).toBeUndefined();
  });
});

describe("createEnvironment", () => {
  test("applies defaults", () => {
    const env = createEnvironment({});

    expect(env.NODE_ENV).toBe("production");
    expect(env.LOG_LEVEL).toBeUndefined();
    expect(env.HUFF_STATS_MODE).toBe("disabled");
    expect(env.HUFF_TRIM_TRAILING_WHITESPACE).toBe(false);
  });

  test("reads provided values", () => {
    const env = createEnvironment({
      NODE_ENV: "development",
      LOG_LEVEL: "warn",
      HUFF_TRIM_TRAILING_WHITESPACE: "false",
    });

    expect(env.NODE_ENV).toBe("development");
    expect(env.LOG_LEVEL).toBe("warn");
    expect(env.HUFF_TRIM_TRAILING_WHITESPACE).toBe(false);
  });

  test("defers validation until first access", () => {
    const env = createEnvironment({ HUFF_STATS_MODE: "verbose" });
    expect(() => env.HUFF_STATS_MODE).toThrow(
      "Missing or invalid environment variables."
    );
  });
});

test("lazilyValidate caches the parsed result", () => {
  const source: Record<string, unknown> = { NAME: "first" };
  const env = lazilyValidate(z.object({ NAME: z.string() }), source);

  expect(env.NAME).toBe("first");
  source.NAME = "second";
  expect(env.NAME).toBe("first");
});
