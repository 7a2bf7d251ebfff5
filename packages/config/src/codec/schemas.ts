/**
 * Zod schemas for the configuration wire format.
 *
 * Each schema validates one entity's JSON form and transforms it into the
 * model type, so a successful parse is already a model value. Field, Arg,
 * Step and TSchema objects reject unknown keys; the outer sections (config,
 * server, graphQL, schema) ignore them.
 */

import { z } from "zod";
import { HttpMethodSchema } from "../http/Method.js";
import {
  arraySchema,
  objectSchema,
  optionalSchema,
  scalarSchema,
  ScalarKindSchema,
  type TSchema,
} from "../http/TSchema.js";
import { AbsoluteUrl } from "../model/AbsoluteUrl.js";
import { DEFAULT_CONFIG_VERSION, type Config } from "../model/Config.js";
import type { Arg, Field } from "../model/Field.js";
import { rootSchema, type GraphQL, type RootSchema } from "../model/GraphQL.js";
import type { JsonValue } from "../model/json.js";
import type { Server } from "../model/Server.js";
import { constantStep, httpStep, objPathStep, type Step } from "../model/Step.js";
import { STEP_TAGS } from "./wire.js";

/** Absent and `null` both decode to `undefined`. */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

/**
 * Like `z.record(z.string(), value)`, but keeps every own key. zod's record
 * drops `"__proto__"`, which is a valid JSON key and a valid type or field
 * name here.
 */
function ownRecord<T extends z.ZodTypeAny>(value: T) {
  return z.unknown().transform((input, ctx): Record<string, z.output<T>> => {
    if (typeof input !== "object" || input === null || Array.isArray(input)) {
      ctx.addIssue({
        code: z.ZodIssueCode.invalid_type,
        expected: z.ZodParsedType.object,
        received: z.getParsedType(input),
      });
      return z.NEVER;
    }
    const entries: Array<[string, z.output<T>]> = [];
    let failed = false;
    for (const [key, raw] of Object.entries(input)) {
      const parsed = value.safeParse(raw);
      if (parsed.success) {
        entries.push([key, parsed.data]);
        continue;
      }
      failed = true;
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ ...issue, path: [key, ...issue.path] });
      }
    }
    return failed ? z.NEVER : Object.fromEntries(entries);
  });
}

// ============================================================================
// Leaf values
// ============================================================================

export const JsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    ownRecord(JsonValueSchema),
  ]),
);

export const AbsoluteUrlSchema = z.string().transform((raw, ctx): AbsoluteUrl => {
  const parsed = AbsoluteUrl.parse(raw);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  return parsed.value;
});

export const TSchemaSchema: z.ZodType<TSchema, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    ScalarKindSchema.transform(kind => scalarSchema(kind)),
    z.object({ object: ownRecord(TSchemaSchema) }).strict().transform(wire => objectSchema(wire.object)),
    z.object({ array: TSchemaSchema }).strict().transform(wire => arraySchema(wire.array)),
    z.object({ optional: TSchemaSchema }).strict().transform(wire => optionalSchema(wire.optional)),
  ]),
);

// ============================================================================
// Steps
// ============================================================================

export const HttpJsonSchema = z
  .object({
    path: z.string(),
    method: optional(HttpMethodSchema),
    input: optional(TSchemaSchema),
    output: optional(TSchemaSchema),
  })
  .strict();

export const ObjectPathJsonSchema = ownRecord(z.array(z.string()));

export const StepSchema = z
  .object({
    http: HttpJsonSchema.optional(),
    const: JsonValueSchema.optional(),
    objectPath: ObjectPathJsonSchema.optional(),
  })
  .strict()
  .superRefine((wire, ctx) => {
    const tags = Object.keys(wire);
    if (tags.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected exactly one of ${STEP_TAGS.join(", ")}, found ${tags.length === 0 ? "none" : tags.join(", ")}`,
      });
    }
  })
  .transform((wire): Step => {
    if (wire.http !== undefined) {
      const { path, method, input, output } = wire.http;
      return httpStep(path, { method, input, output });
    }
    if (wire.objectPath !== undefined) {
      return objPathStep(wire.objectPath);
    }
    return constantStep(wire.const ?? null);
  });

// ============================================================================
// Fields and arguments
// ============================================================================

export const ArgSchema = z
  .object({
    type: z.string(),
    isList: optional(z.boolean()),
    isRequired: optional(z.boolean()),
  })
  .strict()
  .transform((wire): Arg => ({
    typeOf: wire.type,
    list: wire.isList === true,
    required: wire.isRequired === true,
  }));

export const FieldSchema = z
  .object({
    type: z.string(),
    isList: optional(z.boolean()),
    isRequired: optional(z.boolean()),
    steps: optional(z.array(StepSchema)),
    args: optional(ownRecord(ArgSchema)),
  })
  .strict()
  .transform((wire): Field => ({
    typeOf: wire.type,
    list: wire.isList === true,
    required: wire.isRequired === true,
    ...(wire.steps !== undefined && { steps: wire.steps }),
    ...(wire.args !== undefined && { args: wire.args }),
  }));

// ============================================================================
// Sections
// ============================================================================

export const RootSchemaSchema = z
  .object({
    query: optional(z.string()),
    mutation: optional(z.string()),
  })
  .transform((wire): RootSchema => rootSchema(wire.query, wire.mutation));

export const GraphQLSchema = z
  .object({
    schema: RootSchemaSchema.default({}),
    types: ownRecord(ownRecord(FieldSchema)).default({}),
  })
  .transform((wire): GraphQL => ({ schema: wire.schema, types: wire.types }));

export const ServerSchema = z
  .object({
    baseURL: optional(AbsoluteUrlSchema),
  })
  .transform((wire): Server => (wire.baseURL === undefined ? {} : { baseURL: wire.baseURL }));

export const ConfigSchema = z
  .object({
    version: z.number().int().default(DEFAULT_CONFIG_VERSION),
    server: ServerSchema.default({}),
    graphQL: GraphQLSchema.default({}),
  })
  .transform((wire): Config => ({ version: wire.version, server: wire.server, graphQL: wire.graphQL }));
