import type { z } from "zod";
import type { TSchema } from "../http/TSchema.js";
import { AbsoluteUrl } from "../model/AbsoluteUrl.js";
import type { Config } from "../model/Config.js";
import type { Arg, Field } from "../model/Field.js";
import type { GraphQL, RootSchema } from "../model/GraphQL.js";
import type { Server } from "../model/Server.js";
import { assertNeverStep, type HttpStep, type Step } from "../model/Step.js";
import { err, ok, type Result } from "../utils/result.js";
import { DecodeError } from "./DecodeError.js";
import {
  ArgSchema,
  ConfigSchema,
  FieldSchema,
  GraphQLSchema,
  RootSchemaSchema,
  ServerSchema,
  StepSchema,
  TSchemaSchema,
} from "./schemas.js";
import type {
  ArgJson,
  ConfigJson,
  FieldJson,
  GraphQLJson,
  HttpJson,
  RootSchemaJson,
  ServerJson,
  StepJson,
  TSchemaJson,
} from "./wire.js";

export type EncodeOptions = {
  /** Emit type, field, argument and object-path keys in sorted order. */
  sortKeys?: boolean;
};

export type StringifyOptions = EncodeOptions & {
  indent?: number;
};

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function mapRecord<T, U>(
  record: Readonly<Record<string, T>>,
  options: EncodeOptions,
  encode: (value: T) => U,
): Record<string, U> {
  const entries = Object.entries(record);
  if (options.sortKeys) {
    entries.sort(([a], [b]) => compareKeys(a, b));
  }
  return Object.fromEntries(entries.map(([key, value]) => [key, encode(value)]));
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeUrl(url: AbsoluteUrl): string {
  return url.href;
}

export function encodeTSchema(schema: TSchema, options: EncodeOptions = {}): TSchemaJson {
  switch (schema.kind) {
    case "object":
      return { object: mapRecord(schema.fields, options, field => encodeTSchema(field, options)) };
    case "array":
      return { array: encodeTSchema(schema.item, options) };
    case "optional":
      return { optional: encodeTSchema(schema.schema, options) };
    default:
      return schema.kind;
  }
}

function encodeHttp(step: HttpStep, options: EncodeOptions): HttpJson {
  return {
    path: step.path,
    ...(step.method !== undefined && { method: step.method }),
    ...(step.input !== undefined && { input: encodeTSchema(step.input, options) }),
    ...(step.output !== undefined && { output: encodeTSchema(step.output, options) }),
  };
}

export function encodeStep(step: Step, options: EncodeOptions = {}): StepJson {
  switch (step.kind) {
    case "http":
      return { http: encodeHttp(step, options) };
    case "constant":
      return { const: step.json };
    case "objectPath":
      return { objectPath: mapRecord(step.map, options, segments => [...segments]) };
    default:
      return assertNeverStep(step);
  }
}

export function encodeArg(arg: Arg): ArgJson {
  return {
    type: arg.typeOf,
    ...(arg.list && { isList: true }),
    ...(arg.required && { isRequired: true }),
  };
}

export function encodeField(field: Field, options: EncodeOptions = {}): FieldJson {
  return {
    ...encodeArg(field),
    ...(field.steps !== undefined && { steps: field.steps.map(step => encodeStep(step, options)) }),
    ...(field.args !== undefined && { args: mapRecord(field.args, options, encodeArg) }),
  };
}

export function encodeRootSchema(schema: RootSchema): RootSchemaJson {
  return {
    ...(schema.query !== undefined && { query: schema.query }),
    ...(schema.mutation !== undefined && { mutation: schema.mutation }),
  };
}

export function encodeGraphQL(graphQL: GraphQL, options: EncodeOptions = {}): GraphQLJson {
  return {
    schema: encodeRootSchema(graphQL.schema),
    types: mapRecord(graphQL.types, options, fields =>
      mapRecord(fields, options, field => encodeField(field, options)),
    ),
  };
}

export function encodeServer(server: Server): ServerJson {
  return server.baseURL === undefined ? {} : { baseURL: encodeUrl(server.baseURL) };
}

export function encodeConfig(config: Config, options: EncodeOptions = {}): ConfigJson {
  return {
    version: config.version,
    server: encodeServer(config.server),
    graphQL: encodeGraphQL(config.graphQL, options),
  };
}

export function stringifyConfig(config: Config, options: StringifyOptions = {}): string {
  return `${JSON.stringify(encodeConfig(config, options), null, options.indent ?? 2)}\n`;
}

// ============================================================================
// Decoding
// ============================================================================

function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): Result<T, DecodeError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(DecodeError.fromZodError(parsed.error));
}

export function decodeUrl(input: unknown): Result<AbsoluteUrl, DecodeError> {
  if (typeof input !== "string") {
    return err(DecodeError.at("", `Expected string, received ${input === null ? "null" : typeof input}`));
  }
  const parsed = AbsoluteUrl.parse(input);
  return parsed.ok ? ok(parsed.value) : err(DecodeError.at("", parsed.error));
}

export function decodeTSchema(input: unknown): Result<TSchema, DecodeError> {
  return decodeWith(TSchemaSchema, input);
}

export function decodeStep(input: unknown): Result<Step, DecodeError> {
  return decodeWith(StepSchema, input);
}

export function decodeArg(input: unknown): Result<Arg, DecodeError> {
  return decodeWith(ArgSchema, input);
}

export function decodeField(input: unknown): Result<Field, DecodeError> {
  return decodeWith(FieldSchema, input);
}

export function decodeRootSchema(input: unknown): Result<RootSchema, DecodeError> {
  return decodeWith(RootSchemaSchema, input);
}

export function decodeGraphQL(input: unknown): Result<GraphQL, DecodeError> {
  return decodeWith(GraphQLSchema, input);
}

export function decodeServer(input: unknown): Result<Server, DecodeError> {
  return decodeWith(ServerSchema, input);
}

export function decodeConfig(input: unknown): Result<Config, DecodeError> {
  return decodeWith(ConfigSchema, input);
}

/** Parses JSON text and decodes it as a Config. */
export function parseConfig(text: string): Result<Config, DecodeError> {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(DecodeError.at("", `Invalid JSON: ${reason}`));
  }
  return decodeConfig(document);
}
