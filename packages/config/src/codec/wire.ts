/**
 * JSON shapes of the configuration format. The model uses different names in
 * a few places (`typeOf` is `type`, `list` is `isList`, `required` is
 * `isRequired`) and Step/TSchema variants are tagged by a single key.
 */
import type { HttpMethod } from "../http/Method.js";
import type { ScalarKind } from "../http/TSchema.js";
import type { JsonValue } from "../model/json.js";

export type TSchemaJson =
  | ScalarKind
  | { object: { [field: string]: TSchemaJson } }
  | { array: TSchemaJson }
  | { optional: TSchemaJson };

export type HttpJson = {
  path: string;
  method?: HttpMethod;
  input?: TSchemaJson;
  output?: TSchemaJson;
};

export type StepJson =
  | { http: HttpJson }
  | { const: JsonValue }
  | { objectPath: { [field: string]: string[] } };

export const STEP_TAGS = ["http", "const", "objectPath"] as const;

export type StepTag = (typeof STEP_TAGS)[number];

export type ArgJson = {
  type: string;
  isList?: boolean;
  isRequired?: boolean;
};

export type FieldJson = ArgJson & {
  steps?: StepJson[];
  args?: { [arg: string]: ArgJson };
};

export type RootSchemaJson = {
  query?: string;
  mutation?: string;
};

export type GraphQLJson = {
  schema: RootSchemaJson;
  types: { [typeName: string]: { [fieldName: string]: FieldJson } };
};

export type ServerJson = {
  baseURL?: string;
};

export type ConfigJson = {
  version: number;
  server: ServerJson;
  graphQL: GraphQLJson;
};
