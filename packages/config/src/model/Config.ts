import type { AbsoluteUrl } from "./AbsoluteUrl.js";
import type { FieldMap } from "./Field.js";
import {
  emptyGraphQL,
  rootSchema,
  withGraphQLMutation,
  withGraphQLQuery,
  withGraphQLType,
  type GraphQL,
} from "./GraphQL.js";
import { emptyServer, type Server } from "./Server.js";

/**
 * Effective gateway configuration.
 *
 * Values are never mutated: every builder below, as well as `mergeRight` and
 * `compressConfig`, returns a new Config.
 */
export interface Config {
  readonly version: number;
  readonly server: Server;
  readonly graphQL: GraphQL;
}

export type ConfigInit = {
  version?: number;
  server?: Server;
  graphQL?: GraphQL;
};

export const DEFAULT_CONFIG_VERSION = 0;

export function createConfig(init: ConfigInit = {}): Config {
  return {
    version: init.version ?? DEFAULT_CONFIG_VERSION,
    server: init.server ?? emptyServer(),
    graphQL: init.graphQL ?? emptyGraphQL(),
  };
}

export function emptyConfig(): Config {
  return createConfig();
}

export function withVersion(config: Config, version: number): Config {
  return { ...config, version };
}

export function withBaseUrl(config: Config, baseURL: AbsoluteUrl | undefined): Config {
  const { baseURL: _previous, ...server } = config.server;
  return { ...config, server: baseURL === undefined ? server : { ...server, baseURL } };
}

export function withQuery(config: Config, query: string): Config {
  return { ...config, graphQL: withGraphQLQuery(config.graphQL, query) };
}

export function withMutation(config: Config, mutation: string): Config {
  return { ...config, graphQL: withGraphQLMutation(config.graphQL, mutation) };
}

/**
 * Replaces the root schema. Either name left out of `names` keeps its current
 * value; pass it explicitly as `undefined` to clear it.
 */
export function withRootSchema(config: Config, names: { query?: string; mutation?: string }): Config {
  const current = config.graphQL.schema;
  const query = "query" in names ? names.query : current.query;
  const mutation = "mutation" in names ? names.mutation : current.mutation;
  return { ...config, graphQL: { ...config.graphQL, schema: rootSchema(query, mutation) } };
}

/** Registers whole types, replacing same-named ones. */
export function withType(config: Config, ...types: Array<readonly [name: string, fields: FieldMap]>): Config {
  let graphQL = config.graphQL;
  for (const [name, fields] of types) {
    graphQL = withGraphQLType(graphQL, name, fields);
  }
  return { ...config, graphQL };
}
