/**
 * Gatewise configuration core
 *
 * Models a GraphQL gateway configuration (types, fields, arguments and the
 * step pipelines that resolve fields), overlays several configurations into
 * one, compresses a configuration to its minimal form and converts it to and
 * from its JSON wire format.
 *
 * @example
 * ```typescript
 * import {
 *   asList,
 *   compressConfig,
 *   createConfig,
 *   createField,
 *   httpStep,
 *   mergeRight,
 *   stringifyConfig,
 *   withQuery,
 *   withType,
 * } from '@gatewise/config';
 *
 * const base = withType(withQuery(createConfig({ version: 1 }), 'Query'), [
 *   'Query',
 *   { users: asList(createField('User', httpStep('/users', { method: 'GET' }))) },
 * ]);
 * const local = createConfig({ version: 2 });
 *
 * process.stdout.write(stringifyConfig(compressConfig(mergeRight(base, local))));
 * ```
 */

// Model
export { AbsoluteUrl } from "./model/AbsoluteUrl.js";
export {
  createConfig,
  emptyConfig,
  withBaseUrl,
  withMutation,
  withQuery,
  withRootSchema,
  withType,
  withVersion,
  DEFAULT_CONFIG_VERSION,
} from "./model/Config.js";
export {
  asList,
  asRequired,
  boolArg,
  boolField,
  createArg,
  createField,
  intArg,
  intField,
  stringArg,
  stringField,
  withArgs,
  withSteps,
} from "./model/Field.js";
export {
  emptyGraphQL,
  rootSchema,
  withGraphQLMutation,
  withGraphQLQuery,
  withGraphQLType,
} from "./model/GraphQL.js";
export { emptyServer, isServerEmpty } from "./model/Server.js";
export {
  constantStep,
  httpFromEndpoint,
  httpStep,
  objPathStep,
  withInput,
  withMethod,
  withOutput,
} from "./model/Step.js";
export { DEFAULT_HTTP_METHOD, HttpMethodSchema } from "./http/Method.js";
export { arraySchema, objectSchema, optionalSchema, scalarSchema, ScalarKindSchema } from "./http/TSchema.js";

// Merge and compression
export { mergeAll, mergeGraphQL, mergeRight, mergeServer } from "./engine/merge.js";
export { compressArg, compressConfig, compressField, compressGraphQL, compressStep } from "./engine/compress.js";

// Codec
export {
  decodeArg,
  decodeConfig,
  decodeField,
  decodeGraphQL,
  decodeRootSchema,
  decodeServer,
  decodeStep,
  decodeTSchema,
  decodeUrl,
  encodeArg,
  encodeConfig,
  encodeField,
  encodeGraphQL,
  encodeRootSchema,
  encodeServer,
  encodeStep,
  encodeTSchema,
  encodeUrl,
  parseConfig,
  stringifyConfig,
} from "./codec/codec.js";
export { DecodeError, formatPath } from "./codec/DecodeError.js";
export { STEP_TAGS } from "./codec/wire.js";

// Loading and writing
export {
  FileConfigLoader,
  InMemoryConfigLoader,
  loadAndMerge,
  writeConfigFile,
} from "./loader/ConfigLoader.js";
export { asConfigFormat, detectFormat, parseConfigDocument, serializeConfig } from "./loader/documents.js";
export { ConfigLoadError, ConfigWriteError } from "./loader/errors.js";

// Blueprint boundary
export { toBlueprint, TranscodeError } from "./transcoder/Transcoder.js";

// Utilities
export { err, ok } from "./utils/result.js";
export { createLogger, logLevelFromEnv, normalizeError } from "./observability/logger.js";

// Types
export type { Config, ConfigInit } from "./model/Config.js";
export type { Arg, ArgMap, Field, FieldMap } from "./model/Field.js";
export type { GraphQL, RootSchema, TypeRegistry } from "./model/GraphQL.js";
export type { Server } from "./model/Server.js";
export type { ConstantStep, HttpStep, HttpStepOptions, ObjPathStep, Step, StepKind } from "./model/Step.js";
export type { JsonPrimitive, JsonValue } from "./model/json.js";
export type { Endpoint } from "./http/Endpoint.js";
export type { HttpMethod } from "./http/Method.js";
export type { ScalarKind, TSchema } from "./http/TSchema.js";
export type { EncodeOptions, StringifyOptions } from "./codec/codec.js";
export type { DecodeIssue } from "./codec/DecodeError.js";
export type {
  ArgJson,
  ConfigJson,
  FieldJson,
  GraphQLJson,
  HttpJson,
  RootSchemaJson,
  ServerJson,
  StepJson,
  StepTag,
  TSchemaJson,
} from "./codec/wire.js";
export type { ConfigLoader, FileConfigLoaderOptions, WriteConfigOptions } from "./loader/ConfigLoader.js";
export type { ConfigFormat, SerializeOptions } from "./loader/documents.js";
export type { Transcoder, TranscodeOptions } from "./transcoder/Transcoder.js";
export type { Err, Ok, Result } from "./utils/result.js";
export type { ConfigLogger, CreateLoggerOptions, LoggerBindings, NormalizedError } from "./observability/logger.js";
