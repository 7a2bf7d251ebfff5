import type { Config } from "../model/Config.js";
import type { Arg, ArgMap, Field, FieldMap } from "../model/Field.js";
import type { GraphQL, TypeRegistry } from "../model/GraphQL.js";
import { assertNeverStep, withInput, withMethod, withOutput, type Step } from "../model/Step.js";
import { DEFAULT_HTTP_METHOD } from "../http/Method.js";

export function compressArg(arg: Arg): Arg {
  return { typeOf: arg.typeOf, list: arg.list === true, required: arg.required === true };
}

/**
 * Http steps lose their input/output schemas, which the blueprint transcoder
 * derives again, and an explicit GET method.
 */
export function compressStep(step: Step): Step {
  switch (step.kind) {
    case "http": {
      const stripped = withOutput(withInput(step, undefined), undefined);
      return step.method === DEFAULT_HTTP_METHOD ? withMethod(stripped, undefined) : stripped;
    }
    case "constant":
    case "objectPath":
      return step;
    default:
      return assertNeverStep(step);
  }
}

function compressArgs(args: ArgMap | undefined): ArgMap | undefined {
  if (args === undefined) {
    return undefined;
  }
  const entries = Object.entries(args);
  if (entries.length === 0) {
    return undefined;
  }
  return Object.fromEntries(entries.map(([name, arg]) => [name, compressArg(arg)]));
}

export function compressField(field: Field): Field {
  const steps = field.steps && field.steps.length > 0 ? field.steps.map(compressStep) : undefined;
  const args = compressArgs(field.args);
  return {
    typeOf: field.typeOf,
    list: field.list === true,
    required: field.required === true,
    ...(steps !== undefined && { steps }),
    ...(args !== undefined && { args }),
  };
}

function compressFields(fields: FieldMap): FieldMap {
  return Object.fromEntries(Object.entries(fields).map(([name, field]) => [name, compressField(field)]));
}

export function compressGraphQL(graphQL: GraphQL): GraphQL {
  const types: TypeRegistry = Object.fromEntries(
    Object.entries(graphQL.types).map(([name, fields]) => [name, compressFields(fields)]),
  );
  return { schema: graphQL.schema, types };
}

/** Smallest configuration that encodes to the same effective settings. */
export function compressConfig(config: Config): Config {
  return { ...config, graphQL: compressGraphQL(config.graphQL) };
}
