import { z } from "zod";

/**
 * Structural description of a request or response body.
 *
 * Carried by Http steps and endpoints as plain data; nothing in this package
 * checks payloads against it.
 */
export const ScalarKindSchema = z.enum(["string", "int", "float", "boolean"]);

export type ScalarKind = z.infer<typeof ScalarKindSchema>;

export type TSchema =
  | { readonly kind: ScalarKind }
  | { readonly kind: "object"; readonly fields: Readonly<Record<string, TSchema>> }
  | { readonly kind: "array"; readonly item: TSchema }
  | { readonly kind: "optional"; readonly schema: TSchema };

export function scalarSchema(kind: ScalarKind): TSchema {
  return { kind };
}

export function objectSchema(fields: Readonly<Record<string, TSchema>>): TSchema {
  return { kind: "object", fields: { ...fields } };
}

export function arraySchema(item: TSchema): TSchema {
  return { kind: "array", item };
}

export function optionalSchema(schema: TSchema): TSchema {
  return { kind: "optional", schema };
}
