import { z } from "zod";

export const HttpMethodSchema = z.enum([
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "CONNECT",
  "TRACE",
]);

export type HttpMethod = z.infer<typeof HttpMethodSchema>;

/** Method an Http step uses when none is configured. */
export const DEFAULT_HTTP_METHOD: HttpMethod = "GET";
