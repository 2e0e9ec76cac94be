import * as z from "zod";

export const TOKEN_HEX_LENGTH = 64;

const tokenPattern = /^[0-9a-f]{64}$/;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

export const tokenSchema = z.string().regex(tokenPattern);

export const tokenRecordSchema = z.object({
  token: tokenSchema,
  payload: jsonValueSchema,
  modifiedAt: z.number().int(),
});

export type TokenRecord = z.infer<typeof tokenRecordSchema>;

export function isWellFormedToken(token: string): boolean {
  return tokenPattern.test(token);
}

/**
 * Returns the `user_id` field of a payload in its text form, mirroring a SQL
 * `payload ->> 'user_id'` lookup: numbers, strings and booleans are compared as
 * text, anything else has no user id.
 */
export function payloadUserId(payload: JsonValue): string | null {
  if (payload === null || typeof payload !== "object" || Array.isArray(payload)) {
    return null;
  }

  const userId = payload["user_id"];
  switch (typeof userId) {
    case "string":
    case "number":
    case "boolean":
      return String(userId);
    default:
      return null;
  }
}
