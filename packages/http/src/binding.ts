import type { z } from "zod";
import { BindingError } from "@clean-articles/errors";

export type BindResult<T> = { ok: true; value: T } | { ok: false; error: BindingError };

/**
 * Validate a decoded request body, reporting failure as a value.
 */
export function safeBindJson<Output, Def extends z.ZodTypeDef, Input>(
  schema: z.ZodType<Output, Def, Input>,
  body: unknown,
): BindResult<Output> {
  const parsed = schema.safeParse(body);
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, error: BindingError.fromZod(parsed.error) };
}

export function bindJson<Output, Def extends z.ZodTypeDef, Input>(
  schema: z.ZodType<Output, Def, Input>,
  body: unknown,
): Output {
  const result = safeBindJson(schema, body);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

const ID_PATTERN = /^\d+$/;

/**
 * Parse a positive integer path id. Returns undefined for anything else.
 */
export function parseId(raw: string | undefined): number | undefined {
  if (raw === undefined || !ID_PATTERN.test(raw)) {
    return undefined;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}
