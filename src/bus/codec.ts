import type { ZodType, ZodTypeDef } from 'zod';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export type Decoded<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; raw: unknown };

export function decodeJson<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: Uint8Array): Decoded<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(data));
  } catch (error) {
    return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`, raw: undefined };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, error: details.join('; '), raw };
  }
  return { ok: true, value: parsed.data };
}
