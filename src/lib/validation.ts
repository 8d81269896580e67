import { z } from 'zod';

export const MAX_ITEMS = 20;
export const MIN_ITEM_LENGTH = 2;
export const MAX_ITEM_LENGTH = 200;

/** Inclusive Australian postcode ranges. NT sits below 1000. */
const POSTCODE_RANGES: ReadonlyArray<[number, number]> = [
  [800, 999],
  [1000, 7999],
];

const SCRIPT_PATTERNS: readonly RegExp[] = [
  /<script[^>]*>/i,
  /javascript:/i,
  /on\w+\s*=/i,
  /<%.*?%>/,
  /\$\{.*?\}/,
];

export const CheckRequestSchema = z.object({
  items: z.union([z.string(), z.array(z.string())]),
  postcode: z.union([z.string(), z.number().int().transform(String)]),
});

export type CheckRequestBody = z.infer<typeof CheckRequestSchema>;

export type ValidationResult<T> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; errors: string[] };

export interface ValidCheckRequest {
  items: string[];
  postcode: string;
}

/** Replaces control characters with spaces and collapses whitespace. */
export function sanitizeUserInput(text: string): string {
  return text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, ' ').replace(/\s+/g, ' ').trim();
}

export function validatePostcode(raw: string): ValidationResult<string> {
  const postcode = raw.trim();
  if (!postcode) return { ok: false, errors: ['Postcode is required'] };
  if (!/^\d{4}$/.test(postcode)) {
    return { ok: false, errors: [`Invalid postcode format. Must be 4 digits, got: ${raw}`] };
  }
  const value = Number(postcode);
  if (!POSTCODE_RANGES.some(([lo, hi]) => value >= lo && value <= hi)) {
    return { ok: false, errors: [`Postcode ${postcode} is not in a valid Australian range`] };
  }
  return { ok: true, value: postcode, warnings: [] };
}

export function validateQuery(raw: string): ValidationResult<string> {
  const query = sanitizeUserInput(raw);
  if (!query) return { ok: false, errors: ['Search query is required'] };
  if (query.length < MIN_ITEM_LENGTH) {
    return { ok: false, errors: [`Search query must be at least ${MIN_ITEM_LENGTH} characters long`] };
  }
  if (query.length > MAX_ITEM_LENGTH) {
    return { ok: false, errors: [`Search query must be at most ${MAX_ITEM_LENGTH} characters`] };
  }
  const warnings = SCRIPT_PATTERNS.filter((p) => p.test(query)).map(
    (p) => `Query contains potentially suspicious content: ${p.source}`
  );
  return { ok: true, value: query, warnings };
}

/** Accepts a comma separated string or a list. Empty entries are dropped. */
export function validateItems(items: string | readonly string[]): ValidationResult<string[]> {
  const raw: readonly string[] = typeof items === 'string' ? items.split(',') : items;
  const list = raw.map((s) => s.trim()).filter(Boolean);

  if (list.length === 0) return { ok: false, errors: ['At least one item is required'] };
  if (list.length > MAX_ITEMS) {
    return { ok: false, errors: [`Too many items. Maximum ${MAX_ITEMS} items allowed per request`] };
  }

  const errors: string[] = [];
  const warnings: string[] = [];
  const value: string[] = [];

  list.forEach((item, i) => {
    const result = validateQuery(item);
    if (result.ok) {
      value.push(result.value);
      warnings.push(...result.warnings.map((w) => `Item ${i + 1}: ${w}`));
    } else {
      errors.push(...result.errors.map((e) => `Item ${i + 1}: ${e}`));
    }
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value, warnings };
}

export function validateCheckRequest(body: unknown): ValidationResult<ValidCheckRequest> {
  const shape = CheckRequestSchema.safeParse(body);
  if (!shape.success) {
    return {
      ok: false,
      errors: shape.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    };
  }

  const items = validateItems(shape.data.items);
  const postcode = validatePostcode(shape.data.postcode);
  const errors = [...(items.ok ? [] : items.errors), ...(postcode.ok ? [] : postcode.errors)];

  if (!items.ok || !postcode.ok) {
    return { ok: false, errors };
  }
  return {
    ok: true,
    value: { items: items.value, postcode: postcode.value },
    warnings: [...items.warnings, ...postcode.warnings],
  };
}
