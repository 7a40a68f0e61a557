import { z } from "zod";

const REQUIRED = "This field is required.";

const INVALID_URL = "Invalid URL.";

const tooLong = (max: number) =>
  `Field cannot be longer than ${max} characters.`;

const requiredString = () =>
  z.string({ required_error: REQUIRED, invalid_type_error: REQUIRED });

const requiredText = () => requiredString().trim().min(1, REQUIRED);

// 上限は sql_scripts/01_create_schema.sql の列の長さに合わせる
const requiredLine = (max: number) => requiredText().max(max, tooLong(max));

// パスワードは入力どおりに扱う（前後の空白も含める）
const requiredSecret = () =>
  requiredString().refine((value) => value.trim().length > 0, REQUIRED);

export const RegisterForm = z.object({
  email: requiredLine(100),
  password: requiredSecret(),
  name: requiredLine(1000),
});

export const LoginForm = z.object({
  email: requiredText(),
  password: requiredSecret(),
});

export const CreatePostForm = z.object({
  title: requiredLine(250),
  subtitle: requiredLine(250),
  img_url: requiredLine(250)
    .url(INVALID_URL)
    .refine((value) => /^https?:\/\/[^/?#\s]+\.[^/?#\s]+/i.test(value), INVALID_URL),
  body: requiredText(),
});

export const CommentForm = z.object({
  comment: requiredText(),
});

export type CreatePostInput = z.infer<typeof CreatePostForm>;

export type FieldErrors = Record<string, string>;
export type FormValues = Record<string, string>;

export interface FormState {
  values: FormValues;
  errors: FieldErrors;
}

export type FormResult<T> =
  | { success: true; data: T }
  | { success: false; form: FormState };

// 再表示時にも送り返さないフィールド
const SECRET_FIELDS = new Set(["password"]);

export function emptyForm(values: FormValues = {}): FormState {
  return { values, errors: {} };
}

/**
 * フォームを検証する。失敗時はフィールドごとに最初のエラーメッセージを返す
 */
export function validateForm<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown
): FormResult<z.infer<S>> {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors: FieldErrors = {};
  for (const issue of result.error.issues) {
    const field = String(issue.path[0] ?? "form");
    if (!(field in errors)) {
      errors[field] = issue.message;
    }
  }

  return { success: false, form: { values: submittedValues(body), errors } };
}

function submittedValues(body: unknown): FormValues {
  const values: FormValues = {};
  if (typeof body !== "object" || body === null) {
    return values;
  }
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === "string" && !SECRET_FIELDS.has(key)) {
      values[key] = value;
    }
  }
  return values;
}
