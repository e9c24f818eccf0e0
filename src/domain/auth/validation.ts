import { z, ZodError } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: ValidationIssue[] };

// Stored as VARCHAR(255), which counts characters.
export const MAX_FIELD_LENGTH = 255;
export const MIN_PASSWORD_LENGTH = 8;

// Code points, not UTF-16 units: an emoji is one character.
function charLength(value: string): number {
  return [...value].length;
}

export const registrationSchema = z.object({
  name: z
    .string({
      required_error: 'Name is required',
      invalid_type_error: 'Name must be a string',
    })
    .min(1, 'Name is required')
    .refine(
      (name) => charLength(name) <= MAX_FIELD_LENGTH,
      `Name must be at most ${MAX_FIELD_LENGTH} characters`
    ),
  email: z
    .string({
      required_error: 'Email is required',
      invalid_type_error: 'Email must be a string',
    })
    .email('Invalid email address')
    .refine(
      (email) => charLength(email) <= MAX_FIELD_LENGTH,
      `Email must be at most ${MAX_FIELD_LENGTH} characters`
    ),
  password: z
    .string({
      required_error: 'Password is required',
      invalid_type_error: 'Password must be a string',
    })
    .refine(
      (password) => charLength(password) >= MIN_PASSWORD_LENGTH,
      `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`
    ),
});

// Login only checks shape: a malformed email must fail like an unknown one,
// and an empty password like any other wrong one.
export const loginSchema = z.object({
  email: z
    .string({
      required_error: 'Email is required',
      invalid_type_error: 'Email must be a string',
    })
    .min(1, 'Email is required'),
  password: z.string({
    required_error: 'Password is required',
    invalid_type_error: 'Password must be a string',
  }),
});

export type RegistrationInput = z.infer<typeof registrationSchema>;
export type LoginInput = z.infer<typeof loginSchema>;

export function issuesFromZod(error: ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

function check<T>(schema: z.ZodType<T>, input: unknown): ValidationResult<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, issues: issuesFromZod(parsed.error) };
}

/**
 * Check a registration body. Every violated rule is reported, not only the
 * first one.
 */
export function validateRegistration(
  input: unknown
): ValidationResult<RegistrationInput> {
  return check(registrationSchema, input);
}

export function validateLogin(input: unknown): ValidationResult<LoginInput> {
  return check(loginSchema, input);
}
