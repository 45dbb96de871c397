import { PasswordValidationError } from "../errors.js";

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 100;

const SPECIAL_CHARACTERS = /[!@#$%^&*(),.?":{}|<>[\]\\/`~;'_\-+=]/;

type Rule = {
  test: (password: string) => boolean;
  message: string;
};

const RULES: Rule[] = [
  {
    test: p => [...p].length >= PASSWORD_MIN_LENGTH,
    message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`
  },
  {
    test: p => [...p].length <= PASSWORD_MAX_LENGTH,
    message: `Password must not exceed ${PASSWORD_MAX_LENGTH} characters`
  },
  { test: p => /[A-Z]/.test(p), message: "Password must contain at least one uppercase letter" },
  { test: p => /[a-z]/.test(p), message: "Password must contain at least one lowercase letter" },
  { test: p => /\d/.test(p), message: "Password must contain at least one digit" },
  { test: p => SPECIAL_CHARACTERS.test(p), message: "Password must contain at least one special character" }
];

/**
 * Collects every rule the password breaks.
 */
export function checkPassword(password: string): string[] {
  return RULES.filter(rule => !rule.test(password)).map(rule => rule.message);
}

/**
 * @throws PasswordValidationError listing every violated rule
 */
export function validatePassword(password: string): void {
  const reasons = checkPassword(password);
  if (reasons.length > 0) {
    throw new PasswordValidationError(reasons);
  }
}

export function isValidPassword(password: string): boolean {
  return checkPassword(password).length === 0;
}
