export {
  checkPassword,
  validatePassword,
  isValidPassword,
  PASSWORD_MIN_LENGTH,
  PASSWORD_MAX_LENGTH
} from "./policy.js";

export { BcryptPasswordHasher, type PasswordHasher } from "./hasher.js";
