import bcrypt from "bcryptjs";

export type PasswordHasher = {
  hash(password: string): Promise<string>;
  /** Constant-time comparison against a stored hash */
  verify(password: string, hashed: string): Promise<boolean>;
};

/**
 * bcrypt hasher. `rounds` is the cost factor; tests use the minimum (4).
 */
export class BcryptPasswordHasher implements PasswordHasher {
  private readonly rounds: number;

  constructor(rounds: number) {
    this.rounds = rounds;
  }

  async hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  async verify(password: string, hashed: string): Promise<boolean> {
    return bcrypt.compare(password, hashed);
  }
}
