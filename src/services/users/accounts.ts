/**
 * Registration and password checks on top of UserRepository
 */

import { hashPassword, verifyPassword } from "../../auth/password.js";
import { normalizeEmail, type User, type UserRepository } from "./repository.js";

import type { UserRole } from "../../db/types.js";

export class EmailTakenError extends Error {
  readonly email: string;

  constructor(email: string) {
    super(`Email already registered: ${email}`);
    this.name = "EmailTakenError";
    this.email = email;
  }
}

export interface AccountServiceOptions {
  /** bcrypt cost factor */
  passwordRounds: number;
}

export interface Registration {
  email: string;
  password: string;
  role?: UserRole;
}

export class AccountService {
  constructor(
    private readonly users: Pick<UserRepository, "findByEmail" | "create">,
    private readonly options: AccountServiceOptions
  ) {}

  async register(registration: Registration): Promise<User> {
    const email = normalizeEmail(registration.email);
    if ((await this.users.findByEmail(email)) !== undefined) {
      throw new EmailTakenError(email);
    }

    return this.users.create({
      email,
      passwordHash: await hashPassword(
        registration.password,
        this.options.passwordRounds
      ),
      role: registration.role,
    });
  }

  /**
   * The account for these credentials, or null when either is wrong
   */
  async authenticate(email: string, password: string): Promise<User | null> {
    const credentials = await this.users.findByEmail(email);
    if (credentials === undefined) {
      return null;
    }
    if (!(await verifyPassword(password, credentials.passwordHash))) {
      return null;
    }

    const { passwordHash: _hash, ...user } = credentials;
    return user;
  }
}
