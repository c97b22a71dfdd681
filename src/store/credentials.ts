import { createHash, timingSafeEqual } from "node:crypto";
import { UserRowSchema, type User, type UserId, type UserRow } from "#types";
import {
  AlreadyExistsError,
  InvalidCredentialsError,
  InvalidInputError,
} from "../errors.js";
import type { Db } from "./database.js";

/**
 * One unsalted SHA-256 pass, hex encoded
 */
export function hashPassword(password: string): string {
  return createHash("sha256").update(password, "utf8").digest("hex");
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("UNIQUE constraint failed");
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

/**
 * Username → password digest, backed by the `users` table
 */
export class CredentialStore {
  private db: Db;
  private now: () => Date;

  constructor(db: Db, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  /**
   * Create a user. Throws AlreadyExistsError when the username is taken.
   */
  register(username: string, password: string): User {
    if (username.length === 0) {
      throw new InvalidInputError("Username must not be empty");
    }
    if (password.length === 0) {
      throw new InvalidInputError("Password must not be empty");
    }

    const passwordHash = hashPassword(password);
    const createdAt = this.now().toISOString();

    try {
      const result = this.db.run(
        "INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)",
        [username, passwordHash, createdAt]
      );
      return {
        id: result.lastInsertRowid,
        username,
        passwordHash,
        createdAt,
      };
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new AlreadyExistsError(username, { cause: err });
      }
      throw err;
    }
  }

  /**
   * Return the user's id when the password digest matches.
   * Unknown usernames and wrong passwords fail the same way.
   */
  authenticate(username: string, password: string): UserId {
    const user = this.findByUsername(username);
    if (!user) {
      throw new InvalidCredentialsError();
    }

    const expected = Buffer.from(user.passwordHash, "hex");
    const actual = Buffer.from(hashPassword(password), "hex");
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      throw new InvalidCredentialsError();
    }
    return user.id;
  }

  findById(id: UserId): User | undefined {
    const row = this.db.get(
      "SELECT id, username, password_hash, created_at FROM users WHERE id = ?",
      [id]
    );
    return row === undefined ? undefined : toUser(UserRowSchema.parse(row));
  }

  findByUsername(username: string): User | undefined {
    const row = this.db.get(
      "SELECT id, username, password_hash, created_at FROM users WHERE username = ?",
      [username]
    );
    return row === undefined ? undefined : toUser(UserRowSchema.parse(row));
  }
}
