import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openDatabase, type Db } from "../../src/store/database.js";
import { CredentialStore, hashPassword } from "../../src/store/credentials.js";
import {
  AlreadyExistsError,
  InvalidCredentialsError,
  InvalidInputError,
} from "../../src/errors.js";

describe("CredentialStore", () => {
  let db: Db;
  let store: CredentialStore;

  beforeEach(async () => {
    db = await openDatabase(":memory:");
    store = new CredentialStore(db, () => new Date("2024-01-15T10:00:00.000Z"));
  });

  afterEach(() => {
    db.close();
  });

  describe("hashPassword", () => {
    it("produces a SHA-256 hex digest", () => {
      expect(hashPassword("abc")).toBe(
        "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
      );
    });
  });

  describe("register", () => {
    it("creates a user with a digest instead of the password", () => {
      const user = store.register("alice", "pw");

      expect(user.id).toBeGreaterThan(0);
      expect(user.username).toBe("alice");
      expect(user.passwordHash).toBe(hashPassword("pw"));
      expect(user.passwordHash).not.toBe("pw");
      expect(user.createdAt).toBe("2024-01-15T10:00:00.000Z");
    });

    it("rejects a username that already exists", () => {
      store.register("alice", "pw");

      expect(() => store.register("alice", "other")).toThrow(AlreadyExistsError);
      expect(() => store.register("alice", "other")).toThrow("Username 'alice' already exists");
    });

    it("treats usernames as case-sensitive", () => {
      const lower = store.register("alice", "pw");
      const upper = store.register("Alice", "pw");

      expect(upper.id).not.toBe(lower.id);
    });

    it("rejects empty usernames and passwords", () => {
      expect(() => store.register("", "pw")).toThrow(InvalidInputError);
      expect(() => store.register("alice", "")).toThrow(InvalidInputError);
    });

    it("persists the user", () => {
      const user = store.register("alice", "pw");

      expect(store.findById(user.id)).toEqual(user);
      expect(store.findByUsername("alice")).toEqual(user);
    });
  });

  describe("authenticate", () => {
    it("returns the user id for the right password", () => {
      const user = store.register("alice", "pw");

      expect(store.authenticate("alice", "pw")).toBe(user.id);
    });

    it("rejects a wrong password", () => {
      store.register("alice", "pw");

      expect(() => store.authenticate("alice", "wrong")).toThrow(InvalidCredentialsError);
    });

    it("rejects an unknown username with the same message", () => {
      store.register("alice", "pw");

      expect(() => store.authenticate("bob", "pw")).toThrow("Invalid username or password");
      expect(() => store.authenticate("alice", "wrong")).toThrow("Invalid username or password");
    });

    it("does not match another user's password", () => {
      store.register("alice", "pw-a");
      store.register("bob", "pw-b");

      expect(() => store.authenticate("alice", "pw-b")).toThrow(InvalidCredentialsError);
    });
  });

  describe("findById", () => {
    it("returns undefined for an unknown id", () => {
      expect(store.findById(42)).toBeUndefined();
    });
  });
});
