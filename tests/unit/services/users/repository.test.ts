import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  UserRepository,
  normalizeEmail,
} from "../../../../src/services/users/repository.js";
import { createTestDatabase } from "../../../helpers/db.js";

import type { DatabaseHandle } from "../../../../src/db/connection.js";

describe("services/users/repository", () => {
  let handle: DatabaseHandle;
  let users: UserRepository;

  beforeEach(async () => {
    handle = await createTestDatabase();
    users = new UserRepository(handle.db);
  });

  afterEach(async () => {
    await handle.db.destroy();
  });

  it("should normalize emails", () => {
    expect(normalizeEmail("  Ana@Example.TEST ")).toBe("ana@example.test");
  });

  it("should create an account with the user role by default", async () => {
    const user = await users.create({
      email: "Ana@Example.test",
      passwordHash: "hash-1",
    });

    expect(user).toMatchObject({ id: 1, email: "ana@example.test", role: "user" });
    expect(user).not.toHaveProperty("passwordHash");
    expect(await users.findById(1)).toEqual(user);
  });

  it("should find credentials by email in any case", async () => {
    await users.create({ email: "ana@example.test", passwordHash: "hash-1", role: "admin" });

    const credentials = await users.findByEmail("ANA@example.test");

    expect(credentials).toMatchObject({
      id: 1,
      email: "ana@example.test",
      role: "admin",
      passwordHash: "hash-1",
    });
    expect(await users.findByEmail("bob@example.test")).toBeUndefined();
  });

  it("should refuse a second account with the same email", async () => {
    await users.create({ email: "ana@example.test", passwordHash: "hash-1" });

    await expect(
      users.create({ email: "ANA@example.test", passwordHash: "hash-2" })
    ).rejects.toThrow(/UNIQUE constraint failed: users\.email/);
  });

  it("should change the role", async () => {
    const created = await users.create({ email: "ana@example.test", passwordHash: "hash-1" });

    const updated = await users.updateRole(created.id, "admin");

    expect(updated).toMatchObject({ id: created.id, role: "admin" });
    expect(await users.findById(created.id)).toMatchObject({ role: "admin" });
  });

  it("should return undefined when changing the role of an unknown account", async () => {
    expect(await users.updateRole(42, "admin")).toBeUndefined();
    expect(await users.findById(42)).toBeUndefined();
  });
});
