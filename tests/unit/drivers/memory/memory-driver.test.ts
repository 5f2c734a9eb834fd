import { log } from "@warlock.js/logger";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryDriver } from "../../../../src/drivers/memory";

describe("MemoryDriver", () => {
  let driver: MemoryDriver;

  beforeEach(() => {
    driver = new MemoryDriver();
  });

  describe("connection", () => {
    it("should connect once and log it", async () => {
      const success = vi.spyOn(log, "success");

      await driver.connect();
      await driver.connect();

      expect(driver.isConnected).toBe(true);
      expect(success).toHaveBeenCalledTimes(1);
      expect(success).toHaveBeenCalledWith(
        "database.memory",
        "connection",
        "Connected to in-memory database",
      );
    });

    it("should disconnect only when connected", async () => {
      const warn = vi.spyOn(log, "warn");

      await driver.disconnect();
      await driver.connect();
      await driver.disconnect();

      expect(driver.isConnected).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "database.memory",
        "connection",
        "Disconnected from in-memory database",
      );
    });
  });

  describe("insert()", () => {
    it("should assign incremental ids per table", async () => {
      expect((await driver.insert("users", { name: "Alice" })).document).toEqual({
        name: "Alice",
        id: 1,
      });
      expect((await driver.insert("users", { name: "Bob" })).document.id).toBe(2);
      expect((await driver.insert("posts", { title: "Post A" })).document.id).toBe(1);
    });

    it("should keep given ids and continue after them", async () => {
      await driver.insert("users", { id: 10, name: "Alice" });

      expect((await driver.insert("users", { name: "Bob" })).document.id).toBe(11);
    });

    it("should use the configured primary key", async () => {
      const custom = new MemoryDriver({ primaryKey: "_id" });

      expect((await custom.insert("users", { name: "Alice" })).document).toEqual({
        name: "Alice",
        _id: 1,
      });
    });

    it("should store a copy of the document", async () => {
      const document = { name: "Alice" };

      await driver.insert("users", document);
      document.name = "Changed";

      expect((await driver.queryBuilder("users").first())?.name).toBe("Alice");
    });
  });

  describe("truncate()", () => {
    it("should empty one table and reset its ids", async () => {
      await driver.insert("users", { name: "Alice" });
      await driver.insert("posts", { title: "Post A" });

      driver.truncate("users");

      expect(await driver.queryBuilder("users").count()).toBe(0);
      expect(await driver.queryBuilder("posts").count()).toBe(1);
      expect((await driver.insert("users", { name: "Bob" })).document.id).toBe(1);
    });

    it("should empty every table", async () => {
      await driver.insert("users", { name: "Alice" });
      await driver.insert("posts", { title: "Post A" });

      driver.truncate();

      expect(await driver.queryBuilder("users").count()).toBe(0);
      expect(await driver.queryBuilder("posts").count()).toBe(0);
    });
  });
});
