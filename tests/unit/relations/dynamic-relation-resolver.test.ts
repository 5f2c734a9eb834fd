import { afterEach, describe, expect, it } from "vitest";
import { resetDatabaseConfigurations, setDatabaseConfigurations } from "../../../src/config";
import { DynamicRelationResolver } from "../../../src/relations/dynamic-relation-resolver";

describe("DynamicRelationResolver", () => {
  afterEach(() => {
    resetDatabaseConfigurations();
  });

  describe("resolveAlias()", () => {
    const resolver = new DynamicRelationResolver("User", {
      relations: ["user_languages"],
      aliases: { languages: "user_languages" },
    });

    it("should return the relation an alias stands for", () => {
      expect(resolver.resolveAlias("languages")).toBe("user_languages");
    });

    it("should return unknown names unchanged", () => {
      expect(resolver.resolveAlias("comments")).toBe("comments");
    });

    it("should look aliases up by key, not by value", () => {
      expect(resolver.resolveAlias("user_languages")).toBe("user_languages");
    });

    it("should ignore inherited object members", () => {
      expect(resolver.resolveAlias("toString")).toBe("toString");
    });
  });

  describe("isDynamic()", () => {
    const resolver = new DynamicRelationResolver("User", { relations: ["comments"] });

    it("should match registered names exactly", () => {
      expect(resolver.isDynamic("comments")).toBe(true);
      expect(resolver.isDynamic("Comments")).toBe(false);
      expect(resolver.isDynamic("comment")).toBe(false);
    });

    it("should be false for every name without options", () => {
      expect(new DynamicRelationResolver("User").isDynamic("comments")).toBe(false);
    });
  });

  describe("resolveKey()", () => {
    it("should use the key override", () => {
      const resolver = new DynamicRelationResolver("User", {
        relations: ["comments"],
        keys: { comments: "author_id" },
      });

      expect(resolver.resolveKey("comments")).toBe("author_id");
    });

    it("should fall back to the snake cased model name followed by _id", () => {
      const resolver = new DynamicRelationResolver("User", { relations: ["comments"] });

      expect(resolver.resolveKey("comments")).toBe("user_id");
    });

    it("should prefer the model default key over the configured one", () => {
      setDatabaseConfigurations({ dynamicRelations: { defaultKey: "owner_id" } });

      const resolver = new DynamicRelationResolver("User", { defaultKey: "member_id" });

      expect(resolver.resolveKey("comments")).toBe("member_id");
    });

    it("should use the configured default key", () => {
      setDatabaseConfigurations({ dynamicRelations: { defaultKey: "owner_id" } });

      expect(new DynamicRelationResolver("User").resolveKey("comments")).toBe("owner_id");
    });
  });

  describe("getDefaultKey()", () => {
    it("should keep acronyms of the model name", () => {
      expect(new DynamicRelationResolver("HTTPLog").getDefaultKey()).toBe("http_log_id");
      expect(new DynamicRelationResolver("OAuthToken").getDefaultKey()).toBe("o_auth_token_id");
      expect(new DynamicRelationResolver("SMSMessage").resolveKey("replies")).toBe(
        "sms_message_id",
      );
    });

    it("should compute the default key once", () => {
      const resolver = new DynamicRelationResolver("User");

      expect(resolver.getDefaultKey()).toBe("user_id");

      setDatabaseConfigurations({ dynamicRelations: { defaultKey: "owner_id" } });

      expect(resolver.getDefaultKey()).toBe("user_id");
    });
  });

  describe("resolveType()", () => {
    it("should use the type override", () => {
      const resolver = new DynamicRelationResolver("User", { types: { profile: "hasOne" } });

      expect(resolver.resolveType("profile")).toBe("hasOne");
    });

    it("should default to hasMany", () => {
      expect(new DynamicRelationResolver("User").resolveType("comments")).toBe("hasMany");
    });

    it("should use the model default type", () => {
      const resolver = new DynamicRelationResolver("User", { defaultType: "belongsTo" });

      expect(resolver.resolveType("country")).toBe("belongsTo");
    });

    it("should use the configured default type", () => {
      setDatabaseConfigurations({ dynamicRelations: { defaultType: "hasOne" } });

      expect(new DynamicRelationResolver("User").resolveType("profile")).toBe("hasOne");
    });
  });

  describe("resolveTargetEntity()", () => {
    it("should derive the namespaced singular model name", () => {
      const resolver = new DynamicRelationResolver("User", { relations: ["comments"] });

      expect(resolver.resolveTargetEntity("comments")).toBe("App\\Comment");
    });

    it("should use the model override", () => {
      const resolver = new DynamicRelationResolver("User", {
        models: { user_languages: "App\\Language" },
      });

      expect(resolver.resolveTargetEntity("user_languages")).toBe("App\\Language");
    });

    it("should add the separator to a namespace without one", () => {
      const resolver = new DynamicRelationResolver("User", { namespace: "Blog" });

      expect(resolver.resolveTargetEntity("comments")).toBe("Blog\\Comment");
    });

    it("should not prefix anything with an empty namespace", () => {
      const resolver = new DynamicRelationResolver("User", { namespace: "" });

      expect(resolver.resolveTargetEntity("comments")).toBe("Comment");
    });

    it("should use the configured namespace", () => {
      setDatabaseConfigurations({ dynamicRelations: { modelNamespace: "Domain\\" } });

      expect(new DynamicRelationResolver("User").resolveTargetEntity("comments")).toBe(
        "Domain\\Comment",
      );
    });
  });

  describe("describe()", () => {
    const resolver = new DynamicRelationResolver("User", {
      relations: ["user_languages"],
      types: { mainLanguage: "hasOne" },
      models: { user_languages: "App\\Language" },
      aliases: { mainLanguage: "user_languages" },
    });

    it("should build the definition of a dynamic relation", () => {
      expect(resolver.describe("user_languages")).toEqual({
        type: "hasMany",
        model: "App\\Language",
        foreignKey: "user_id",
      });
    });

    it("should take the type of the alias and the rest of the aliased relation", () => {
      expect(resolver.describe("mainLanguage")).toEqual({
        type: "hasOne",
        model: "App\\Language",
        foreignKey: "user_id",
      });
    });

    it("should return undefined for names that are not dynamic", () => {
      expect(resolver.describe("posts")).toBeUndefined();
    });
  });
});
