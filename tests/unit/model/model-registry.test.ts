import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ModelNotFoundError } from "../../../src/errors/model-not-found.error";
import { Model } from "../../../src/model/model";
import {
  RegisterModel,
  cleanupModelsRegistery,
  getAllModelsFromRegistry,
  getModelFromRegistry,
  qualifyModelName,
  registerModelInRegistry,
  removeModelFromRegistery,
  resolveModelClass,
} from "../../../src/model/register-model";

describe("Model Registry", () => {
  beforeEach(() => {
    cleanupModelsRegistery();
  });

  afterEach(() => {
    cleanupModelsRegistery();
  });

  describe("@RegisterModel() decorator", () => {
    it("should register model with class name", () => {
      @RegisterModel()
      class User extends Model {
        public static table = "users";
      }

      expect(getModelFromRegistry("User")).toBe(User);
    });

    it("should register model with custom name", () => {
      @RegisterModel({ name: "Member" })
      class User extends Model {
        public static table = "users";
      }

      expect(getModelFromRegistry("Member")).toBe(User);
      expect(getModelFromRegistry("User")).toBeUndefined();
    });

    it("should register model under its namespace", () => {
      @RegisterModel({ namespace: "App" })
      class Comment extends Model {
        public static table = "comments";
      }

      expect(getModelFromRegistry("App\\Comment")).toBe(Comment);
      expect(getModelFromRegistry("Comment")).toBeUndefined();
    });

    it("should combine custom name and namespace", () => {
      @RegisterModel({ name: "Note", namespace: "Blog\\" })
      class Comment extends Model {
        public static table = "comments";
      }

      expect(getModelFromRegistry("Blog\\Note")).toBe(Comment);
    });

    it("should throw error if model name cannot be determined", () => {
      expect(() =>
        RegisterModel()(
          class extends Model {
            public static table = "anonymous";
          },
        ),
      ).toThrow(/Unable to determine model name/);
    });

    it("should warn and overwrite on duplicate registration", () => {
      const consoleSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

      @RegisterModel({ name: "User" })
      class UserV1 extends Model {
        public static table = "users_v1";
      }

      @RegisterModel({ name: "User" })
      class UserV2 extends Model {
        public static table = "users_v2";
      }

      expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining("already registered"));
      expect(getModelFromRegistry("User")).toBe(UserV2);
      expect(getModelFromRegistry("User")).not.toBe(UserV1);
    });
  });

  describe("registry functions", () => {
    class Tag extends Model {
      public static table = "tags";
    }

    it("should register, list and remove models", () => {
      registerModelInRegistry("Tag", Tag);

      expect(getAllModelsFromRegistry().get("Tag")).toBe(Tag);

      removeModelFromRegistery("Tag");

      expect(getModelFromRegistry("Tag")).toBeUndefined();
    });

    it("should return a copy of the registry", () => {
      registerModelInRegistry("Tag", Tag);

      getAllModelsFromRegistry().clear();

      expect(getModelFromRegistry("Tag")).toBe(Tag);
    });

    it("should be reachable from the model class", () => {
      registerModelInRegistry("Tag", Tag);

      expect(Model.getModel("Tag")).toBe(Tag);
      expect(Model.getAllModels().size).toBe(1);
    });
  });

  describe("resolveModelClass()", () => {
    class Tag extends Model {
      public static table = "tags";
    }

    it("should return model classes as is", () => {
      expect(resolveModelClass(Tag)).toBe(Tag);
    });

    it("should resolve registered names", () => {
      registerModelInRegistry("App\\Tag", Tag);

      expect(resolveModelClass("App\\Tag")).toBe(Tag);
    });

    it("should throw ModelNotFoundError for unknown names", () => {
      expect(() => resolveModelClass("App\\Missing")).toThrow(ModelNotFoundError);
      expect(() => resolveModelClass("App\\Missing")).toThrow(
        'Model "App\\Missing" not found in registry.',
      );
    });
  });

  describe("qualifyModelName()", () => {
    it("should join namespace and name with a single separator", () => {
      expect(qualifyModelName("Comment", "App")).toBe("App\\Comment");
      expect(qualifyModelName("Comment", "App\\")).toBe("App\\Comment");
    });

    it("should keep names without a namespace", () => {
      expect(qualifyModelName("Comment")).toBe("Comment");
      expect(qualifyModelName("Comment", "")).toBe("Comment");
    });
  });
});
