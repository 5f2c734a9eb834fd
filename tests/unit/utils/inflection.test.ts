import { describe, expect, it } from "vitest";
import { modelNameToForeignKey, relationToModelName } from "../../../src/utils/inflection";

describe("Inflection", () => {
  it("should singularize and studly case relation names", () => {
    expect(relationToModelName("comments")).toBe("Comment");
    expect(relationToModelName("profile")).toBe("Profile");
    expect(relationToModelName("categories")).toBe("Category");
  });

  it("should snake case model names into foreign keys", () => {
    expect(modelNameToForeignKey("User")).toBe("user_id");
    expect(modelNameToForeignKey("Post")).toBe("post_id");
    expect(modelNameToForeignKey("BlogPost")).toBe("blog_post_id");
  });

  it("should keep every letter of acronyms", () => {
    expect(modelNameToForeignKey("HTTPLog")).toBe("http_log_id");
    expect(modelNameToForeignKey("OAuthToken")).toBe("o_auth_token_id");
    expect(modelNameToForeignKey("APIKey")).toBe("api_key_id");
    expect(modelNameToForeignKey("SMSMessage")).toBe("sms_message_id");
  });
});
