import { Model } from "../../../src/model/model";
import { RegisterModel } from "../../../src/model/register-model";
import { belongsToMany, hasMany } from "../../../src/relations/helpers";
import type { DynamicRelationsOptions } from "../../../src/relations/types";

@RegisterModel({ namespace: "App" })
export class Comment extends Model {
  public static table = "comments";
}

@RegisterModel({ namespace: "App" })
export class Profile extends Model {
  public static table = "profiles";
}

@RegisterModel({ namespace: "App" })
export class Country extends Model {
  public static table = "countries";
}

@RegisterModel({ namespace: "App" })
export class Language extends Model {
  public static table = "languages";
}

@RegisterModel()
export class Post extends Model {
  public static table = "posts";

  public static dynamicRelations: DynamicRelationsOptions = {
    relations: ["comments"],
    keys: { comments: "post_id" },
  };
}

@RegisterModel()
export class Role extends Model {
  public static table = "roles";
}

@RegisterModel({ namespace: "App" })
export class User extends Model {
  public static table = "users";

  public static relations = {
    articles: hasMany("Post", { foreignKey: "author_id" }),
    roles: belongsToMany("Role", {
      pivot: "user_roles",
      localKey: "user_id",
      foreignKey: "role_id",
    }),
  };

  public static dynamicRelations: DynamicRelationsOptions = {
    relations: ["comments", "profile", "country", "user_languages"],
    types: {
      profile: "hasOne",
      country: "belongsTo",
      mainLanguage: "hasOne",
    },
    keys: { country: "country_id" },
    models: { user_languages: "App\\Language" },
    aliases: {
      languages: "user_languages",
      mainLanguage: "user_languages",
    },
  };

  public posts() {
    return this.hasMany("Post", "author_id");
  }

  public nickname() {
    return "not a relation";
  }
}
