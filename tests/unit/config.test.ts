import { afterEach, describe, expect, it } from "vitest";
import {
  getDatabaseConfig,
  getDatabaseConfigurations,
  getDatabaseDebugLevel,
  resetDatabaseConfigurations,
  setDatabaseConfigurations,
} from "../../src/config";

describe("Database configurations", () => {
  afterEach(() => {
    resetDatabaseConfigurations();
  });

  it("should default the debug level to warn", () => {
    expect(getDatabaseDebugLevel()).toBe("warn");
  });

  it("should merge configurations", () => {
    setDatabaseConfigurations({ debugLevel: "info" });
    setDatabaseConfigurations({ dynamicRelations: { modelNamespace: "Domain" } });

    expect(getDatabaseDebugLevel()).toBe("info");
    expect(getDatabaseConfig("dynamicRelations")).toEqual({ modelNamespace: "Domain" });
    expect(getDatabaseConfigurations()).toEqual({
      debugLevel: "info",
      dynamicRelations: { modelNamespace: "Domain" },
    });
  });

  it("should reset configurations", () => {
    setDatabaseConfigurations({ debugLevel: "error" });
    resetDatabaseConfigurations();

    expect(getDatabaseConfigurations()).toEqual({});
  });
});
