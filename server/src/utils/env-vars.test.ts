import { describe, expect, it } from "vitest";
import { parseEnv } from "./env-vars";

describe("parseEnv", () => {
  it("fills in defaults", () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: "development",
      APP_PORT: 3000,
      DATABASE_FILE: "./data/kakeibo.sqlite",
      MAX_FILE_SIZE: 5242880,
      RECEIPT_DIRECTORY: "./uploads/receipts",
      DATE_SUBDIRECTORIES: true,
    });
  });

  it("parses numbers and flags", () => {
    const env = parseEnv({
      APP_PORT: "8080",
      MAX_FILE_SIZE: "1048576",
      DATE_SUBDIRECTORIES: "FALSE",
      APP_API_KEY: "test-user",
      APP_API_SECRET: "test-secret",
    });
    expect(env.APP_PORT).toBe(8080);
    expect(env.MAX_FILE_SIZE).toBe(1048576);
    expect(env.DATE_SUBDIRECTORIES).toBe(false);
    expect(env.APP_API_SECRET).toBe("test-secret");
  });

  it("rejects an unknown log level", () => {
    expect(() => parseEnv({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
