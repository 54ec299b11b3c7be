import { ConfigError, enabledLogLevels, loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ JWT_SECRET: "test-secret" });

    expect(config).toMatchObject({
      port: 3000,
      databasePath: "glucocare.db",
      jwtExpiresIn: "15m",
      openai: { apiKey: null, model: "gpt-4o", timeoutMs: 60_000 },
      vapid: null,
      defaultTimezone: "UTC",
      logLevel: "log",
      corsOrigin: null,
    });
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ JWT_SECRET: "test-secret", OPENAI_API_KEY: "", PORT: "8080" });

    expect(config.openai.apiKey).toBeNull();
    expect(config.port).toBe(8080);
  });

  it("needs all three VAPID values", () => {
    const env = {
      JWT_SECRET: "test-secret",
      VAPID_EMAIL: "mailto:ops@example.com",
      VAPID_PUBLIC_KEY: "test-public",
    };

    expect(loadConfig(env).vapid).toBeNull();
    expect(loadConfig({ ...env, VAPID_PRIVATE_KEY: "test-private" }).vapid).toEqual({
      email: "mailto:ops@example.com",
      publicKey: "test-public",
      privateKey: "test-private",
    });
  });

  it("reports every invalid variable", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "0" })).toThrow(/JWT_SECRET/);
  });

  it("rejects an unknown default time zone", () => {
    const env = { JWT_SECRET: "test-secret", DEFAULT_TIMEZONE: "Mars/Olympus_Mons" };

    expect(() => loadConfig(env)).toThrow(ConfigError);
    expect(() => loadConfig(env)).toThrow(
      "Invalid configuration:\n  DEFAULT_TIMEZONE: must be an IANA time zone",
    );
    expect(
      loadConfig({ JWT_SECRET: "test-secret", DEFAULT_TIMEZONE: "America/Chicago" }).defaultTimezone,
    ).toBe("America/Chicago");
  });
});

describe("enabledLogLevels", () => {
  it("enables the configured level and everything more severe", () => {
    expect(enabledLogLevels("warn")).toEqual(["error", "warn"]);
    expect(enabledLogLevels("verbose")).toHaveLength(5);
  });
});
