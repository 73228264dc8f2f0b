/**
 * Tests for resolveConfig
 */

import { ConfigError } from "pushline-shared";
import { systemScheduler } from "pushline-kernel";
import { createManualScheduler } from "pushline-kernel/testing";
import { resolveConfig } from "../config";

describe("resolveConfig", () => {
  it("should fill in defaults", () => {
    const config = resolveConfig({ host: "example.test", token: "test-secret" });

    expect(config).toMatchObject({
      baseUrl: "https://api.example.test",
      token: "test-secret",
      userAgent: "pushline-client/1.0",
      requestTimeout: 10_000,
      heartbeatTimeout: 35_000,
      topicLimit: 1000,
      reconnectDelay: 1000,
      maxReconnectDelay: 30_000,
      maxReconnectAttempts: 0,
      reconnectJitter: 0.25,
      autoConnect: false,
    });
    expect(config.transport).toBeUndefined();
    expect(config.scheduler).toBe(systemScheduler);
  });

  it("should use the default routes", () => {
    const { routes } = resolveConfig({ host: "example.test", token: "test-secret" });

    expect(routes.channels()).toBe("/api/v2/notifications/channels");
    expect(routes.subscriptions("ch-1")).toBe("/api/v2/notifications/channels/ch-1/subscriptions");
  });

  it("should prefer an explicit base URL and strip trailing slashes", () => {
    const config = resolveConfig({
      host: "example.test",
      baseUrl: "https://push.example.test/",
      token: "test-secret",
    });

    expect(config.baseUrl).toBe("https://push.example.test");
  });

  it("should merge custom routes over the defaults", () => {
    const { routes } = resolveConfig({
      host: "example.test",
      token: "test-secret",
      routes: { channels: () => "/v3/channels" },
    });

    expect(routes.channels()).toBe("/v3/channels");
    expect(routes.subscriptions("ch-1")).toBe("/api/v2/notifications/channels/ch-1/subscriptions");
  });

  it("should pass injected collaborators through", () => {
    const scheduler = createManualScheduler();

    const config = resolveConfig({ host: "example.test", token: "test-secret", scheduler });

    expect(config.scheduler).toBe(scheduler);
  });

  describe("validation", () => {
    it("should require host or baseUrl", () => {
      const error = (() => {
        try {
          resolveConfig({ token: "test-secret" });
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        code: "CONFIG_INVALID",
        issues: ["host: one of host or baseUrl is required"],
        message: "Invalid client configuration: host: one of host or baseUrl is required",
      });
    });

    it("should reject an empty token", () => {
      expect(() => resolveConfig({ host: "example.test", token: "" })).toThrow(
        "Invalid client configuration: token: must not be empty",
      );
    });

    it("should list every invalid field", () => {
      expect(() =>
        resolveConfig({ host: "example.test", token: "test-secret", heartbeatTimeout: 0, reconnectJitter: 2 }),
      ).toThrow(
        "Invalid client configuration: heartbeatTimeout: Number must be greater than 0; reconnectJitter: Number must be less than or equal to 1",
      );
    });

    it("should reject a malformed base URL", () => {
      expect(() => resolveConfig({ baseUrl: "not a url", token: "test-secret" })).toThrow(ConfigError);
    });
  });
});
