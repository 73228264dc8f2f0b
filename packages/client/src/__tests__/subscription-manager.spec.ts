/**
 * Tests for SubscriptionManager
 */

import type { Mock } from "vitest";
import {
  AuthError,
  MissingChannelError,
  ProvisionError,
  SubscribeError,
  TopicLimitExceededError,
} from "pushline-shared";
import { DEFAULT_ROUTES, ProvisioningApi } from "../core/provisioning-api";
import { SubscriptionManager } from "../subscription-manager";
import {
  createDeferred,
  createMockFetch,
  jsonResponse,
  subscriptionBody,
  type MockFetch,
} from "../testing";
import type { Channel } from "../types";

const channel: Channel = {
  connectUri: "wss://streaming.example.test/channels/ch-1",
  id: "ch-1",
  expiresAt: new Date("2030-01-01T01:00:00.000Z"),
};

const renewed: Channel = {
  connectUri: "wss://streaming.example.test/channels/ch-2",
  id: "ch-2",
  expiresAt: new Date("2030-01-01T02:00:00.000Z"),
};

const SUBSCRIPTIONS_URL = "https://api.example.test/api/v2/notifications/channels/ch-1/subscriptions";
const RENEWED_SUBSCRIPTIONS_URL = "https://api.example.test/api/v2/notifications/channels/ch-2/subscriptions";

describe("SubscriptionManager", () => {
  let fetch: MockFetch;
  let ensureChannel: Mock<() => Promise<Channel>>;
  let current: Channel;
  let manager: SubscriptionManager;

  beforeEach(() => {
    fetch = createMockFetch();
    current = channel;
    ensureChannel = vi.fn(async () => current);
    manager = new SubscriptionManager({
      api: new ProvisioningApi({
        baseUrl: "https://api.example.test",
        token: "test-secret",
        userAgent: "pushline-test/1.0",
        requestTimeout: 0,
        routes: DEFAULT_ROUTES,
        fetch,
      }),
      channels: { ensureChannel, currentChannelId: () => current.id },
      topicLimit: 1000,
    });
  });

  describe("topic limit", () => {
    it("should reject more than the limit without any network call", async () => {
      const topics = Array.from({ length: 1001 }, (_, i) => `topic-${i}`);

      const error = await manager.subscribe(topics, "replace").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TopicLimitExceededError);
      expect(error).toMatchObject({ message: "Topic count of 1001 is more than limit of 1000" });
      expect(fetch.requests).toHaveLength(0);
      expect(ensureChannel).not.toHaveBeenCalled();
    });

    it("should accept exactly the limit", async () => {
      const topics = Array.from({ length: 1000 }, (_, i) => `topic-${i}`);
      fetch.enqueue(jsonResponse(200, subscriptionBody(topics)));

      const subscribed = await manager.subscribe(topics, "replace");

      expect(subscribed.size).toBe(1000);
    });

    it("should count distinct topics", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["a"])));

      await manager.subscribe(["a", "a", "a"], "replace");

      expect(fetch.requests[0].body).toBe('[{"id":"a"}]');
    });
  });

  describe("replace", () => {
    it("should PUT the topics to the channel", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["a", "b"])));

      const subscribed = await manager.subscribe(["a", "b"], "replace");

      expect(subscribed).toEqual(new Set(["a", "b"]));
      expect(fetch.requests[0]).toMatchObject({ url: SUBSCRIPTIONS_URL, method: "PUT" });
    });

    it("should keep only the topics the server echoed", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["a"])));

      const subscribed = await manager.subscribe(["a", "b"], "replace");

      expect(subscribed).toEqual(new Set(["a"]));
    });

    it("should drop earlier topics", async () => {
      fetch.enqueue(
        jsonResponse(200, subscriptionBody(["a", "b"])),
        jsonResponse(200, subscriptionBody(["c"])),
      );

      await manager.subscribe(["a", "b"], "replace");
      const subscribed = await manager.subscribe(["c"], "replace");

      expect(subscribed).toEqual(new Set(["c"]));
    });

    it("should allow clearing with an empty set", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["a"])), jsonResponse(200, subscriptionBody([])));

      await manager.subscribe(["a"], "replace");
      const subscribed = await manager.subscribe([], "replace");

      expect(subscribed.size).toBe(0);
    });
  });

  describe("append", () => {
    it("should POST and union the echoed topics", async () => {
      fetch.enqueue(
        jsonResponse(200, subscriptionBody(["a"])),
        jsonResponse(200, subscriptionBody(["b"])),
      );

      await manager.subscribe(["a"], "replace");
      const subscribed = await manager.subscribe(["b"], "append");

      expect(subscribed).toEqual(new Set(["a", "b"]));
      expect(fetch.requests[1]).toMatchObject({ method: "POST", body: '[{"id":"b"}]' });
    });
  });

  describe("channel changes", () => {
    it("should replay the set before appending onto a new channel", async () => {
      fetch.enqueue(
        jsonResponse(200, subscriptionBody(["a", "b"])),
        jsonResponse(200, subscriptionBody(["a"])),
        jsonResponse(200, subscriptionBody(["c"])),
      );
      await manager.subscribe(["a", "b"], "replace");
      current = renewed;

      const subscribed = await manager.subscribe(["c"], "append");

      expect(subscribed).toEqual(new Set(["a", "c"]));
      expect(fetch.requests.slice(1)).toMatchObject([
        { method: "PUT", url: RENEWED_SUBSCRIPTIONS_URL, body: '[{"id":"a"},{"id":"b"}]' },
        { method: "POST", url: RENEWED_SUBSCRIPTIONS_URL, body: '[{"id":"c"}]' },
      ]);
    });

    it("should not replay an empty set", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["c"])));

      await manager.subscribe(["c"], "append");

      expect(fetch.requests).toHaveLength(1);
    });

    it("should start from the echo when appending to a channel the set was not synced to", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["a"])), jsonResponse(200, subscriptionBody(["c"])));
      await manager.subscribe(["a"], "replace");
      current = renewed;

      const subscribed = await manager.sync(renewed, new Set(["c"]), "append");

      expect(subscribed).toEqual(new Set(["c"]));
    });

    it("should retry on the current channel when the channel is replaced mid-request", async () => {
      const stale = createDeferred<Response>();
      fetch.enqueue(stale.promise, jsonResponse(200, subscriptionBody(["b"])));

      const subscribing = manager.subscribe(["b"], "replace");
      await vi.waitFor(() => expect(fetch.requests).toHaveLength(1));
      current = renewed;
      stale.resolve(jsonResponse(200, subscriptionBody(["b", "stale"])));

      await expect(subscribing).resolves.toEqual(new Set(["b"]));
      expect(fetch.requests.map((request) => request.url)).toEqual([
        SUBSCRIPTIONS_URL,
        RENEWED_SUBSCRIPTIONS_URL,
      ]);
    });

    it("should give up when every answer arrives for a replaced channel", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["b"])), jsonResponse(200, subscriptionBody(["b"])));
      const channels = { ensureChannel, currentChannelId: () => "ch-other" };
      manager = new SubscriptionManager({
        api: new ProvisioningApi({
          baseUrl: "https://api.example.test",
          token: "test-secret",
          userAgent: "pushline-test/1.0",
          requestTimeout: 0,
          routes: DEFAULT_ROUTES,
          fetch,
        }),
        channels,
        topicLimit: 1000,
      });

      const error = await manager.subscribe(["b"], "replace").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SubscribeError);
      expect(error instanceof SubscribeError && error.reason).toBe("superseded");
      expect(fetch.requests).toHaveLength(2);
      expect(manager.snapshot()).toEqual(new Set());
    });
  });

  describe("failures", () => {
    it("should fail with AuthError on 401", async () => {
      fetch.enqueue(new Response("", { status: 401 }));

      await expect(manager.subscribe(["a"], "replace")).rejects.toBeInstanceOf(AuthError);
    });

    it("should fail with a status error on other codes", async () => {
      fetch.enqueue(new Response("", { status: 500 }));

      await expect(manager.subscribe(["a"], "replace")).rejects.toMatchObject({
        code: "SUBSCRIBE_STATUS",
        statusCode: 500,
        message: "Subscription request returned status 500",
      });
    });

    it("should fail with a decode error on a malformed body", async () => {
      fetch.enqueue(jsonResponse(200, {}));

      const error = await manager.subscribe(["a"], "replace").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SubscribeError);
      expect(error).toMatchObject({
        code: "SUBSCRIBE_DECODE",
        message: "Invalid subscription response: entities: Required",
      });
    });

    it("should fail with a transport error when the request fails", async () => {
      fetch.enqueue(new Error("socket hang up"));

      await expect(manager.subscribe(["a"], "replace")).rejects.toMatchObject({
        code: "SUBSCRIBE_TRANSPORT",
        message: "Subscription request failed: socket hang up",
      });
    });

    it("should leave the set unchanged on failure", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["a"])), new Response("", { status: 500 }));

      await manager.subscribe(["a"], "replace");
      await expect(manager.subscribe(["b"], "replace")).rejects.toBeInstanceOf(SubscribeError);

      expect(manager.snapshot()).toEqual(new Set(["a"]));
    });

    it("should report a channel that could not be provisioned as missing", async () => {
      const cause = new ProvisionError("status", "Channel request returned status 503", { statusCode: 503 });
      ensureChannel.mockRejectedValueOnce(cause);

      const error = await manager.subscribe(["a"], "replace").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MissingChannelError);
      expect(error).toMatchObject({
        message: "No channel could be provisioned: Channel request returned status 503",
      });
      expect(error instanceof MissingChannelError && error.cause).toBe(cause);
      expect(fetch.requests).toHaveLength(0);
    });

    it("should pass a rejected token through", async () => {
      ensureChannel.mockRejectedValueOnce(new AuthError());

      await expect(manager.subscribe(["a"], "replace")).rejects.toBeInstanceOf(AuthError);
    });
  });

  describe("sync", () => {
    it("should target the given channel", async () => {
      fetch.enqueue(jsonResponse(200, subscriptionBody(["a"])));
      current = renewed;

      await manager.sync(renewed, new Set(["a"]), "replace");

      expect(fetch.requests[0].url).toBe(RENEWED_SUBSCRIPTIONS_URL);
      expect(ensureChannel).not.toHaveBeenCalled();
    });
  });

  it("should hand out copies", async () => {
    fetch.enqueue(jsonResponse(200, subscriptionBody(["a"])));
    await manager.subscribe(["a"], "replace");

    manager.snapshot().add("injected");

    expect(manager.snapshot()).toEqual(new Set(["a"]));
  });
});
