import { beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeBrokerFactory, flush } from "../testing/fake-broker.js";
import { silentLogger } from "../testing/logger.js";
import { ConnectionSupervisor } from "./connection-supervisor.js";
import type { ConnectionState } from "./connection-supervisor.js";

const BASE = "playnite/playniteweb_desk";

describe("ConnectionSupervisor", () => {
  let brokers: ReturnType<typeof createFakeBrokerFactory>;
  let supervisor: ConnectionSupervisor;
  let states: ConnectionState[];

  beforeEach(() => {
    brokers = createFakeBrokerFactory();
    supervisor = new ConnectionSupervisor(BASE, brokers.factory, silentLogger(), {
      retryDelayMs: 0,
      subscribeRetryDelayMs: 0,
    });
    states = [];
    supervisor.onStateChange((state) => states.push(state));
  });

  it("subscribes to the wildcard root and extra topics on connect", async () => {
    supervisor.addSubscription("homeassistant/status");
    supervisor.start();
    brokers.current().simulateConnect();
    await flush();

    expect(brokers.current().subscribed).toEqual([[`${BASE}/#`, "homeassistant/status"]]);
    expect(states).toEqual(["connecting", "subscribed"]);
    expect(supervisor.getState()).toBe("subscribed");
  });

  it("ignores duplicate subscriptions and subscribes late additions immediately", async () => {
    supervisor.start();
    brokers.current().simulateConnect();
    await flush();

    supervisor.addSubscription(`${BASE}/#`);
    supervisor.addSubscription("bridge/desk/library/request");
    supervisor.addSubscription("bridge/desk/library/request");
    await flush();

    expect(brokers.current().subscribed).toEqual([[`${BASE}/#`], ["bridge/desk/library/request"]]);
  });

  it("resubscribes and reruns hooks once per reconnect", async () => {
    let refreshes = 0;
    supervisor.onSubscribed(() => {
      refreshes += 1;
    });
    supervisor.start();
    const broker = brokers.current();

    broker.simulateConnect();
    await flush();
    broker.simulateConnectionLost();
    expect(supervisor.getState()).toBe("connecting");
    broker.simulateConnect();
    await flush();

    expect(refreshes).toBe(2);
    expect(broker.subscribed).toHaveLength(2);
    expect(states).toEqual(["connecting", "subscribed", "disconnected", "connecting", "subscribed"]);
  });

  it("retries the subscription until the broker accepts it", async () => {
    let refreshes = 0;
    supervisor.onSubscribed(() => {
      refreshes += 1;
    });
    supervisor.start();
    const broker = brokers.current();
    broker.failNextSubscribes = 1;
    broker.simulateConnect();

    await vi.waitFor(() => expect(supervisor.getState()).toBe("subscribed"));
    expect(broker.subscribed).toEqual([[`${BASE}/#`]]);
    expect(broker.failNextSubscribes).toBe(0);
    expect(refreshes).toBe(1);
    expect(states).toEqual(["connecting", "subscribed"]);
  });

  it("stays connecting when the connection drops during the subscribe", async () => {
    let refreshes = 0;
    supervisor.onSubscribed(() => {
      refreshes += 1;
    });
    supervisor.start();
    const broker = brokers.current();
    broker.onSubscribe = () => {
      broker.onSubscribe = undefined;
      broker.simulateConnectionLost();
    };
    broker.simulateConnect();
    await flush();

    expect(supervisor.getState()).toBe("connecting");
    expect(refreshes).toBe(0);

    broker.simulateConnect();
    await flush();
    expect(supervisor.getState()).toBe("subscribed");
    expect(refreshes).toBe(1);
  });

  it("keeps running hooks after one fails", async () => {
    const ran: string[] = [];
    supervisor.onSubscribed(() => {
      throw new Error("hook broke");
    });
    supervisor.onSubscribed(() => {
      ran.push("second");
    });
    supervisor.start();
    brokers.current().simulateConnect();
    await flush();

    expect(ran).toEqual(["second"]);
  });

  it("handles inbound messages one at a time in arrival order", async () => {
    const seen: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    supervisor.onMessage(async (topic) => {
      seen.push(`begin ${topic}`);
      if (topic === "first") await gate;
      seen.push(`end ${topic}`);
    });
    supervisor.start();
    const broker = brokers.current();

    broker.deliver("first", "1");
    broker.deliver("second", "2");
    await flush();
    expect(seen).toEqual(["begin first"]);

    release();
    await supervisor.drain();
    expect(seen).toEqual(["begin first", "end first", "begin second", "end second"]);
  });

  it("continues with the next message after a handler fails", async () => {
    const seen: string[] = [];
    supervisor.onMessage((topic) => {
      if (topic === "bad") throw new Error("handler broke");
      seen.push(topic);
    });
    supervisor.start();
    brokers.current().deliver("bad", "x");
    brokers.current().deliver("good", "y");
    await supervisor.drain();

    expect(seen).toEqual(["good"]);
  });

  it("drops publishes while disconnected", async () => {
    supervisor.start();
    expect(await supervisor.publish(`${BASE}/request/library`, "")).toBe(false);
    expect(brokers.current().published).toEqual([]);
  });

  it("retries failed publishes up to the attempt limit", async () => {
    supervisor.start();
    const broker = brokers.current();
    broker.simulateConnect();
    await flush();

    broker.failNextPublishes = 2;
    expect(await supervisor.publish("a/topic", "payload", { retain: true })).toBe(true);
    expect(broker.published).toEqual([{ topic: "a/topic", payload: "payload", retain: true }]);

    broker.failNextPublishes = 3;
    expect(await supervisor.publish("a/topic", "again")).toBe(false);
    expect(broker.published).toHaveLength(1);
  });

  it("ends the session on stop", async () => {
    supervisor.start();
    const broker = brokers.current();
    broker.simulateConnect();
    await flush();

    await supervisor.stop();
    expect(broker.ended).toBe(true);
    expect(supervisor.getState()).toBe("disconnected");
  });
});
