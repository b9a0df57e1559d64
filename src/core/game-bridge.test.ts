import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { normalizeConfig } from "../config/load-config.js";
import { createFakeBrokerFactory, flush } from "../testing/fake-broker.js";
import type { FakeBroker } from "../testing/fake-broker.js";
import { FakeCodec } from "../testing/fake-codec.js";
import { silentLogger } from "../testing/logger.js";
import { GameBridge } from "./game-bridge.js";

const BASE = "playnite/playniteweb_desk";
const BRIDGE = "game-bridge/playniteweb_desk";
const LIBRARY_REQUEST = "playnite/request/library";
const SNAPSHOT = JSON.stringify([{ id: "g1", name: "Lantern Road", state: "started" }]);

function createBridge(raw: Record<string, unknown> = {}) {
  const brokers = createFakeBrokerFactory();
  const clock = { now: 1_000 };
  const bridge = new GameBridge({
    config: normalizeConfig({ mqtt: { broker: "localhost", topicBase: BASE }, ...raw }),
    logger: silentLogger(),
    createSession: brokers.factory,
    codec: new FakeCodec(() => 4_000),
    now: () => clock.now,
    publishRetryDelayMs: 0,
  });
  return { bridge, brokers, clock };
}

describe("GameBridge", () => {
  let bridge: GameBridge<string>;
  let brokers: ReturnType<typeof createFakeBrokerFactory>;
  let clock: { now: number };

  async function connect(): Promise<FakeBroker> {
    bridge.start();
    const broker = brokers.current();
    broker.simulateConnect();
    await flush();
    return broker;
  }

  async function deliver(broker: FakeBroker, topic: string, payload: string | Buffer, retained = false): Promise<void> {
    broker.deliver(topic, payload, retained);
    await bridge.supervisor.drain();
    await flush();
  }

  beforeEach(() => {
    ({ bridge, brokers, clock } = createBridge());
  });

  afterEach(async () => {
    await bridge.stop();
    vi.useRealTimers();
  });

  it("requests the library once per subscribe", async () => {
    const broker = await connect();
    expect(broker.publishedTo(LIBRARY_REQUEST)).toEqual([""]);

    broker.simulateConnectionLost();
    broker.simulateConnect();
    await flush();
    expect(broker.publishedTo(LIBRARY_REQUEST)).toEqual(["", ""]);
  });

  it("requests the library once per reconnect when the broker replays a retained online", async () => {
    const broker = await connect();
    broker.simulateConnectionLost();
    broker.simulateConnect();
    await flush();
    await deliver(broker, `${BASE}/connection`, "online", true);

    expect(broker.publishedTo(LIBRARY_REQUEST)).toEqual(["", ""]);
  });

  it("requests the library when the agent reports online", async () => {
    const broker = await connect();
    await deliver(broker, `${BASE}/connection`, "online");
    expect(broker.publishedTo(LIBRARY_REQUEST)).toEqual(["", ""]);
  });

  it("turns a library snapshot into Home Assistant entities", async () => {
    const broker = await connect();
    await deliver(broker, `${BASE}/response/game/state`, SNAPSHOT);

    expect(bridge.registry.get("g1")).toMatchObject({ name: "Lantern Road", displayState: "started" });
    const configs = broker.publishedTo("homeassistant/switch/playniteweb_desk/game_g1/config");
    expect(JSON.parse(configs[configs.length - 1] ?? "")).toMatchObject({
      name: "Lantern Road",
      command_topic: `${BRIDGE}/game/g1/set`,
    });
    expect(broker.publishedTo(`${BRIDGE}/game/g1/state`).at(-1)).toBe("ON");
  });

  it("carries a switch command to the library and settles on the reported state", async () => {
    const broker = await connect();
    await deliver(broker, `${BASE}/response/game/state`, SNAPSHOT);

    await deliver(broker, `${BRIDGE}/game/g1/set`, "OFF");
    expect(broker.publishedTo("playnite/request/game/stop")).toEqual(["g1"]);
    expect(bridge.registry.get("g1")).toMatchObject({
      displayState: "stopped",
      pendingCommand: { command: "stop", issuedAt: 1_000 },
    });
    expect(broker.publishedTo(`${BRIDGE}/game/g1/state`).at(-1)).toBe("OFF");

    await deliver(broker, `${BASE}/entity/release/g1/state`, "stopped");
    expect(bridge.registry.get("g1")?.pendingCommand).toBeUndefined();
  });

  it("ignores switch commands for games it has not seen", async () => {
    const broker = await connect();
    await deliver(broker, `${BRIDGE}/game/nope/set`, "ON");
    expect(broker.publishedTo("playnite/request/game/start")).toEqual([]);
    expect(bridge.registry.size).toBe(0);
  });

  it("publishes each distinct cover once", async () => {
    const broker = await connect();
    const cover = Buffer.from("cover-bytes");
    await deliver(broker, `${BASE}/entity/release/g1/asset/cover`, cover);
    await deliver(broker, `${BASE}/entity/release/g1/asset/cover`, cover);

    const published = broker.published.filter((message) => message.topic === `${BRIDGE}/game/g1/cover`);
    expect(published).toHaveLength(1);
    expect(published[0]?.payload).toEqual(Buffer.alloc(4_000));
    expect(bridge.covers.getCover("g1")?.quality).toBe(95);
  });

  it("expires unconfirmed commands on the expiry tick", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    const broker = await connect();
    await deliver(broker, `${BASE}/response/game/state`, SNAPSHOT);
    bridge.dispatcher.requestStop("g1");

    clock.now = 31_000;
    vi.advanceTimersByTime(5_000);

    expect(bridge.registry.get("g1")).toMatchObject({ displayState: "stopped", pendingCommand: undefined });
  });

  it("marks Home Assistant entities offline before disconnecting", async () => {
    const broker = await connect();
    await bridge.stop();

    const availability = broker.published.filter((message) => message.topic === `${BRIDGE}/availability`);
    expect(availability.at(-1)).toEqual({ topic: `${BRIDGE}/availability`, payload: "offline", retain: true });
    expect(broker.ended).toBe(true);
  });

  it("reports its status", async () => {
    await connect();
    expect(bridge.status()).toEqual({
      connection: "subscribed",
      topicBase: BASE,
      subscriptions: [`${BASE}/#`, `${BRIDGE}/game/+/set`, `${BRIDGE}/library/request`, "homeassistant/status"],
      games: 0,
      websocketClients: 0,
      router: { dispatched: 0, ignored: 0, malformed: 0, payloadErrors: 0, skippedRecords: 0 },
    });
  });

  it("runs without Home Assistant when disabled", async () => {
    await bridge.stop();
    ({ bridge, brokers, clock } = createBridge({ homeAssistant: { enabled: false } }));

    const broker = await connect();
    await deliver(broker, `${BASE}/response/game/state`, SNAPSHOT);

    expect(bridge.homeAssistant).toBeNull();
    expect(broker.subscribed).toEqual([[`${BASE}/#`]]);
    expect(broker.published.map((message) => message.topic)).toEqual([LIBRARY_REQUEST]);
    expect(bridge.registry.get("g1")?.displayState).toBe("started");
  });
});
