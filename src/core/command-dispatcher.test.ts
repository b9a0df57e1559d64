import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";
import { flush } from "../testing/fake-broker.js";
import { silentLogger } from "../testing/logger.js";
import { CommandDispatcher, commandTopic, libraryRequestTopic } from "./command-dispatcher.js";
import type { CommandPublisher } from "./command-dispatcher.js";
import { EntityRegistry } from "./entity-registry.js";

const REQUEST_BASE = "playnite";

describe("CommandDispatcher", () => {
  let registry: EntityRegistry;
  let publish: Mock<CommandPublisher["publish"]>;
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    registry = new EntityRegistry(silentLogger());
    publish = vi.fn<CommandPublisher["publish"]>(async () => true);
    dispatcher = new CommandDispatcher(REQUEST_BASE, { publish }, registry, silentLogger());
  });

  it("builds request topics under the request base", () => {
    expect(commandTopic(REQUEST_BASE, "start")).toBe("playnite/request/game/start");
    expect(libraryRequestTopic(REQUEST_BASE)).toBe("playnite/request/library");
  });

  it("publishes a start request and flips the state optimistically", () => {
    registry.upsertState("g1", "stopped");

    expect(dispatcher.requestStart("g1")).toBe(true);
    expect(publish).toHaveBeenCalledWith("playnite/request/game/start", "g1");
    expect(registry.get("g1")).toMatchObject({ displayState: "started", pendingCommand: { command: "start" } });
  });

  it("publishes a stop request", () => {
    registry.upsertState("g1", "started");
    expect(dispatcher.request("g1", "stop")).toBe(true);
    expect(publish).toHaveBeenCalledWith("playnite/request/game/stop", "g1");
    expect(registry.get("g1")?.displayState).toBe("stopped");
  });

  it("refuses commands for unknown games without publishing", () => {
    expect(dispatcher.requestStart("missing")).toBe(false);
    expect(dispatcher.requestInstall("missing")).toBe(false);
    expect(publish).not.toHaveBeenCalled();
  });

  it("publishes install and uninstall requests without touching the state", () => {
    registry.upsertState("g1", "stopped");

    expect(dispatcher.request("g1", "install")).toBe(true);
    expect(dispatcher.requestUninstall("g1")).toBe(true);

    expect(publish.mock.calls).toEqual([
      ["playnite/request/game/install", "g1"],
      ["playnite/request/game/uninstall", "g1"],
    ]);
    expect(registry.get("g1")).toMatchObject({ displayState: "stopped", pendingCommand: undefined });
  });

  it("requests the library with an empty payload", () => {
    dispatcher.requestLibraryRefresh();
    expect(publish).toHaveBeenCalledWith("playnite/request/library", "");
  });

  it("keeps the optimistic state when the publish is not delivered", async () => {
    publish.mockResolvedValueOnce(false);
    registry.upsertState("g1", "stopped");

    expect(dispatcher.requestStart("g1")).toBe(true);
    await flush();
    expect(registry.get("g1")?.displayState).toBe("started");
  });

  it("does not let a rejected publish escape", async () => {
    publish.mockRejectedValueOnce(new Error("socket closed"));
    registry.upsertState("g1", "stopped");

    expect(dispatcher.requestStop("g1")).toBe(true);
    await flush();
    expect(registry.get("g1")?.pendingCommand?.command).toBe("stop");
  });
});
