import { jest } from "@jest/globals";
import { Bridge } from "../../src/bridge/bridge.js";
import { type AgentEndpoint, BridgeRegistry, endpointUrl } from "../../src/bridge/registry.js";
import { WdaClient } from "../../src/wda/client.js";
import { HttpTransport } from "../../src/wda/transport.js";
import { ok } from "../helpers/fake-agent.js";

const DEFAULT_ENDPOINT: AgentEndpoint = { host: "127.0.0.1", port: 8100 };

function makeRegistry() {
  const fetch = jest.fn<typeof globalThis.fetch>(async (_input, init) => {
    if (init?.method === "POST") {
      return new Response(JSON.stringify({ sessionId: "s1", value: {} }));
    }
    return new Response(JSON.stringify(ok().body));
  });
  const factory = jest.fn(
    (deviceId: string, endpoint: AgentEndpoint) =>
      new Bridge({
        deviceId,
        client: new WdaClient(new HttpTransport({ baseUrl: endpointUrl(endpoint), timeoutMs: 1000, fetch })),
      }),
  );
  return { registry: new BridgeRegistry(factory, DEFAULT_ENDPOINT), factory, fetch };
}

describe("BridgeRegistry", () => {
  it("creates one bridge per device on the default endpoint", () => {
    const { registry, factory } = makeRegistry();

    const a = registry.open("SIM-A");
    const again = registry.open("SIM-A");
    const b = registry.open("SIM-B");

    expect(again).toBe(a);
    expect(b).not.toBe(a);
    expect(a.agentUrl).toBe("http://127.0.0.1:8100");
    expect(factory).toHaveBeenCalledTimes(2);
    expect(registry.list().map((bridge) => bridge.deviceId)).toEqual(["SIM-A", "SIM-B"]);
  });

  it("fills unset endpoint fields from the default", () => {
    const { registry } = makeRegistry();
    expect(registry.open("SIM-A", { port: 8101, host: undefined }).agentUrl).toBe("http://127.0.0.1:8101");
  });

  it("replaces an idle bridge that points at another agent", () => {
    const { registry } = makeRegistry();
    const first = registry.open("SIM-A");
    const second = registry.open("SIM-A", { port: 8200 });

    expect(second).not.toBe(first);
    expect(registry.get("SIM-A")).toBe(second);
  });

  it("refuses to repoint a connected bridge", async () => {
    const { registry } = makeRegistry();
    await registry.open("SIM-A").start();

    expect(() => registry.open("SIM-A", { port: 8200 })).toThrow(
      "Device SIM-A is bridged to http://127.0.0.1:8100; stop that bridge before using http://127.0.0.1:8200",
    );
  });

  it("requires a bridge before use", () => {
    const { registry } = makeRegistry();
    expect(() => registry.require("SIM-X")).toThrow("No bridge for device SIM-X. Call start_bridge first.");
  });

  it("stops and forgets bridges on remove", async () => {
    const { registry } = makeRegistry();
    const bridge = registry.open("SIM-A");
    await bridge.start();

    await expect(registry.remove("SIM-A")).resolves.toBe(true);
    expect(bridge.state).toBe("Disconnected");
    expect(registry.get("SIM-A")).toBeUndefined();
    await expect(registry.remove("SIM-A")).resolves.toBe(false);
  });

  it("hands a concurrent open a fresh bridge while the old one stops", async () => {
    const { registry } = makeRegistry();
    const old = registry.open("SIM-A");
    await old.start();

    const removing = registry.remove("SIM-A");
    const fresh = registry.open("SIM-A");
    await Promise.all([removing, fresh.start()]);

    expect(fresh).not.toBe(old);
    expect(old.state).toBe("Disconnected");
    expect(fresh.state).toBe("Active");
    expect(registry.get("SIM-A")).toBe(fresh);
  });

  it("stops every bridge on stopAll", async () => {
    const { registry } = makeRegistry();
    const a = registry.open("SIM-A");
    const b = registry.open("SIM-B");
    await Promise.all([a.start(), b.start()]);

    await registry.stopAll();

    expect(a.state).toBe("Disconnected");
    expect(b.state).toBe("Disconnected");
    expect(registry.list()).toEqual([]);
  });
});
