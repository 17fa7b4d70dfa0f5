import { AutomationError } from "../wda/errors.js";
import type { Bridge } from "./bridge.js";

export interface AgentEndpoint {
  host: string;
  port: number;
}

export type BridgeFactory = (deviceId: string, endpoint: AgentEndpoint) => Bridge;

export function endpointUrl(endpoint: AgentEndpoint): string {
  return `http://${endpoint.host}:${endpoint.port}`;
}

/**
 * Bridges keyed by device id. Owned by the server context and handed to
 * every tool; there is no process-wide instance.
 */
export class BridgeRegistry {
  private readonly bridges = new Map<string, Bridge>();
  private readonly factory: BridgeFactory;
  private readonly defaultEndpoint: AgentEndpoint;

  constructor(factory: BridgeFactory, defaultEndpoint: AgentEndpoint) {
    this.factory = factory;
    this.defaultEndpoint = defaultEndpoint;
  }

  get(deviceId: string): Bridge | undefined {
    return this.bridges.get(deviceId);
  }

  require(deviceId: string): Bridge {
    const bridge = this.bridges.get(deviceId);
    if (!bridge) {
      throw new AutomationError(
        "InvalidArgument",
        `No bridge for device ${deviceId}. Call start_bridge first.`,
      );
    }
    return bridge;
  }

  /**
   * Returns the device's bridge, creating it for `endpoint` when missing.
   * An idle bridge pointing at a different agent is replaced; a connected
   * one is not.
   */
  open(deviceId: string, endpoint: Partial<AgentEndpoint> = {}): Bridge {
    const target: AgentEndpoint = {
      host: endpoint.host ?? this.defaultEndpoint.host,
      port: endpoint.port ?? this.defaultEndpoint.port,
    };
    const url = endpointUrl(target);
    const existing = this.bridges.get(deviceId);

    if (existing && existing.agentUrl === url) return existing;
    if (existing && existing.state !== "Disconnected") {
      throw new AutomationError(
        "InvalidArgument",
        `Device ${deviceId} is bridged to ${existing.agentUrl}; stop that bridge before using ${url}`,
      );
    }

    const bridge = this.factory(deviceId, target);
    this.bridges.set(deviceId, bridge);
    return bridge;
  }

  async remove(deviceId: string): Promise<boolean> {
    const bridge = this.bridges.get(deviceId);
    if (!bridge) return false;
    // Unregister before stopping so a concurrent open() gets a fresh bridge.
    this.bridges.delete(deviceId);
    await bridge.stop();
    return true;
  }

  list(): Bridge[] {
    return [...this.bridges.values()];
  }

  async stopAll(): Promise<void> {
    const bridges = this.list();
    this.bridges.clear();
    await Promise.all(bridges.map((bridge) => bridge.stop()));
  }
}
