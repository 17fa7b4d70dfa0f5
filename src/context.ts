import type { ZodRawShape } from "zod";
import { Bridge } from "./bridge/bridge.js";
import { BridgeRegistry, endpointUrl } from "./bridge/registry.js";
import type { Config } from "./config.js";
import { ArtifactStore } from "./utils/artifacts.js";
import { Logger } from "./utils/logger.js";
import { WdaClient } from "./wda/client.js";
import { HttpTransport } from "./wda/transport.js";

export interface ToolEntry {
  description: string;
  shape: ZodRawShape;
}

/** Everything a tool handler needs, created once by the server entry point. */
export interface ServerContext {
  config: Config;
  logger: Logger;
  registry: BridgeRegistry;
  artifacts: ArtifactStore;
  tools: Map<string, ToolEntry>;
}

export interface ContextOptions {
  logger?: Logger;
  fetch?: typeof fetch;
}

export function createContext(config: Config, options: ContextOptions = {}): ServerContext {
  const logger = options.logger ?? new Logger(config.logLevel);

  const registry = new BridgeRegistry(
    (deviceId, endpoint) => {
      const transport = new HttpTransport({
        baseUrl: endpointUrl(endpoint),
        timeoutMs: config.requestTimeoutMs,
        fetch: options.fetch,
      });
      return new Bridge({
        deviceId,
        client: new WdaClient(transport, logger.child("wda")),
        logger,
      });
    },
    { host: config.agentHost, port: config.agentPort },
  );

  return {
    config,
    logger,
    registry,
    artifacts: new ArtifactStore(config.artifactsDir),
    tools: new Map(),
  };
}
