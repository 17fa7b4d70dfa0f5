import { Logger, silentLogger } from "../utils/logger.js";
import type { WdaClient } from "../wda/client.js";
import { AutomationError, isAutomationError } from "../wda/errors.js";

export type BridgeState = "Disconnected" | "Connecting" | "Active" | "Expired";

export interface BridgeOptions {
  deviceId: string;
  client: WdaClient;
  logger?: Logger;
  capabilities?: Record<string, unknown>;
  now?: () => number;
}

export interface RunOptions {
  /** Aborts the outstanding agent request after this many milliseconds. */
  timeoutMs?: number;
}

export interface BridgeHealth {
  deviceId: string;
  agentUrl: string;
  state: BridgeState;
  sessionId: string | null;
  busy: boolean;
  lastUsedAt: string | null;
  agentReachable: boolean;
}

export type BridgeOperation<T> = (client: WdaClient, sessionId: string) => Promise<T>;

/**
 * Owns the agent session for one device. Every operation goes through a
 * FIFO queue, so at most one command is in flight per device; bridges for
 * different devices never wait on each other.
 */
export class Bridge {
  readonly deviceId: string;
  private readonly client: WdaClient;
  private readonly logger: Logger;
  private readonly capabilities: Record<string, unknown>;
  private readonly now: () => number;

  private currentState: BridgeState = "Disconnected";
  private currentSession: string | null = null;
  private inFlight = false;
  private lastUsed: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: BridgeOptions) {
    this.deviceId = options.deviceId;
    this.client = options.client;
    this.logger = (options.logger ?? silentLogger).child(`bridge:${options.deviceId}`);
    this.capabilities = options.capabilities ?? {};
    this.now = options.now ?? Date.now;
  }

  get state(): BridgeState {
    return this.currentState;
  }

  get sessionId(): string | null {
    return this.currentSession;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  get lastUsedAt(): number | null {
    return this.lastUsed;
  }

  get agentUrl(): string {
    return this.client.baseUrl;
  }

  private transition(next: BridgeState): void {
    if (next === this.currentState) return;
    const message = `${this.currentState} -> ${next}`;
    if (next === "Expired") {
      this.logger.warn(message);
    } else {
      this.logger.info(message);
    }
    this.currentState = next;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const turn = this.queue.then(async () => {
      this.inFlight = true;
      try {
        return await task();
      } finally {
        this.inFlight = false;
      }
    });
    // The caller receives the rejection through `turn`; the queue only
    // needs to know the turn has settled.
    this.queue = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  private async connect(capabilities: Record<string, unknown>): Promise<string> {
    this.transition("Connecting");
    try {
      const sessionId = await this.client.createSession({ ...this.capabilities, ...capabilities });
      this.currentSession = sessionId;
      this.transition("Active");
      this.logger.info(`Session ${sessionId} active`);
      return sessionId;
    } catch (error) {
      this.currentSession = null;
      this.transition("Disconnected");
      throw error;
    }
  }

  private async discardSession(): Promise<void> {
    const sessionId = this.currentSession;
    this.currentSession = null;
    if (sessionId === null) return;
    try {
      await this.client.deleteSession(sessionId);
    } catch (error) {
      this.logger.warn(
        `Could not delete session ${sessionId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Creates a session. An active bridge keeps its session; an expired one is
   * reset first.
   */
  start(capabilities: Record<string, unknown> = {}): Promise<string> {
    return this.exclusive(async () => {
      if (this.currentState === "Active" && this.currentSession !== null) {
        return this.currentSession;
      }
      await this.discardSession();
      return this.connect(capabilities);
    });
  }

  /** Deletes the session. Safe to call on a bridge that is already down. */
  stop(): Promise<void> {
    return this.exclusive(async () => {
      await this.discardSession();
      this.transition("Disconnected");
    });
  }

  /** Delete-then-create. A failed delete is logged and ignored. */
  resetSession(capabilities: Record<string, unknown> = {}): Promise<string> {
    return this.exclusive(async () => {
      await this.discardSession();
      return this.connect(capabilities);
    });
  }

  private expiredError(cause?: AutomationError): AutomationError {
    return new AutomationError(
      "SessionExpired",
      `The agent session for device ${this.deviceId} has expired. Call reset_session before sending more commands.`,
      {
        payload: cause?.payload,
        status: cause?.status,
        agentError: cause?.agentError,
        cause,
      },
    );
  }

  /**
   * Runs one command against the live session. Commands on an expired bridge
   * fail immediately without contacting the agent.
   */
  run<T>(label: string, operation: BridgeOperation<T>, options: RunOptions = {}): Promise<T> {
    return this.exclusive(async () => {
      if (this.currentState === "Expired") {
        throw this.expiredError();
      }
      const sessionId = this.currentSession;
      if (this.currentState !== "Active" || sessionId === null) {
        throw new AutomationError(
          "InvalidArgument",
          `No active session for device ${this.deviceId}. Call start_bridge first.`,
        );
      }

      const client =
        options.timeoutMs === undefined ? this.client : this.client.withOptions({ timeoutMs: options.timeoutMs });
      this.lastUsed = this.now();
      this.logger.debug(`${label} started`);

      try {
        return await operation(client, sessionId);
      } catch (error) {
        if (isAutomationError(error, "SessionExpired")) {
          this.logger.warn(`${label} found session ${sessionId} expired: ${error.message}`);
          this.transition("Expired");
          throw this.expiredError(error);
        }
        throw error;
      }
    });
  }

  async health(): Promise<BridgeHealth> {
    return {
      deviceId: this.deviceId,
      agentUrl: this.agentUrl,
      state: this.currentState,
      sessionId: this.currentSession,
      busy: this.inFlight,
      lastUsedAt: this.lastUsed === null ? null : new Date(this.lastUsed).toISOString(),
      agentReachable: await this.client.getHealth(),
    };
  }
}
