import type {
  Appearance,
  ElementNode,
  HardwareButton,
  Location,
  Orientation,
  Point,
  SourceFormat,
  WindowSize,
} from "../types.js";
import { AppState } from "../types.js";
import { parseJsonSource, parseXmlSource, SourceParseError } from "../ui/tree.js";
import { Logger, silentLogger } from "../utils/logger.js";
import {
  type ActionsPayload,
  encodeDoubleTap,
  encodeLongPress,
  encodeSwipe,
  encodeTap,
} from "./actions.js";
import {
  AutomationError,
  fromTransportError,
  isAutomationError,
  isUnsupportedEndpoint,
  normalizeAgentResponse,
} from "./errors.js";
import {
  type HttpMethod,
  HttpTransport,
  type RequestOptions,
  TransportError,
  type TransportResponse,
} from "./transport.js";

/** Which encoding carried a gesture: W3C actions or a `/wda/...` verb. */
export type GestureTier = "actions" | "legacy";

export interface RecordingOptions {
  fps?: number;
}

export interface RecordingResult {
  durationMs: number;
  video?: Buffer;
}

interface LegacyGesture {
  path: string;
  body: Record<string, number>;
}

const ORIENTATIONS: readonly Orientation[] = [
  "PORTRAIT",
  "LANDSCAPE",
  "UIA_DEVICE_ORIENTATION_LANDSCAPERIGHT",
  "UIA_DEVICE_ORIENTATION_PORTRAIT_UPSIDEDOWN",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unexpected(what: string, payload: unknown): AutomationError {
  return new AutomationError("UnknownAgentError", `Unexpected ${what} in agent response`, {
    payload,
  });
}

function expectString(value: unknown, what: string): string {
  if (typeof value !== "string") throw unexpected(what, value);
  return value;
}

function expectNumber(value: unknown, what: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) throw unexpected(what, value);
  return value;
}

function expectRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) throw unexpected(what, value);
  return value;
}

function seconds(ms: number): number {
  return Math.max(0, ms) / 1000;
}

function session(sessionId: string): string {
  return `/session/${encodeURIComponent(sessionId)}`;
}

/**
 * WebDriverAgent client. Stateless with respect to sessions except for
 * screen recordings, which are tracked per session id so that a stop
 * without a start is reported instead of ignored.
 */
export class WdaClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly defaults: RequestOptions;
  private readonly recordings: Map<string, number>;

  constructor(
    transport: HttpTransport,
    logger: Logger = silentLogger,
    defaults: RequestOptions = {},
    recordings: Map<string, number> = new Map(),
  ) {
    this.transport = transport;
    this.logger = logger;
    this.defaults = defaults;
    this.recordings = recordings;
  }

  get baseUrl(): string {
    return this.transport.baseUrl;
  }

  /** Same client with per-request options (e.g. a caller timeout) applied. */
  withOptions(options: RequestOptions): WdaClient {
    return new WdaClient(
      this.transport,
      this.logger,
      { ...this.defaults, ...options },
      this.recordings,
    );
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    let response: TransportResponse;
    try {
      response = await this.transport.send(method, path, body, this.defaults);
    } catch (error) {
      if (error instanceof TransportError) throw fromTransportError(error);
      throw error;
    }

    const failure = normalizeAgentResponse(response.status, response.body);
    if (failure) {
      this.logger.debug(`${method} ${path} -> ${failure.kind}: ${failure.message}`);
      throw failure;
    }
    return response.body;
  }

  /** Like `request` but unwraps the WebDriver `{ value }` envelope. */
  private async call(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const raw = await this.request(method, path, body);
    return isRecord(raw) && "value" in raw ? raw.value : raw;
  }

  // -------------------------------------------------------------------------
  // Sessions and health
  // -------------------------------------------------------------------------

  async createSession(capabilities: Record<string, unknown> = {}): Promise<string> {
    const body = await this.request("POST", "/session", {
      capabilities: { alwaysMatch: capabilities, firstMatch: [{}] },
    });

    const value = isRecord(body) && isRecord(body.value) ? body.value : {};
    const sessionId = isRecord(body) ? body.sessionId ?? value.sessionId : undefined;
    if (typeof sessionId !== "string" || sessionId === "") {
      throw unexpected("session id", body);
    }
    this.logger.debug(`Created session ${sessionId}`);
    return sessionId;
  }

  /** Idempotent: a session the agent no longer knows counts as deleted. */
  async deleteSession(sessionId: string): Promise<void> {
    this.recordings.delete(sessionId);
    try {
      await this.call("DELETE", session(sessionId));
    } catch (error) {
      if (
        isAutomationError(error, "SessionExpired") ||
        isAutomationError(error, "NoSuchElement") ||
        (isAutomationError(error) && error.status === 404)
      ) {
        this.logger.debug(`Session ${sessionId} was already gone: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  async getStatus(): Promise<Record<string, unknown>> {
    return expectRecord(await this.call("GET", "/status"), "status");
  }

  /** Pre-flight health check. Reports false instead of raising. */
  async getHealth(): Promise<boolean> {
    try {
      const status = await this.getStatus();
      return status.ready !== false;
    } catch (error) {
      this.logger.debug(
        `Health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // UI hierarchy and screen
  // -------------------------------------------------------------------------

  async getUiTree(sessionId: string, format: SourceFormat = "json"): Promise<ElementNode> {
    const value = await this.call("GET", `${session(sessionId)}/source?format=${format}`);
    try {
      return typeof value === "string" ? parseXmlSource(value) : parseJsonSource(value);
    } catch (error) {
      if (error instanceof SourceParseError) {
        throw new AutomationError("UnknownAgentError", error.message, { payload: value, cause: error });
      }
      throw error;
    }
  }

  async getScreenshot(sessionId: string): Promise<Buffer> {
    const value = await this.call("GET", `${session(sessionId)}/screenshot`);
    return Buffer.from(expectString(value, "screenshot"), "base64");
  }

  async getOrientation(sessionId: string): Promise<Orientation> {
    const value = expectString(await this.call("GET", `${session(sessionId)}/orientation`), "orientation");
    const known = ORIENTATIONS.find((orientation) => orientation === value.toUpperCase());
    if (!known) {
      this.logger.warn(`Unrecognised orientation "${value}", treating as PORTRAIT`);
      return "PORTRAIT";
    }
    return known;
  }

  async getWindowSize(sessionId: string): Promise<WindowSize> {
    const value = expectRecord(await this.call("GET", `${session(sessionId)}/window/size`), "window size");
    return {
      width: expectNumber(value.width, "window width"),
      height: expectNumber(value.height, "window height"),
    };
  }

  // -------------------------------------------------------------------------
  // Gestures
  // -------------------------------------------------------------------------

  /**
   * Sends W3C pointer actions; only when the agent reports the actions
   * endpoint as unsupported is the equivalent `/wda/...` verb tried.
   */
  private async gesture(
    sessionId: string,
    actions: ActionsPayload,
    fallback: LegacyGesture,
  ): Promise<GestureTier> {
    try {
      await this.call("POST", `${session(sessionId)}/actions`, actions);
      return "actions";
    } catch (error) {
      if (!isUnsupportedEndpoint(error)) throw error;
      this.logger.info(`Actions endpoint unsupported by agent, using ${fallback.path}`);
    }
    await this.call("POST", `${session(sessionId)}${fallback.path}`, fallback.body);
    return "legacy";
  }

  async tap(sessionId: string, point: Point): Promise<GestureTier> {
    return this.gesture(sessionId, encodeTap(point), {
      path: "/wda/tap",
      body: { x: point.x, y: point.y },
    });
  }

  async doubleTap(sessionId: string, point: Point): Promise<GestureTier> {
    return this.gesture(sessionId, encodeDoubleTap(point), {
      path: "/wda/doubleTap",
      body: { x: point.x, y: point.y },
    });
  }

  async longPress(sessionId: string, point: Point, durationMs: number): Promise<GestureTier> {
    return this.gesture(sessionId, encodeLongPress(point, durationMs), {
      path: "/wda/touchAndHold",
      body: { x: point.x, y: point.y, duration: seconds(durationMs) },
    });
  }

  async swipe(sessionId: string, from: Point, to: Point, durationMs: number): Promise<GestureTier> {
    return this.gesture(sessionId, encodeSwipe(from, to, durationMs), {
      path: "/wda/dragfromtoforduration",
      body: {
        fromX: from.x,
        fromY: from.y,
        toX: to.x,
        toY: to.y,
        duration: seconds(durationMs),
      },
    });
  }

  async typeText(sessionId: string, text: string): Promise<void> {
    await this.call("POST", `${session(sessionId)}/wda/keys`, { value: Array.from(text) });
  }

  async pressButton(sessionId: string, button: HardwareButton): Promise<void> {
    await this.call("POST", `${session(sessionId)}/wda/pressButton`, { name: button });
  }

  // -------------------------------------------------------------------------
  // Apps
  // -------------------------------------------------------------------------

  /** Not idempotent: a relaunch may reset app state, so never retry it. */
  async launchApp(
    sessionId: string,
    bundleId: string,
    args: string[] = [],
    environment: Record<string, string> = {},
  ): Promise<void> {
    await this.call("POST", `${session(sessionId)}/wda/apps/launch`, {
      bundleId,
      arguments: args,
      environment,
    });
  }

  /** Returns false when the app was not running. */
  async terminateApp(sessionId: string, bundleId: string): Promise<boolean> {
    const value = await this.call("POST", `${session(sessionId)}/wda/apps/terminate`, { bundleId });
    return value === true;
  }

  async activateApp(sessionId: string, bundleId: string): Promise<void> {
    await this.call("POST", `${session(sessionId)}/wda/apps/activate`, { bundleId });
  }

  async getAppState(sessionId: string, bundleId: string): Promise<AppState> {
    const value = expectNumber(
      await this.call("POST", `${session(sessionId)}/wda/apps/state`, { bundleId }),
      "app state",
    );
    return value in AppState ? value : AppState.Unknown;
  }

  // -------------------------------------------------------------------------
  // System
  // -------------------------------------------------------------------------

  async setLocation(sessionId: string, location: Location): Promise<void> {
    if (Math.abs(location.latitude) > 90 || Math.abs(location.longitude) > 180) {
      throw new AutomationError(
        "InvalidArgument",
        `Location out of range: ${location.latitude}, ${location.longitude}`,
      );
    }
    await this.call("POST", `${session(sessionId)}/wda/simulatedLocation`, location);
  }

  /** Undefined when no simulated location is set. */
  async getLocation(sessionId: string): Promise<Location | undefined> {
    const value = await this.call("GET", `${session(sessionId)}/wda/simulatedLocation`);
    if (!isRecord(value)) return undefined;
    const { latitude, longitude } = value;
    if (typeof latitude !== "number" || typeof longitude !== "number") return undefined;
    return { latitude, longitude };
  }

  async clearLocation(sessionId: string): Promise<void> {
    await this.call("DELETE", `${session(sessionId)}/wda/simulatedLocation`);
  }

  async getClipboard(sessionId: string): Promise<string> {
    const value = await this.call("POST", `${session(sessionId)}/wda/getPasteboard`, {
      contentType: "plaintext",
    });
    return Buffer.from(expectString(value, "pasteboard content"), "base64").toString("utf8");
  }

  async setClipboard(sessionId: string, text: string): Promise<void> {
    await this.call("POST", `${session(sessionId)}/wda/setPasteboard`, {
      content: Buffer.from(text, "utf8").toString("base64"),
      contentType: "plaintext",
    });
  }

  async getAppearance(sessionId: string): Promise<Appearance | "unknown"> {
    const info = expectRecord(await this.call("GET", `${session(sessionId)}/wda/device/info`), "device info");
    const style = info.userInterfaceStyle;
    return style === "light" || style === "dark" ? style : "unknown";
  }

  async setAppearance(sessionId: string, appearance: Appearance): Promise<void> {
    await this.call("POST", `${session(sessionId)}/wda/device/appearance`, { name: appearance });
  }

  async simulateBiometric(sessionId: string, match: boolean): Promise<void> {
    await this.call("POST", `${session(sessionId)}/wda/touch_id`, { match });
  }

  async startRecording(sessionId: string, options: RecordingOptions = {}): Promise<void> {
    if (this.recordings.has(sessionId)) {
      throw new AutomationError("InvalidArgument", `A recording is already running for session ${sessionId}`);
    }
    await this.call("POST", `${session(sessionId)}/wda/video/start`, { fps: options.fps ?? 24 });
    this.recordings.set(sessionId, Date.now());
  }

  async stopRecording(sessionId: string): Promise<RecordingResult> {
    const startedAt = this.recordings.get(sessionId);
    if (startedAt === undefined) {
      throw new AutomationError(
        "InvalidArgument",
        `No recording is running for session ${sessionId}; call start_recording first`,
      );
    }
    const value = await this.call("POST", `${session(sessionId)}/wda/video/stop`);
    this.recordings.delete(sessionId);

    const durationMs = Date.now() - startedAt;
    if (typeof value === "string" && value !== "") {
      return { durationMs, video: Buffer.from(value, "base64") };
    }
    return { durationMs };
  }

  isRecording(sessionId: string): boolean {
    return this.recordings.has(sessionId);
  }

  // -------------------------------------------------------------------------
  // Alerts
  // -------------------------------------------------------------------------

  async getAlertText(sessionId: string): Promise<string> {
    return expectString(await this.call("GET", `${session(sessionId)}/alert/text`), "alert text");
  }

  async acceptAlert(sessionId: string, button?: string): Promise<void> {
    await this.call("POST", `${session(sessionId)}/alert/accept`, button ? { name: button } : {});
  }

  async dismissAlert(sessionId: string, button?: string): Promise<void> {
    await this.call("POST", `${session(sessionId)}/alert/dismiss`, button ? { name: button } : {});
  }
}
