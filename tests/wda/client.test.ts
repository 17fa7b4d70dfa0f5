import { jest } from "@jest/globals";
import { AppState } from "../../src/types.js";
import { encodeTap } from "../../src/wda/actions.js";
import { WdaClient } from "../../src/wda/client.js";
import { AutomationError } from "../../src/wda/errors.js";
import { HttpTransport } from "../../src/wda/transport.js";
import { fakeAgent, memoryLogger, ok } from "../helpers/fake-agent.js";

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------
describe("createSession", () => {
  it("posts the capabilities and reads a top-level session id", async () => {
    const agent = fakeAgent({
      "POST /session": { body: { sessionId: "abc", value: { capabilities: {} } } },
    });

    await expect(agent.client().createSession({ bundleId: "com.example.todo" })).resolves.toBe("abc");
    expect(agent.calls[0].body).toEqual({
      capabilities: { alwaysMatch: { bundleId: "com.example.todo" }, firstMatch: [{}] },
    });
  });

  it("reads the session id nested under value", async () => {
    const agent = fakeAgent({ "POST /session": { body: { value: { sessionId: "nested-1" } } } });
    await expect(agent.client().createSession()).resolves.toBe("nested-1");
  });

  it("reports ConnectionRefused when the agent is not listening", async () => {
    const socketError = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    const fetch = jest.fn<typeof globalThis.fetch>().mockRejectedValue(new TypeError("fetch failed", { cause: socketError }));
    const client = new WdaClient(new HttpTransport({ baseUrl: "http://127.0.0.1:8100", timeoutMs: 1000, fetch }));

    await expect(client.createSession()).rejects.toMatchObject({ kind: "ConnectionRefused" });
  });

  it("rejects a response without a session id", async () => {
    const agent = fakeAgent({ "POST /session": { body: { value: {} } } });
    await expect(agent.client().createSession()).rejects.toMatchObject({
      kind: "UnknownAgentError",
      message: "Unexpected session id in agent response",
    });
  });
});

describe("deleteSession", () => {
  it("can be called twice without raising", async () => {
    let deleted = false;
    const agent = fakeAgent({
      "DELETE /session/s1": () => {
        if (deleted) {
          return {
            status: 404,
            body: { value: { error: "invalid session id", message: "Session does not exist" } },
          };
        }
        deleted = true;
        return ok();
      },
    });
    const client = agent.client();

    await client.deleteSession("s1");
    await expect(client.deleteSession("s1")).resolves.toBeUndefined();
    expect(agent.calls).toHaveLength(2);
  });

  it("still raises when the agent is unreachable", async () => {
    const fetch = jest.fn<typeof globalThis.fetch>().mockRejectedValue(new TypeError("fetch failed"));
    const client = new WdaClient(new HttpTransport({ baseUrl: "http://127.0.0.1:8100", timeoutMs: 1000, fetch }));

    await expect(client.deleteSession("s1")).rejects.toMatchObject({ kind: "ConnectionRefused" });
  });
});

describe("getHealth", () => {
  it("is true when the agent reports ready", async () => {
    const agent = fakeAgent({ "GET /status": { body: { value: { ready: true, state: "success" } } } });
    await expect(agent.client().getHealth()).resolves.toBe(true);
  });

  it("is false instead of raising when the agent is down", async () => {
    const fetch = jest.fn<typeof globalThis.fetch>().mockRejectedValue(new TypeError("fetch failed"));
    const client = new WdaClient(new HttpTransport({ baseUrl: "http://127.0.0.1:8100", timeoutMs: 1000, fetch }));
    await expect(client.getHealth()).resolves.toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Gestures
// ---------------------------------------------------------------------------
describe("tap", () => {
  it("uses W3C pointer actions when the agent supports them", async () => {
    const agent = fakeAgent({ "POST /session/s1/actions": ok() });

    await expect(agent.client().tap("s1", { x: 100, y: 200 })).resolves.toBe("actions");
    expect(agent.calls).toHaveLength(1);
    expect(agent.calls[0].body).toEqual(encodeTap({ x: 100, y: 200 }));
  });

  it("falls back to the legacy verb only when actions are unsupported", async () => {
    const agent = fakeAgent({ "POST /session/s1/wda/tap": ok() });

    await expect(agent.client().tap("s1", { x: 100, y: 200 })).resolves.toBe("legacy");
    expect(agent.calls.map((call) => call.path)).toEqual(["/session/s1/actions", "/session/s1/wda/tap"]);
    expect(agent.calls[1].body).toEqual({ x: 100, y: 200 });
  });

  it("does not fall back on other failures", async () => {
    const agent = fakeAgent({
      "POST /session/s1/actions": {
        status: 400,
        body: { value: { error: "invalid argument", message: "x out of bounds" } },
      },
      "POST /session/s1/wda/tap": ok(),
    });

    await expect(agent.client().tap("s1", { x: -1, y: 0 })).rejects.toMatchObject({
      kind: "InvalidArgument",
      message: "x out of bounds",
    });
    expect(agent.calls).toHaveLength(1);
  });

  it("surfaces an expired session from the actions endpoint", async () => {
    const agent = fakeAgent({
      "POST /session/s1/actions": {
        status: 404,
        body: { value: { error: "invalid session id", message: "Session does not exist" } },
      },
    });
    await expect(agent.client().tap("s1", { x: 1, y: 1 })).rejects.toMatchObject({ kind: "SessionExpired" });
  });
});

describe("legacy gesture bodies", () => {
  it("sends hold and swipe durations in seconds", async () => {
    const agent = fakeAgent({
      "POST /session/s1/wda/touchAndHold": ok(),
      "POST /session/s1/wda/dragfromtoforduration": ok(),
    });
    const client = agent.client();

    await client.longPress("s1", { x: 10, y: 20 }, 1500);
    await client.swipe("s1", { x: 200, y: 600 }, { x: 200, y: 200 }, 300);

    expect(agent.calls[1].body).toEqual({ x: 10, y: 20, duration: 1.5 });
    expect(agent.calls[3].body).toEqual({ fromX: 200, fromY: 600, toX: 200, toY: 200, duration: 0.3 });
  });
});

describe("typeText", () => {
  it("sends the text as an array of characters", async () => {
    const agent = fakeAgent({ "POST /session/s1/wda/keys": ok() });
    await agent.client().typeText("s1", "hi!");
    expect(agent.calls[0].body).toEqual({ value: ["h", "i", "!"] });
  });
});

// ---------------------------------------------------------------------------
// Screen
// ---------------------------------------------------------------------------
describe("getUiTree", () => {
  it("parses the JSON source", async () => {
    const agent = fakeAgent({
      "GET /session/s1/source?format=json": ok({
        type: "XCUIElementTypeApplication",
        name: "Todo",
        rect: { x: 0, y: 0, width: 390, height: 844 },
        children: [{ type: "XCUIElementTypeButton", label: "Add", rect: { x: 10, y: 20, width: 40, height: 30 } }],
      }),
    });

    const root = await agent.client().getUiTree("s1");
    expect(root.type).toBe("Application");
    expect(root.children[0]).toMatchObject({ type: "Button", label: "Add" });
  });

  it("parses an XML source returned as a string", async () => {
    const agent = fakeAgent({
      "GET /session/s1/source?format=xml": ok(
        '<?xml version="1.0" encoding="UTF-8"?><XCUIElementTypeApplication type="XCUIElementTypeApplication" name="Todo" enabled="true" visible="true" x="0" y="0" width="390" height="844"/>',
      ),
    });

    const root = await agent.client().getUiTree("s1", "xml");
    expect(root).toMatchObject({ type: "Application", text: "Todo", frame: { x: 0, y: 0, width: 390, height: 844 } });
  });

  it("reports an unparseable source as UnknownAgentError with the payload", async () => {
    const agent = fakeAgent({ "GET /session/s1/source?format=json": ok(42) });
    const error = await agent.client().getUiTree("s1").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AutomationError);
    expect(error).toMatchObject({ kind: "UnknownAgentError", payload: 42 });
  });
});

describe("getScreenshot", () => {
  it("decodes the base64 value", async () => {
    const agent = fakeAgent({
      "GET /session/s1/screenshot": ok(Buffer.from("png-bytes").toString("base64")),
    });
    const bytes = await agent.client().getScreenshot("s1");
    expect(bytes.toString()).toBe("png-bytes");
  });
});

describe("getOrientation", () => {
  it("matches known values case-insensitively", async () => {
    const agent = fakeAgent({ "GET /session/s1/orientation": ok("landscape") });
    await expect(agent.client().getOrientation("s1")).resolves.toBe("LANDSCAPE");
  });

  it("treats unknown values as portrait and warns", async () => {
    const { logger, lines } = memoryLogger("WARN");
    const agent = fakeAgent({ "GET /session/s1/orientation": ok("SIDEWAYS") });

    await expect(agent.client(logger).getOrientation("s1")).resolves.toBe("PORTRAIT");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('WARN: Unrecognised orientation "SIDEWAYS", treating as PORTRAIT');
  });
});

// ---------------------------------------------------------------------------
// Apps and system
// ---------------------------------------------------------------------------
describe("apps", () => {
  it("maps app state numbers and falls back to Unknown", async () => {
    let state = 4;
    const agent = fakeAgent({ "POST /session/s1/wda/apps/state": () => ok(state) });
    const client = agent.client();

    await expect(client.getAppState("s1", "com.example.todo")).resolves.toBe(AppState.RunningForeground);
    state = 17;
    await expect(client.getAppState("s1", "com.example.todo")).resolves.toBe(AppState.Unknown);
  });

  it("sends launch arguments and environment", async () => {
    const agent = fakeAgent({ "POST /session/s1/wda/apps/launch": ok() });
    await agent.client().launchApp("s1", "com.example.todo", ["-seed"], { MODE: "test" });
    expect(agent.calls[0].body).toEqual({
      bundleId: "com.example.todo",
      arguments: ["-seed"],
      environment: { MODE: "test" },
    });
  });
});

describe("system", () => {
  it("rejects out-of-range coordinates without a request", async () => {
    const agent = fakeAgent();
    await expect(agent.client().setLocation("s1", { latitude: 91, longitude: 0 })).rejects.toMatchObject({
      kind: "InvalidArgument",
    });
    expect(agent.calls).toHaveLength(0);
  });

  it("round-trips the clipboard through base64", async () => {
    const agent = fakeAgent({
      "POST /session/s1/wda/setPasteboard": ok(),
      "POST /session/s1/wda/getPasteboard": ok(Buffer.from("héllo", "utf8").toString("base64")),
    });
    const client = agent.client();

    await client.setClipboard("s1", "héllo");
    expect(agent.calls[0].body).toEqual({
      content: Buffer.from("héllo", "utf8").toString("base64"),
      contentType: "plaintext",
    });
    await expect(client.getClipboard("s1")).resolves.toBe("héllo");
  });

  it("reads the appearance from device info", async () => {
    const agent = fakeAgent({ "GET /session/s1/wda/device/info": ok({ userInterfaceStyle: "dark" }) });
    await expect(agent.client().getAppearance("s1")).resolves.toBe("dark");
  });
});

describe("recording", () => {
  it("refuses to stop a recording that was never started", async () => {
    const agent = fakeAgent();
    await expect(agent.client().stopRecording("s1")).rejects.toMatchObject({
      kind: "InvalidArgument",
      message: "No recording is running for session s1; call start_recording first",
    });
    expect(agent.calls).toHaveLength(0);
  });

  it("returns the decoded video on stop", async () => {
    const agent = fakeAgent({
      "POST /session/s1/wda/video/start": ok(),
      "POST /session/s1/wda/video/stop": ok(Buffer.from("mp4-data").toString("base64")),
    });
    const client = agent.client();

    await client.startRecording("s1", { fps: 30 });
    expect(client.isRecording("s1")).toBe(true);
    await expect(client.startRecording("s1")).rejects.toMatchObject({ kind: "InvalidArgument" });

    const result = await client.stopRecording("s1");
    expect(result.video?.toString()).toBe("mp4-data");
    expect(client.isRecording("s1")).toBe(false);
    expect(agent.calls[0].body).toEqual({ fps: 30 });
  });

  it("shares recording state with clients derived through withOptions", async () => {
    const agent = fakeAgent({ "POST /session/s1/wda/video/start": ok() });
    const client = agent.client();

    await client.withOptions({ timeoutMs: 500 }).startRecording("s1");
    expect(client.isRecording("s1")).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Alerts
// ---------------------------------------------------------------------------
describe("alerts", () => {
  it("maps a missing alert to NoSuchElement", async () => {
    const agent = fakeAgent({
      "GET /session/s1/alert/text": {
        status: 404,
        body: { value: { error: "no such alert", message: "An attempt was made to operate on a modal dialog when one was not open" } },
      },
    });
    await expect(agent.client().getAlertText("s1")).rejects.toMatchObject({ kind: "NoSuchElement" });
  });

  it("names the button to press when given", async () => {
    const agent = fakeAgent({ "POST /session/s1/alert/accept": ok(), "POST /session/s1/alert/dismiss": ok() });
    const client = agent.client();

    await client.acceptAlert("s1", "Allow");
    await client.dismissAlert("s1");
    expect(agent.calls.map((call) => call.body)).toEqual([{ name: "Allow" }, {}]);
  });
});
