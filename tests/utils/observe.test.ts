import sharp from "sharp";
import { Bridge } from "../../src/bridge/bridge.js";
import { captureScreen, performObservation } from "../../src/utils/observe.js";
import { fakeAgent, ok, type Route } from "../helpers/fake-agent.js";
import { TODO_JSON_SOURCE } from "../helpers/sources.js";

async function startedBridge(routes: Record<string, Route>) {
  const agent = fakeAgent({ "POST /session": { body: { sessionId: "s1", value: {} } }, ...routes });
  const bridge = new Bridge({ deviceId: "SIM-1", client: agent.client() });
  await bridge.start();
  return { agent, bridge };
}

async function landscapePng(): Promise<string> {
  const png = await sharp({
    create: { width: 400, height: 200, channels: 3, background: { r: 0, g: 0, b: 0 } },
  })
    .png()
    .toBuffer();
  return png.toString("base64");
}

describe("performObservation", () => {
  it("does nothing for mode none", async () => {
    const { agent, bridge } = await startedBridge({});
    await expect(performObservation(bridge, { mode: "none", delayMs: 5000 })).resolves.toBeUndefined();
    expect(agent.calls).toHaveLength(1);
  });

  it("renders the named and interactive part of the tree by default", async () => {
    const { bridge } = await startedBridge({ "GET /session/s1/source?format=json": ok(TODO_JSON_SOURCE) });

    const result = await performObservation(bridge, { mode: "ui_tree" });

    expect(result?.uiTree?.count).toBe(8);
    expect(result?.uiTree?.text.split("\n")[0]).toBe('[0] Application "Todo"');
    expect(result?.screenshot).toBeUndefined();
  });

  it("renders every element when filtering is off", async () => {
    const { bridge } = await startedBridge({ "GET /session/s1/source?format=json": ok(TODO_JSON_SOURCE) });
    const result = await performObservation(bridge, { mode: "ui_tree", filterUi: false });
    expect(result?.uiTree?.count).toBe(10);
  });

  it("captures both tree and screenshot", async () => {
    const { bridge } = await startedBridge({
      "GET /session/s1/source?format=json": ok(TODO_JSON_SOURCE),
      "GET /session/s1/orientation": ok("PORTRAIT"),
      "GET /session/s1/screenshot": ok(await landscapePng()),
    });

    const result = await performObservation(bridge, { mode: "both", scale: 0.5 });

    expect(result?.uiTree?.count).toBe(8);
    expect(result?.screenshot).toMatchObject({ mimeType: "image/jpeg", width: 200, height: 100 });
  });
});

describe("captureScreen", () => {
  it("rotates by the reported orientation", async () => {
    const { bridge } = await startedBridge({
      "GET /session/s1/orientation": ok("LANDSCAPE"),
      "GET /session/s1/screenshot": ok(await landscapePng()),
    });

    const screen = await captureScreen(bridge, { scale: 1, format: "png" });

    expect(screen.orientation).toBe("LANDSCAPE");
    expect([screen.width, screen.height]).toEqual([200, 400]);
    expect(screen.mimeType).toBe("image/png");
  });
});
