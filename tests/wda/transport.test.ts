import { jest } from "@jest/globals";
import { HttpTransport, TransportError } from "../../src/wda/transport.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function refusedError(): Error {
  const socketError = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:8100"), {
    code: "ECONNREFUSED",
  });
  return new TypeError("fetch failed", { cause: socketError });
}

describe("HttpTransport.send", () => {
  it("joins the base URL and path and encodes the JSON body", async () => {
    const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse({ value: null }));
    const transport = new HttpTransport({ baseUrl: "http://127.0.0.1:8100/", timeoutMs: 1000, fetch: fetchMock });

    const response = await transport.send("POST", "/session/s1/wda/tap", { x: 10, y: 20 });

    expect(response).toEqual({ status: 200, body: { value: null } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://127.0.0.1:8100/session/s1/wda/tap");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"x":10,"y":20}');
  });

  it("sends no body for GET without one", async () => {
    const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse({ value: {} }));
    const transport = new HttpTransport({ baseUrl: "http://agent", timeoutMs: 1000, fetch: fetchMock });

    await transport.send("GET", "/status");

    expect(fetchMock.mock.calls[0][1]?.body).toBeUndefined();
  });

  it("returns non-JSON bodies as text and empty bodies as null", async () => {
    const fetchMock = jest
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("Not Found", { status: 404 }))
      .mockResolvedValueOnce(new Response("", { status: 200 }));
    const transport = new HttpTransport({ baseUrl: "http://agent", timeoutMs: 1000, fetch: fetchMock });

    expect(await transport.send("GET", "/nope")).toEqual({ status: 404, body: "Not Found" });
    expect(await transport.send("DELETE", "/session/s1")).toEqual({ status: 200, body: null });
  });

  it("does not raise on HTTP error statuses", async () => {
    const fetchMock = jest
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ value: { error: "no such element", message: "x" } }, 404));
    const transport = new HttpTransport({ baseUrl: "http://agent", timeoutMs: 1000, fetch: fetchMock });

    const response = await transport.send("POST", "/session/s1/element");
    expect(response.status).toBe(404);
  });

  it("classifies a refused connection from the error cause", async () => {
    const fetchMock = jest.fn<typeof fetch>().mockRejectedValue(refusedError());
    const transport = new HttpTransport({ baseUrl: "http://127.0.0.1:8100", timeoutMs: 1000, fetch: fetchMock });

    const error = await transport.send("POST", "/session", {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      failure: "refused",
      method: "POST",
      url: "http://127.0.0.1:8100/session",
      message: "POST /session failed: fetch failed (ECONNREFUSED)",
    });
  });

  it("classifies DNS failures", async () => {
    const dnsError = Object.assign(new Error("getaddrinfo ENOTFOUND agent"), { code: "ENOTFOUND" });
    const fetchMock = jest.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed", { cause: dnsError }));
    const transport = new HttpTransport({ baseUrl: "http://agent", timeoutMs: 1000, fetch: fetchMock });

    await expect(transport.send("GET", "/status")).rejects.toMatchObject({ failure: "dns" });
  });

  it("aborts and reports a timeout when the agent does not answer in time", async () => {
    const fetchMock = jest.fn<typeof fetch>().mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
        }),
    );
    const transport = new HttpTransport({ baseUrl: "http://agent", timeoutMs: 60_000, fetch: fetchMock });

    await expect(transport.send("GET", "/source", undefined, { timeoutMs: 20 })).rejects.toMatchObject({
      failure: "timeout",
      message: "GET /source timed out after 20ms",
    });
  });
});
