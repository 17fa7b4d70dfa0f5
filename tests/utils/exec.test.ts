import { exec, execBuffer, quote } from "../../src/utils/exec.js";
import { DeviceManagementError } from "../../src/wda/errors.js";

describe("exec", () => {
  it("resolves with stdout for a successful command", async () => {
    await expect(exec("echo hello")).resolves.toBe("hello\n");
  });

  it("rejects with a DeviceManagementError carrying the exit code and stderr", async () => {
    const error = await exec("echo nope >&2; exit 3").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeviceManagementError);
    expect(error).toMatchObject({
      command: "echo nope >&2; exit 3",
      exitCode: 3,
      stderr: "nope\n",
      message: "Command failed: echo nope >&2; exit 3\nnope",
    });
  });

  it("reports a timeout", async () => {
    const error = await exec("sleep 10", { timeout: 100 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DeviceManagementError);
    expect(error).toMatchObject({ message: "Command failed: sleep 10\ntimed out" });
  });
});

describe("execBuffer", () => {
  it("resolves with a Buffer for a successful command", async () => {
    const result = await execBuffer("printf binary");
    expect(Buffer.isBuffer(result)).toBe(true);
    expect(result.toString()).toBe("binary");
  });

  it("rejects when the command fails", async () => {
    await expect(execBuffer("exit 1")).rejects.toThrow(/^Command failed: exit 1/);
  });
});

describe("quote", () => {
  it("wraps arguments so the shell passes them through untouched", async () => {
    expect(quote("plain")).toBe("'plain'");
    expect(quote("it's")).toBe("'it'\\''s'");
    await expect(exec(`printf %s ${quote("a b'c $HOME")}`)).resolves.toBe("a b'c $HOME");
  });
});
