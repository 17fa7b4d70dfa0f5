import { exec, execBuffer, quote } from "../utils/exec.js";
import type { Device, DeviceState, InstalledApp } from "../types.js";
import { AutomationError, DeviceManagementError } from "../wda/errors.js";

interface SimctlDevice {
  udid: string;
  name: string;
  state: string;
  isAvailable?: boolean;
}

export interface StatusBarOverrides {
  time?: string;
  dataNetwork?: "hide" | "wifi" | "3g" | "4g" | "lte" | "lte-a" | "lte+" | "5g" | "5g+" | "5g-uwb" | "5g-uc";
  wifiBars?: number;
  cellularBars?: number;
  operatorName?: string;
  batteryState?: "charging" | "charged" | "discharging";
  batteryLevel?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(command: string, output: string): unknown {
  try {
    return JSON.parse(output);
  } catch (error) {
    throw new DeviceManagementError(
      command,
      `Unparseable JSON from ${command}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * "com.apple.CoreSimulator.SimRuntime.iOS-17-2" -> "17.2"
 */
export function parseOsVersion(runtime: string): string {
  const match = runtime.match(/(\d+(?:[-.]\d+)*)$/);
  return match ? match[1].replace(/-/g, ".") : runtime;
}

export function parseDeviceState(state: string): DeviceState {
  switch (state.toLowerCase()) {
    case "booted":
      return "Booted";
    case "shutdown":
      return "Shutdown";
    case "booting":
      return "Booting";
    default:
      return "Unknown";
  }
}

function isSimctlDevice(value: unknown): value is SimctlDevice {
  return (
    isRecord(value) &&
    typeof value.udid === "string" &&
    typeof value.name === "string" &&
    typeof value.state === "string"
  );
}

export async function listDevices(): Promise<Device[]> {
  const command = "xcrun simctl list devices available --json";
  const data = parseJson(command, await exec(command));
  const runtimes = isRecord(data) && isRecord(data.devices) ? data.devices : {};

  const devices: Device[] = [];
  for (const [runtime, entries] of Object.entries(runtimes)) {
    if (!Array.isArray(entries)) continue;
    for (const entry of entries.filter(isSimctlDevice)) {
      devices.push({
        id: entry.udid,
        name: entry.name,
        osVersion: parseOsVersion(runtime),
        state: parseDeviceState(entry.state),
        available: entry.isAvailable ?? true,
      });
    }
  }

  // Booted first, then by name
  return devices.sort(
    (a, b) =>
      Number(b.state === "Booted") - Number(a.state === "Booted") || a.name.localeCompare(b.name),
  );
}

export async function getDevice(deviceId: string): Promise<Device> {
  const devices = await listDevices();
  const device = devices.find((d) => d.id === deviceId);
  if (!device) {
    throw new DeviceManagementError("xcrun simctl list devices", `Simulator ${deviceId} not found`);
  }
  return device;
}

async function runTolerating(command: string, alreadyDone: string): Promise<boolean> {
  try {
    await exec(command, { timeout: 120_000 });
    return true;
  } catch (error) {
    if (error instanceof DeviceManagementError && error.stderr.includes(alreadyDone)) {
      return false;
    }
    throw error;
  }
}

/** Returns false when the simulator was already booted. */
export async function bootDevice(deviceId: string): Promise<boolean> {
  return runTolerating(`xcrun simctl boot ${quote(deviceId)}`, "current state: Booted");
}

/** Returns false when the simulator was already shut down. */
export async function shutdownDevice(deviceId: string): Promise<boolean> {
  return runTolerating(`xcrun simctl shutdown ${quote(deviceId)}`, "current state: Shutdown");
}

/** Raw PNG bytes written by simctl to stdout. */
export async function captureScreenshot(deviceId: string): Promise<Buffer> {
  return execBuffer(`xcrun simctl io ${quote(deviceId)} screenshot --type=png -`, {
    timeout: 30_000,
  });
}

export async function installApp(deviceId: string, appPath: string): Promise<void> {
  await exec(`xcrun simctl install ${quote(deviceId)} ${quote(appPath)}`, { timeout: 120_000 });
}

export async function uninstallApp(deviceId: string, bundleId: string): Promise<void> {
  await exec(`xcrun simctl uninstall ${quote(deviceId)} ${quote(bundleId)}`, { timeout: 60_000 });
}

export async function openUrl(deviceId: string, url: string): Promise<void> {
  await exec(`xcrun simctl openurl ${quote(deviceId)} ${quote(url)}`);
}

/** simctl prints an old-style plist; plutil converts it to JSON. */
export async function listApps(deviceId: string): Promise<InstalledApp[]> {
  const command = `xcrun simctl listapps ${quote(deviceId)} | plutil -convert json -o - -`;
  const data = parseJson(command, await exec(command, { timeout: 30_000 }));
  if (!isRecord(data)) return [];

  return Object.entries(data)
    .map(([bundleId, info]) => {
      const details = isRecord(info) ? info : {};
      const name = details.CFBundleDisplayName ?? details.CFBundleName;
      return {
        bundleId,
        name: typeof name === "string" ? name : bundleId,
        type: typeof details.ApplicationType === "string" ? details.ApplicationType : "Unknown",
      };
    })
    .sort((a, b) => a.bundleId.localeCompare(b.bundleId));
}

export function statusBarArgs(overrides: StatusBarOverrides): string[] {
  const args: string[] = [];
  if (overrides.time !== undefined) args.push("--time", quote(overrides.time));
  if (overrides.dataNetwork !== undefined) args.push("--dataNetwork", overrides.dataNetwork);
  if (overrides.wifiBars !== undefined) args.push("--wifiBars", String(overrides.wifiBars));
  if (overrides.cellularBars !== undefined) args.push("--cellularBars", String(overrides.cellularBars));
  if (overrides.operatorName !== undefined) args.push("--operatorName", quote(overrides.operatorName));
  if (overrides.batteryState !== undefined) args.push("--batteryState", overrides.batteryState);
  if (overrides.batteryLevel !== undefined) args.push("--batteryLevel", String(overrides.batteryLevel));
  return args;
}

export async function overrideStatusBar(deviceId: string, overrides: StatusBarOverrides): Promise<void> {
  const args = statusBarArgs(overrides);
  if (args.length === 0) {
    throw new AutomationError("InvalidArgument", "Give at least one status bar value to override");
  }
  await exec(`xcrun simctl status_bar ${quote(deviceId)} override ${args.join(" ")}`);
}

export async function clearStatusBar(deviceId: string): Promise<void> {
  await exec(`xcrun simctl status_bar ${quote(deviceId)} clear`);
}

export type DartServiceKind = "dtd" | "vm-service";

export interface DartServiceUri {
  kind: DartServiceKind;
  /** WebSocket URI a Dart tool can connect to. */
  uri: string;
  /** Timestamp of the log line, as printed by `log show --style compact`. */
  loggedAt?: string;
}

const DART_LOG_MARKERS = ["Dart Tooling Daemon", "Dart VM Service", "Dart VM service", "DTD"];
const LOG_TIMESTAMP = /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d+)/;
const WS_URI = /ws:\/\/[^\s"'<>]+/;
const HTTP_URI = /https?:\/\/[^\s"'<>]+/;

function trimUri(uri: string): string {
  return uri.replace(/[.,;)\]]+$/, "");
}

/** VM service URIs are printed as http; tools connect to the /ws endpoint. */
export function vmServiceWebSocketUri(httpUri: string): string {
  const base = httpUri.replace(/^http/, "ws");
  return base.endsWith("/") ? `${base}ws` : `${base}/ws`;
}

/**
 * Pulls Dart Tooling Daemon and VM service URIs out of device log text,
 * newest first, each URI once.
 */
export function parseDartServiceUris(log: string): DartServiceUri[] {
  const found = new Map<string, DartServiceUri>();

  for (const line of log.split("\n")) {
    let entry: DartServiceUri | undefined;
    const ws = line.match(WS_URI);
    const http = line.match(HTTP_URI);

    if (/Dart Tooling Daemon|\bDTD\b/.test(line) && ws) {
      entry = { kind: "dtd", uri: trimUri(ws[0]) };
    } else if (/Dart VM [Ss]ervice/.test(line) && http) {
      entry = { kind: "vm-service", uri: vmServiceWebSocketUri(trimUri(http[0])) };
    }
    if (!entry) continue;

    const timestamp = line.match(LOG_TIMESTAMP);
    if (timestamp) entry.loggedAt = timestamp[1];
    // Later lines win, and move to the end of the insertion order.
    found.delete(entry.uri);
    found.set(entry.uri, entry);
  }

  return [...found.values()].reverse();
}

/** Scans the simulator's unified log for URIs printed by Flutter debug builds. */
export async function discoverDtdUris(deviceId: string, lookbackMinutes = 10): Promise<DartServiceUri[]> {
  const predicate = DART_LOG_MARKERS.map((marker) => `eventMessage CONTAINS "${marker}"`).join(" OR ");
  const command =
    `xcrun simctl spawn ${quote(deviceId)} log show --style compact ` +
    `--last ${lookbackMinutes}m --predicate ${quote(predicate)}`;
  return parseDartServiceUris(await exec(command, { timeout: 60_000 }));
}
