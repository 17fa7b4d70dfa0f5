export type DeviceState = "Shutdown" | "Booted" | "Booting" | "Unknown";

export interface Device {
  id: string;
  name: string;
  osVersion: string;
  state: DeviceState;
  available: boolean;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

/** One node of the agent's accessibility hierarchy. */
export interface ElementNode {
  type: string;
  label?: string;
  value?: string;
  identifier?: string;
  text?: string;
  enabled: boolean;
  visible: boolean;
  frame: Rect;
  children: ElementNode[];
}

/**
 * An element tagged with its pre-order position in one tree snapshot.
 * Indices are meaningless against any other snapshot.
 */
export interface IndexedElement {
  index: number;
  depth: number;
  type: string;
  label?: string;
  value?: string;
  identifier?: string;
  text?: string;
  enabled: boolean;
  visible: boolean;
  frame: Rect;
  center: Point;
  childCount: number;
}

export type SourceFormat = "json" | "xml";

export type Orientation =
  | "PORTRAIT"
  | "LANDSCAPE"
  | "UIA_DEVICE_ORIENTATION_LANDSCAPERIGHT"
  | "UIA_DEVICE_ORIENTATION_PORTRAIT_UPSIDEDOWN";

export type Appearance = "light" | "dark";

export type HardwareButton = "home" | "volumeUp" | "volumeDown";

export interface WindowSize {
  width: number;
  height: number;
}

export interface Location {
  latitude: number;
  longitude: number;
}

export interface InstalledApp {
  bundleId: string;
  name: string;
  type: string;
}

/** XCUIApplicationState values reported by the agent. */
export enum AppState {
  Unknown = 0,
  NotRunning = 1,
  RunningBackgroundSuspended = 2,
  RunningBackground = 3,
  RunningForeground = 4,
}
