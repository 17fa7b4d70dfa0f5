import type { Point } from "../types.js";

export type PointerAction =
  | { type: "pointerMove"; x: number; y: number; duration?: number }
  | { type: "pointerDown"; button: 0 }
  | { type: "pointerUp"; button: 0 }
  | { type: "pause"; duration: number };

export interface PointerSequence {
  type: "pointer";
  id: string;
  parameters: { pointerType: "touch" };
  actions: PointerAction[];
}

export interface ActionsPayload {
  actions: PointerSequence[];
}

export const TAP_PRESS_MS = 50;
export const DOUBLE_TAP_GAP_MS = 100;
export const SWIPE_SETTLE_MS = 100;

const FINGER_ID = "finger1";

function sequence(actions: PointerAction[]): ActionsPayload {
  return {
    actions: [
      {
        type: "pointer",
        id: FINGER_ID,
        parameters: { pointerType: "touch" },
        actions,
      },
    ],
  };
}

function moveTo(point: Point, duration?: number): PointerAction {
  const move: PointerAction = {
    type: "pointerMove",
    x: Math.round(point.x),
    y: Math.round(point.y),
  };
  return duration === undefined ? move : { ...move, duration };
}

function press(holdMs: number): PointerAction[] {
  return [
    { type: "pointerDown", button: 0 },
    { type: "pause", duration: holdMs },
    { type: "pointerUp", button: 0 },
  ];
}

export function encodeTap(point: Point): ActionsPayload {
  return sequence([moveTo(point), ...press(TAP_PRESS_MS)]);
}

export function encodeDoubleTap(point: Point): ActionsPayload {
  return sequence([
    moveTo(point),
    ...press(TAP_PRESS_MS),
    { type: "pause", duration: DOUBLE_TAP_GAP_MS },
    ...press(TAP_PRESS_MS),
  ]);
}

export function encodeLongPress(point: Point, durationMs: number): ActionsPayload {
  return sequence([moveTo(point), ...press(Math.max(0, Math.round(durationMs)))]);
}

export function encodeSwipe(from: Point, to: Point, durationMs: number): ActionsPayload {
  return sequence([
    moveTo(from),
    { type: "pointerDown", button: 0 },
    { type: "pause", duration: SWIPE_SETTLE_MS },
    moveTo(to, Math.max(0, Math.round(durationMs))),
    { type: "pointerUp", button: 0 },
  ]);
}

/**
 * Recovers the tap location from a payload produced by {@link encodeTap}:
 * a single touch pointer that moves, presses, optionally pauses and lifts.
 */
export function decodeTap(payload: ActionsPayload): Point | undefined {
  if (payload.actions.length !== 1) return undefined;
  const [pointer] = payload.actions;
  if (pointer.parameters.pointerType !== "touch") return undefined;

  const [move, down, ...rest] = pointer.actions;
  const up = rest.pop();
  if (move?.type !== "pointerMove" || down?.type !== "pointerDown" || up?.type !== "pointerUp") {
    return undefined;
  }
  if (rest.some((action) => action.type !== "pause")) return undefined;

  return { x: move.x, y: move.y };
}
