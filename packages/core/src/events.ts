/**
 * Events dispatched by EditorSession.
 *
 * Every event is a SessionEvent whose `payload` is tagged with the event
 * type, so listeners registered through `onSessionEvent` receive the
 * payload already narrowed.
 */

import type { Command } from "./commands.js";
import type { DrawOp } from "./draw-op.js";
import type { Selection } from "./selection.js";
import type { ToolId } from "./tools/tool.js";

export type SessionEventPayload =
  | { type: "command"; command: Command; description: string }
  | {
      type: "history-change";
      canUndo: boolean;
      canRedo: boolean;
      undoDescription: string | undefined;
      redoDescription: string | undefined;
    }
  | { type: "selection-change"; selection: Selection | null }
  | { type: "tool-change"; tool: ToolId }
  | { type: "preview-change"; ops: readonly DrawOp[] };

export type SessionEventType = SessionEventPayload["type"];
export type SessionEventOf<K extends SessionEventType> = Extract<SessionEventPayload, { type: K }>;

export class SessionEvent extends Event {
  constructor(readonly payload: SessionEventPayload) {
    super(payload.type);
  }
}

function isPayloadOf<K extends SessionEventType>(
  payload: SessionEventPayload,
  type: K,
): payload is SessionEventOf<K> {
  return payload.type === type;
}

/**
 * Subscribe to one session event type on any EventTarget that dispatches
 * SessionEvents. Returns an unsubscribe function.
 */
export function onSessionEvent<K extends SessionEventType>(
  target: EventTarget,
  type: K,
  listener: (payload: SessionEventOf<K>) => void,
): () => void {
  const handler = (event: Event): void => {
    if (event instanceof SessionEvent && isPayloadOf(event.payload, type)) {
      listener(event.payload);
    }
  };
  target.addEventListener(type, handler);
  return () => target.removeEventListener(type, handler);
}
