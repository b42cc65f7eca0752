/**
 * The relay's view of the agent server's event stream.
 *
 * Events arrive typed from the opencode SDK. We narrow the kinds the relay
 * acts on into a small tagged union and keep anything else as `unknown` so
 * callers can log and skip it.
 */

import type { Event, Part, ReasoningPart, TextPart, ToolPart, ToolState } from "@opencode-ai/sdk";

export type { Part, ReasoningPart, TextPart, ToolPart, ToolState };

export type AgentEvent =
  | { type: "server.connected" }
  | { type: "message.part.updated"; part: Part }
  | { type: "session.idle"; sessionID: string }
  | { type: "unknown"; rawType: string };

export function toAgentEvent(event: Event): AgentEvent {
  switch (event.type) {
    case "server.connected":
      return { type: "server.connected" };
    case "message.part.updated":
      return { type: "message.part.updated", part: event.properties.part };
    case "session.idle":
      return { type: "session.idle", sessionID: event.properties.sessionID };
    default:
      return { type: "unknown", rawType: event.type };
  }
}

/**
 * A part is surfaced only once it is finished. For tool parts the nested
 * tool state is authoritative: it must be `completed` and carry an end time.
 * Text and reasoning are finished when their own time range has an end.
 */
export function isPartReady(part: Part): boolean {
  switch (part.type) {
    case "tool":
      return part.state.status === "completed" && part.state.time.end !== undefined;
    case "text":
    case "reasoning":
      return part.time?.end !== undefined;
    default:
      return false;
  }
}
