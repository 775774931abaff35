/**
 * get_current_time: local or zoned date and time via Intl.
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";

const LOCAL = "local";

/**
 * Format a moment for speech, e.g. "Monday, March 3, 2025 at 02:05 PM".
 *
 * @param timeZone - IANA zone; undefined uses the machine's zone
 * @throws ToolError invalid_arguments for an unknown zone
 */
export function formatSpokenTime(date: Date, timeZone: string | undefined): string {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      weekday: "long",
      year: "numeric",
      month: "long",
      day: "numeric",
      hour: "2-digit",
      minute: "2-digit",
      hour12: true,
    });
  } catch (err) {
    throw new ToolError("invalid_arguments", `unknown timezone "${timeZone}"`, { cause: err });
  }

  const parts = new Map(formatter.formatToParts(date).map((p) => [p.type, p.value]));
  return (
    `${parts.get("weekday")}, ${parts.get("month")} ${parts.get("day")}, ${parts.get("year")} ` +
    `at ${parts.get("hour")}:${parts.get("minute")} ${parts.get("dayPeriod")}`
  );
}

export function createTimeTool(now: () => Date = () => new Date()): ToolDescriptor {
  return {
    name: "get_current_time",
    description: "Get the current date and time, optionally in a given timezone. Use when the user asks what time or day it is.",
    parameters: {
      timezone: { type: "string", description: "IANA timezone such as America/New_York; omit for local time", required: false },
    },
    extraction: {
      kind: "single_value",
      parameter: "timezone",
      prompt:
        "If this message asks for the time in a specific place, give that place's IANA timezone name " +
        "(for example Europe/London). If it asks for local time, reply NONE.",
    },
    handler: async (args) => {
      const requested = typeof args.timezone === "string" ? args.timezone : undefined;
      const zone = requested === undefined || requested.toLowerCase() === LOCAL ? undefined : requested;
      const spoken = formatSpokenTime(now(), zone);
      return zone === undefined ? `Current local time: ${spoken}` : `Current time in ${zone}: ${spoken}`;
    },
  };
}
