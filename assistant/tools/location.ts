/**
 * get_location: approximate location from the public IP (ipinfo.io).
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { getJson, pick } from "./http.js";

const IPINFO_URL = "https://ipinfo.io/json";

export function createLocationTool(fetchImpl: typeof fetch = fetch): ToolDescriptor {
  return {
    name: "get_location",
    description: "Get the user's approximate current location from their IP address. Only when they ask where they are.",
    parameters: {},
    handler: async (_args, signal) => {
      const { status, body } = await getJson(IPINFO_URL, signal, fetchImpl);
      if (status < 200 || status >= 300) {
        throw new ToolError("failed", `location service answered ${status}`);
      }

      const field = (name: string): string => {
        const value = pick(body, name);
        return typeof value === "string" && value !== "" ? value : "Unknown";
      };

      return [
        "Current location (approximate, based on IP):",
        `  City: ${field("city")}`,
        `  Region: ${field("region")}`,
        `  Country: ${field("country")}`,
        `  Coordinates: ${field("loc")}`,
      ].join("\n");
    },
  };
}
