/**
 * web_search: DuckDuckGo instant answer API.
 *
 * Responsibilities:
 * - Query the instant answer endpoint (no key required)
 * - Collect the direct answer, abstract, definition and related topics
 * - Format up to MAX_RESULTS numbered entries with their source URLs
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { getJson, pick } from "./http.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const SEARCH_URL = "https://api.duckduckgo.com/";

const MAX_RESULTS = 5;

// ============================================================================
// INTERFACES
// ============================================================================

interface SearchEntry {
  text: string;
  url: string;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createWebSearchTool(fetchImpl: typeof fetch = fetch): ToolDescriptor {
  return {
    name: "web_search",
    description: "Search the web for current facts, news, people or things the assistant may not know.",
    parameters: {
      query: { type: "string", description: "The search query", required: true },
    },
    extraction: {
      kind: "single_value",
      parameter: "query",
      prompt: "Write the short web search query that would answer this message.",
    },
    handler: async (args, signal) => {
      const query = String(args.query);
      const params = new URLSearchParams({ q: query, format: "json", no_html: "1", skip_disambig: "1" });
      const { status, body } = await getJson(`${SEARCH_URL}?${params.toString()}`, signal, fetchImpl);
      if (status < 200 || status >= 300) {
        throw new ToolError("failed", `search service answered ${status}`);
      }

      const entries = collectEntries(body);
      if (entries.length === 0) {
        throw new ToolError("not_found", `no results found for "${query}"`);
      }
      return formatResults(query, entries);
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Flatten an instant answer payload into result entries, best first.
 */
export function collectEntries(body: unknown): SearchEntry[] {
  const entries: SearchEntry[] = [];
  const push = (text: unknown, url: unknown) => {
    if (typeof text === "string" && text.trim() !== "" && entries.length < MAX_RESULTS) {
      entries.push({ text: text.trim(), url: typeof url === "string" ? url : "" });
    }
  };

  push(pick(body, "Answer"), "");
  push(pick(body, "AbstractText"), pick(body, "AbstractURL"));
  push(pick(body, "Definition"), pick(body, "DefinitionURL"));

  const related = pick(body, "RelatedTopics");
  if (Array.isArray(related)) {
    for (const topic of related) {
      // Grouped topics nest their entries one level down
      const nested = pick(topic, "Topics");
      if (Array.isArray(nested)) {
        for (const inner of nested) push(pick(inner, "Text"), pick(inner, "FirstURL"));
      } else {
        push(pick(topic, "Text"), pick(topic, "FirstURL"));
      }
    }
  }
  return entries;
}

function formatResults(query: string, entries: SearchEntry[]): string {
  const lines = [`Search results for '${query}':`, ""];
  entries.forEach((entry, i) => {
    lines.push(`${i + 1}. ${entry.text}`);
    if (entry.url) lines.push(`   Source: ${entry.url}`);
  });
  return lines.join("\n");
}
