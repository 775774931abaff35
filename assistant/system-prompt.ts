/**
 * System prompt assembly.
 *
 * Base prompt with the assistant's name, then additive sections: the user's
 * name, the response length override, custom instructions, and remembered facts.
 */

import type { ProfileSettings } from "../services/profile-store.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const BASE_PROMPT = `You are {name}, a friendly, concise voice assistant.

Your replies are often read aloud, so:
- Keep them short. Use contractions and plain spoken language.
- Never use markdown, bullet points, emojis or special characters.
- Write numbers and units so they read naturally out loud.
- When a message carries [DATA], answer from it directly as if you simply know it. Never say "according to the search results".
- Use the conversation for context without repeating yourself.`;

const RESPONSE_LENGTH_ADDITIONS: Record<ProfileSettings["responseLength"], string> = {
  concise: "Response length: one or two sentences for most replies. Get straight to the point.",
  detailed: "Response length: when it helps, give three to five sentences with relevant context or examples.",
};

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Build the system prompt for the active profile.
 *
 * @param settings - Active profile settings
 * @param facts - Remembered facts; ignored when memory is disabled
 * @returns The full prompt
 */
export function buildSystemPrompt(settings: ProfileSettings, facts: readonly string[]): string {
  const sections = [BASE_PROMPT.replace("{name}", settings.assistantName)];

  if (settings.userName !== "") {
    sections.push(
      `The user's name is ${settings.userName}. Always use ${settings.userName}, whatever other name appears in the conversation.`,
    );
  }

  sections.push(RESPONSE_LENGTH_ADDITIONS[settings.responseLength]);

  const custom = settings.customInstructions.trim();
  if (custom !== "") {
    sections.push(`Additional instructions:\n${custom}`);
  }

  if (settings.memoryEnabled && facts.length > 0) {
    sections.push(`What you know about this user:\n${facts.map((f) => `- ${f}`).join("\n")}`);
  }

  return sections.join("\n\n");
}
