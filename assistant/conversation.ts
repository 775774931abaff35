/**
 * Conversation history for the active profile.
 *
 * Responsibilities:
 * - Hold the ordered user / assistant / tool-data messages
 * - Commit a whole turn at once, after the reply exists, so an interrupted
 *   turn leaves history untouched
 * - Trim to the configured window
 * - Convert history into alternating model messages, rendering tool data as
 *   a user-side data block the responder can read
 */

import type {
  HistoryMessage,
  ModelMessage,
  ToolDataMessage,
  TranscriptMessage,
  UserMessage,
} from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Marks tool output inside model messages */
export const DATA_PREFIX = "[DATA]";

/** Appended after tool data that follows the question */
export const FOLLOW_UP_INSTRUCTION = "Using the data above, answer my previous question naturally and concisely.";

// ============================================================================
// INTERFACES
// ============================================================================

export interface CompletedTurn {
  question: UserMessage;
  toolData: ToolDataMessage | null;
  reply: string;
}

// ============================================================================
// CONVERSATION HISTORY
// ============================================================================

export class ConversationHistory {
  private items: HistoryMessage[] = [];
  private lastTurnHadTool = false;

  constructor(
    private readonly maxMessages: number,
    initial: readonly HistoryMessage[] = [],
    private readonly now: () => number = Date.now,
  ) {
    this.replace(initial);
  }

  get messages(): readonly HistoryMessage[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  /** Context hint for the classifier: did the previous turn produce tool data? */
  lastTurnUsedTool(): boolean {
    return this.lastTurnHadTool;
  }

  /**
   * Append one finished turn in placement order, then trim.
   *
   * @param turn - Question, optional tool data and the reply text
   */
  commitTurn(turn: CompletedTurn): void {
    const reply: HistoryMessage = { role: "assistant", content: turn.reply, timestamp: this.now() };
    this.items.push(...orderTurn(turn.question, turn.toolData), reply);
    this.lastTurnHadTool = turn.toolData !== null;
    this.trim();
  }

  /** Swap in another profile's messages */
  replace(messages: readonly HistoryMessage[]): void {
    this.items = [...messages];
    this.lastTurnHadTool = false;
    this.trim();
  }

  /** Messages a person sees; tool data is left out */
  transcript(): TranscriptMessage[] {
    const shown: TranscriptMessage[] = [];
    for (const message of this.items) {
      if (message.role !== "tool_data") shown.push(message);
    }
    return shown;
  }

  private trim(): void {
    if (this.items.length > this.maxMessages) {
      this.items.splice(0, this.items.length - this.maxMessages);
    }
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Order the question and its tool data. Screen descriptions sit ahead of the
 * question; everything else follows it.
 *
 * @returns The turn's messages, without the reply
 */
export function orderTurn(question: UserMessage, toolData: ToolDataMessage | null): HistoryMessage[] {
  if (toolData === null) return [question];
  return toolData.placement === "before_question" ? [toolData, question] : [question, toolData];
}

/**
 * Convert history into model messages.
 *
 * Consecutive messages on the same side are merged so roles alternate, and
 * leading assistant messages left over from trimming are dropped.
 *
 * @param messages - History, oldest first
 * @returns Messages starting with a user message
 */
export function toModelMessages(messages: readonly HistoryMessage[]): ModelMessage[] {
  const out: ModelMessage[] = [];

  for (const message of messages) {
    let next: ModelMessage;
    switch (message.role) {
      case "user":
        next = { role: "user", content: message.content };
        break;
      case "assistant":
        next = { role: "assistant", content: message.content };
        break;
      case "tool_data":
        next = { role: "user", content: renderToolData(message) };
        break;
      default: {
        const unreachable: never = message;
        throw new Error(`unknown message ${JSON.stringify(unreachable)}`);
      }
    }

    const last = out[out.length - 1];
    if (last !== undefined && last.role === next.role) {
      last.content = `${last.content}\n\n${next.content}`;
    } else if (out.length > 0 || next.role === "user") {
      out.push(next);
    }
  }

  return out;
}

/**
 * Render tool output as the text the responder reads.
 *
 * @param message - The tool-data message
 * @returns "[DATA] ..." followed by the follow-up instruction when the data trails the question
 */
export function renderToolData(message: ToolDataMessage): string {
  const body = message.ok ? message.content : `The ${message.toolName} tool failed: ${message.content}`;
  if (message.placement === "before_question") {
    return `${DATA_PREFIX} ${body}`;
  }
  return `${DATA_PREFIX} ${body}\n\n${FOLLOW_UP_INSTRUCTION}`;
}
