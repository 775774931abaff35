/**
 * Responder: produces the assistant's reply from the conversation.
 *
 * Responsibilities:
 * - Send the system prompt, the history window and the current turn to the
 *   main model tier; tool schemas and classifier output never reach it
 * - Stream tokens to a callback when one is given (chat mode)
 * - Retry once without the tool data when a tool turn yields an empty reply,
 *   then fall back to a fixed apology
 * - Wrap model failures in ResponseError
 */

import { InterruptedError, ModelTimeoutError, ResponseError, errorMessage } from "./errors.js";
import { runStage, type InterruptToken } from "./interrupt.js";
import { orderTurn, toModelMessages } from "./conversation.js";
import type { HistoryMessage, LanguageModel, ToolDataMessage, UserMessage } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const APOLOGY_REPLY = "Sorry, I didn't quite get that. Could you try again?";

const RESPONSE_MAX_TOKENS = 1024;

// ============================================================================
// INTERFACES
// ============================================================================

export interface ResponderConfig {
  model: LanguageModel;
  timeoutMs: number;
}

export interface ResponseRequest {
  system: string;
  /** Committed history window, oldest first */
  history: readonly HistoryMessage[];
  question: UserMessage;
  toolData: ToolDataMessage | null;
}

export interface ResponseResult {
  text: string;
  /** True when the text is the fixed apology */
  fallback: boolean;
  /** True when the reply was produced without the tool data */
  retried: boolean;
}

export interface Responder {
  /**
   * @param onToken - Receives streamed text; omit to get the reply in one piece
   * @throws ResponseError when the model fails
   * @throws InterruptedError when the turn is interrupted
   */
  respond(request: ResponseRequest, token: InterruptToken, onToken?: (text: string) => void): Promise<ResponseResult>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createResponder(config: ResponderConfig): Responder {
  const { model, timeoutMs } = config;

  async function generate(
    request: ResponseRequest,
    toolData: ToolDataMessage | null,
    token: InterruptToken,
    onToken: ((text: string) => void) | undefined,
  ): Promise<string> {
    const messages = toModelMessages([...request.history, ...orderTurn(request.question, toolData)]);
    const completion = { system: request.system, messages, maxTokens: RESPONSE_MAX_TOKENS };

    try {
      return await runStage(
        token,
        "response",
        timeoutMs,
        async (signal) => {
          if (!onToken) {
            return model.complete(completion, "main", { signal });
          }
          let text = "";
          for await (const piece of model.stream(completion, "main", { signal })) {
            if (signal.aborted) break;
            text += piece;
            onToken(piece);
          }
          return text;
        },
        () => new ModelTimeoutError(`response timed out after ${timeoutMs}ms`),
      );
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      throw new ResponseError(`response failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function respond(
    request: ResponseRequest,
    token: InterruptToken,
    onToken?: (text: string) => void,
  ): Promise<ResponseResult> {
    const first = (await generate(request, request.toolData, token, onToken)).trim();
    if (first !== "") return { text: first, fallback: false, retried: false };

    if (request.toolData !== null) {
      console.log(`[responder] empty reply with ${request.toolData.toolName} data, retrying without it`);
      const second = (await generate(request, null, token, onToken)).trim();
      if (second !== "") return { text: second, fallback: false, retried: true };
    }

    return { text: APOLOGY_REPLY, fallback: true, retried: request.toolData !== null };
  }

  return { respond };
}
