/**
 * Language model adapter over the Anthropic Messages API.
 *
 * Responsibilities:
 * - Route "fast" (classification, extraction, memory) and "main" (replies)
 *   calls to their configured models
 * - Stream text deltas for chat-mode replies
 * - Describe screenshots with the vision model
 * - Map SDK failures onto ModelTimeoutError / ModelUnavailableError, and
 *   aborts onto InterruptedError
 */

import Anthropic from "@anthropic-ai/sdk";

import { InterruptedError, ModelTimeoutError, ModelUnavailableError, errorMessage } from "./errors.js";
import type { CallOptions, CompletionRequest, ImageMediaType, LanguageModel, ModelTier } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_MAX_TOKENS = 1024;

// ============================================================================
// INTERFACES
// ============================================================================

export interface LlmConfig {
  apiKey: string;
  fastModel: string;
  mainModel: string;
  visionModel: string;
  /** SDK-level request timeout; stages also apply their own */
  requestTimeoutMs: number;
}

/** The slice of the SDK's messages resource this adapter uses */
export interface MessagesPort {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number },
  ): Promise<{ content: ReadonlyArray<{ type: string }> }>;
  stream(body: Anthropic.MessageStreamParams, options?: { signal?: AbortSignal; timeout?: number }): AsyncIterable<{ type: string }>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create the model adapter.
 *
 * @param config - API key, model ids and timeout
 * @param messages - Messages resource; defaults to a real SDK client
 */
export function createAnthropicModel(config: LlmConfig, messages?: MessagesPort): LanguageModel {
  const api: MessagesPort = messages ?? new Anthropic({ apiKey: config.apiKey, maxRetries: 1 }).messages;
  const requestOptions = (signal: AbortSignal) => ({ signal, timeout: config.requestTimeoutMs });

  function modelFor(tier: ModelTier): string {
    return tier === "fast" ? config.fastModel : config.mainModel;
  }

  function params(request: CompletionRequest, tier: ModelTier): Anthropic.MessageCreateParamsNonStreaming {
    return {
      model: modelFor(tier),
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      ...(request.system ? { system: request.system } : {}),
      ...(tier === "fast" ? { temperature: 0 } : {}),
    };
  }

  async function complete(request: CompletionRequest, tier: ModelTier, options: CallOptions): Promise<string> {
    const started = Date.now();
    try {
      const response = await api.create(params(request, tier), requestOptions(options.signal));
      console.log(`[llm] ${tier} completion in ${Date.now() - started}ms`);
      return collectText(response.content);
    } catch (err) {
      throw mapError(err, options.signal);
    }
  }

  async function* stream(request: CompletionRequest, tier: ModelTier, options: CallOptions): AsyncIterable<string> {
    const started = Date.now();
    let first = true;
    try {
      for await (const event of api.stream(params(request, tier), requestOptions(options.signal))) {
        const delta = textDelta(event);
        if (delta === null) continue;
        if (first) {
          console.log(`[llm] first token at +${Date.now() - started}ms`);
          first = false;
        }
        yield delta;
      }
    } catch (err) {
      throw mapError(err, options.signal);
    }
  }

  async function describeImage(image: Buffer, mediaType: ImageMediaType, prompt: string, options: CallOptions): Promise<string> {
    try {
      const response = await api.create(
        {
          model: config.visionModel,
          max_tokens: DEFAULT_MAX_TOKENS,
          messages: [
            {
              role: "user",
              content: [
                { type: "image", source: { type: "base64", media_type: mediaType, data: image.toString("base64") } },
                { type: "text", text: prompt },
              ],
            },
          ],
        },
        requestOptions(options.signal),
      );
      return collectText(response.content);
    } catch (err) {
      throw mapError(err, options.signal);
    }
  }

  return { complete, stream, describeImage };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Join the text blocks of a response.
 */
export function collectText(content: ReadonlyArray<{ type: string }>): string {
  let text = "";
  for (const block of content) {
    if (block.type === "text" && "text" in block && typeof block.text === "string") {
      text += block.text;
    }
  }
  return text;
}

/**
 * Text carried by a stream event, or null for every other event.
 */
export function textDelta(event: { type: string }): string | null {
  if (event.type !== "content_block_delta" || !("delta" in event)) return null;
  const delta = event.delta;
  if (typeof delta === "object" && delta !== null && "text" in delta && typeof delta.text === "string") {
    return delta.text;
  }
  return null;
}

/**
 * Translate an SDK failure into the pipeline's error classes.
 *
 * @param err - What the SDK threw
 * @param signal - The call's abort signal
 */
export function mapError(err: unknown, signal: AbortSignal): Error {
  if (err instanceof InterruptedError || err instanceof ModelTimeoutError || err instanceof ModelUnavailableError) {
    return err;
  }
  if (signal.aborted || err instanceof Anthropic.APIUserAbortError) {
    return new InterruptedError("model call");
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelTimeoutError(`model request timed out: ${errorMessage(err)}`, { cause: err });
  }
  return new ModelUnavailableError(`model unavailable: ${errorMessage(err)}`, { cause: err });
}
