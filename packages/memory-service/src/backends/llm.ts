/**
 * LLM collaborator backends.
 *
 * The memory pipeline only ever sees an `LLMCaller`: system + user prompt in,
 * text out. Providers are called over their SDKs with SDK-level retries
 * disabled, since retrying is the caller's decision.
 */

import Anthropic from "@anthropic-ai/sdk"
import { ServiceError } from "@caremem/shared/memory"
import OpenAI from "openai"

import type { LlmConfig } from "../config.js"

export interface LLMCallOptions {
  signal?: AbortSignal
}

/**
 * System + user prompt in, text out.
 * Injected for testability (fixed-response fakes in tests, real provider in prod).
 */
export type LLMCaller = (
  systemPrompt: string,
  userPrompt: string,
  options?: LLMCallOptions,
) => Promise<string>

/** Build the caller for the configured provider. */
export function createLlmCaller(config: LlmConfig): LLMCaller {
  return config.provider === "anthropic" ? createAnthropicCaller(config) : createOpenAICaller(config)
}

// ──────────────────────────────────────────────────
// OpenAI-compatible (OpenAI, DeepSeek, Ollama, …)
// ──────────────────────────────────────────────────

export function createOpenAICaller(config: LlmConfig): LLMCaller {
  const client = new OpenAI({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: 0,
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
  })

  return async (systemPrompt, userPrompt, options = {}) => {
    const completion = await client.chat.completions.create(
      {
        model: config.model,
        temperature: 0,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
      },
      { signal: options.signal },
    )

    const content = completion.choices[0]?.message?.content
    if (!content) {
      throw new ServiceError(`Model ${config.model} returned no content`)
    }
    return content
  }
}

// ──────────────────────────────────────────────────
// Anthropic
// ──────────────────────────────────────────────────

export function createAnthropicCaller(config: LlmConfig): LLMCaller {
  const client = new Anthropic({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: 0,
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
  })

  return async (systemPrompt, userPrompt, options = {}) => {
    const message = await client.messages.create(
      {
        model: config.model,
        max_tokens: 1024,
        temperature: 0,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
      },
      { signal: options.signal },
    )

    const text = message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
    if (!text) {
      throw new ServiceError(`Model ${config.model} returned no text`)
    }
    return text
  }
}
