// src/ai/renderer.ts
import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { AppConfig } from "../config";

export type RenderPrompt = {
  message: string;
  menu: string[]; // dish names the guest can actually order
  preferences: string[];
};

/**
 * Free-form reply generator. One call per turn, no retry; callers treat a
 * rejection as "could not generate", never as fatal.
 */
export interface ReplyRenderer {
  readonly name: string;
  render(prompt: RenderPrompt): Promise<string>;
}

export function buildPromptText(p: RenderPrompt): string {
  const menu = p.menu.length ? p.menu.join(", ") : "(menu unavailable)";
  const prefs = p.preferences.length ? p.preferences.join(", ") : "none";

  return `
You are a hotel room-service assistant.
Reply in one or two short sentences. Only suggest dishes from the menu.
If the guest seems to want food, ask them to name a dish from the menu.

Menu: ${menu}
Guest dietary preferences: ${prefs}

Guest: "${p.message}"
Reply:
  `.trim();
}

function cleanReply(raw: string): string {
  return raw.replace(/^Reply:\s*/i, "").trim();
}

// ─────────────────────────────────────────────
// mock: echo, no network
// ─────────────────────────────────────────────
export class MockRenderer implements ReplyRenderer {
  readonly name = "mock";

  async render(p: RenderPrompt): Promise<string> {
    const hint = p.menu.length ? ` Try a dish name, e.g. '${p.menu[0]}'.` : "";
    return `(mock) You said: "${p.message}".${hint}`;
  }
}

// ─────────────────────────────────────────────
// openai: chat completions
// ─────────────────────────────────────────────
// The slice of the OpenAI client the renderer calls
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
};

export class OpenAIRenderer implements ReplyRenderer {
  readonly name = "openai";
  private readonly client: ChatCompletionsClient;
  private readonly model: string;

  constructor(
    opts: { apiKey: string; model: string },
    client?: ChatCompletionsClient
  ) {
    this.model = opts.model;
    this.client = client ?? new OpenAI({ apiKey: opts.apiKey });
  }

  async render(p: RenderPrompt): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: buildPromptText(p) }],
      temperature: 0.3,
      max_tokens: 160,
    });

    const raw = completion.choices[0]?.message?.content || "";
    const reply = cleanReply(raw);
    if (!reply) throw new Error("empty completion");
    return reply;
  }
}

// ─────────────────────────────────────────────
// gemini: Generative Language REST API
// ─────────────────────────────────────────────
const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
});

export class GeminiRenderer implements ReplyRenderer {
  readonly name = "gemini";
  private readonly http: AxiosInstance;

  constructor(
    private readonly opts: { apiKey: string; model: string },
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: "https://generativelanguage.googleapis.com/v1beta",
        timeout: 15_000,
      });
  }

  async render(p: RenderPrompt): Promise<string> {
    const { data } = await this.http.post(
      `/models/${encodeURIComponent(this.opts.model)}:generateContent`,
      { contents: [{ role: "user", parts: [{ text: buildPromptText(p) }] }] },
      { params: { key: this.opts.apiKey } }
    );

    const parsed = GeminiResponseSchema.parse(data);
    const text = (parsed.candidates[0]?.content?.parts || [])
      .map((part) => part.text || "")
      .join("");
    const reply = cleanReply(text);
    if (!reply) throw new Error("empty gemini response");
    return reply;
  }
}

/**
 * Strategy comes from configuration only. A backend that is selected but
 * has no key is logged and left off (rule-based replies still work).
 */
export function buildRenderer(ai: AppConfig["ai"]): ReplyRenderer | null {
  switch (ai.backend) {
    case "none":
      return null;
    case "mock":
      return new MockRenderer();
    case "openai":
      if (!ai.openaiKey) {
        console.error("[RENDER] AI_BACKEND=openai but OPENAI_API_KEY is missing; renderer off");
        return null;
      }
      return new OpenAIRenderer({ apiKey: ai.openaiKey, model: ai.openaiModel });
    case "gemini":
      if (!ai.geminiKey) {
        console.error("[RENDER] AI_BACKEND=gemini but GEMINI_API_KEY is missing; renderer off");
        return null;
      }
      return new GeminiRenderer({ apiKey: ai.geminiKey, model: ai.geminiModel });
  }
}
