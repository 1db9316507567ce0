//--------------------------------------------------------------
// FILE: src/model/Llm.ts
// OpenAI-compatible chat completions client (OpenRouter by default)
//--------------------------------------------------------------

import axios, { type AxiosInstance } from "axios";
import { SchemaValidationError, TransportError } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { GenerativeCapability, GenerativeRequest, GenerativeRole } from "./types.js";

export interface LlmOptions {
  apiKey: string;
  baseUrl: string;
  models: Record<GenerativeRole, string>;
  timeoutMs?: number;
  temperature?: number;
  /** Injected HTTP client; tests pass one with an in-process adapter. */
  http?: AxiosInstance;
}

type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

export class OpenAICompatibleLlm implements GenerativeCapability {
  private readonly http: AxiosInstance;
  private readonly models: Record<GenerativeRole, string>;
  private readonly temperature: number;

  constructor(options: LlmOptions) {
    this.models = options.models;
    this.temperature = options.temperature ?? 0.7;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 60_000,
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          "Content-Type": "application/json",
        },
      });
  }

  async generate<T>(request: GenerativeRequest<T>): Promise<T> {
    const model = this.models[request.role];
    const messages: ChatMessage[] = [
      { role: "system", content: `${request.rolePrompt}\n\n${request.schema.instructions}` },
      ...request.conversation.map((t) => ({ role: t.role, content: t.content })),
    ];

    logger.debug(`🤖 ${request.role} → ${model} (${request.schema.name}, ${messages.length} messages)`);

    const content = await this.complete(model, messages);
    return parseStructured(content, request.schema);
  }

  private async complete(model: string, messages: ChatMessage[]): Promise<string> {
    let data: ChatCompletionResponse;
    try {
      const response = await this.http.post<ChatCompletionResponse>("/chat/completions", {
        model,
        messages,
        temperature: this.temperature,
        response_format: { type: "json_object" },
      });
      data = response.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status;
        throw new TransportError(
          status ? `Model backend responded with HTTP ${status}` : `Model backend unreachable: ${err.message}`,
          status,
          { cause: err }
        );
      }
      throw new TransportError("Model request failed", undefined, { cause: err });
    }

    const content = data?.choices?.[0]?.message?.content;
    if (typeof content !== "string" || content.trim().length === 0) {
      throw new TransportError(`Model ${model} returned an empty completion`);
    }
    return content;
  }
}

//--------------------------------------------------------------
// Parsing: tolerate code fences, nothing else
//--------------------------------------------------------------

function stripFences(raw: string): string {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return (fenced ? fenced[1] : raw).trim();
}

export function parseStructured<T>(raw: string, schema: GenerativeRequest<T>["schema"]): T {
  let json: unknown;
  try {
    json = JSON.parse(stripFences(raw));
  } catch (err) {
    throw new SchemaValidationError(schema.name, ["response is not valid JSON"], { cause: err });
  }

  const result = schema.parser.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    throw new SchemaValidationError(schema.name, issues, { cause: result.error });
  }
  return result.data;
}
