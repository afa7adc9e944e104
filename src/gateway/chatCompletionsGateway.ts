import { fetch } from "undici";
import type { Dispatcher } from "undici";
import type { ConversationHistory } from "../session/conversation";
import { describeError } from "../observability";
import { isJsonObject } from "../types";
import { getGatewayDispatcher } from "./dispatcher";
import { GatewayError } from "./types";
import type { GatewayResult, ModelGateway } from "./types";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
    dispatcher?: Dispatcher;
  },
) => Promise<HttpResponseLike>;

export interface ChatCompletionsGatewayOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs?: number;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
}

export interface ChatCompletionsRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  response_format: { type: "json_object" };
  temperature: number;
}

const MAX_ERROR_BODY_CHARS = 500;

/** Any OpenAI-compatible `/chat/completions` endpoint, asked for a JSON object at temperature 0. */
export class ChatCompletionsGateway implements ModelGateway {
  private readonly endpoint: string;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly fetchFn: FetchLike;

  constructor(options: ChatCompletionsGatewayOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.dispatcher = getGatewayDispatcher(options.ignoreHttpsErrors ?? false);
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  buildRequest(history: ConversationHistory): ChatCompletionsRequest {
    return {
      model: this.model,
      messages: history.map((turn) => ({ role: turn.role, content: turn.content })),
      response_format: { type: "json_object" },
      temperature: 0,
    };
  }

  async complete(history: ConversationHistory): Promise<GatewayResult> {
    if (!this.apiKey) {
      return { ok: false, error: new GatewayError("transport", "No API key configured for the model gateway") };
    }

    let body: string;
    try {
      body = await this.post(JSON.stringify(this.buildRequest(history)));
    } catch (error) {
      if (error instanceof GatewayError) {
        return { ok: false, error };
      }
      return { ok: false, error: new GatewayError("transport", describeError(error)) };
    }

    return parseCompletion(body);
  }

  private async post(body: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      const text = await response.text();
      if (!response.ok) {
        throw new GatewayError("http_status", `Model gateway returned ${response.status}: ${text.slice(0, MAX_ERROR_BODY_CHARS)}`);
      }
      return text;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new GatewayError("timeout", `Model gateway call exceeded ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function parseCompletion(body: string): GatewayResult {
  const envelope = parseJson(body);
  if (!isJsonObject(envelope) || !Array.isArray(envelope.choices) || envelope.choices.length === 0) {
    return { ok: false, error: new GatewayError("unparseable", "Completion response has no choices") };
  }

  const choice = envelope.choices[0];
  const message = isJsonObject(choice) ? choice.message : undefined;
  const content = isJsonObject(message) ? message.content : undefined;
  if (typeof content !== "string") {
    return { ok: false, error: new GatewayError("unparseable", "Completion choice has no text content") };
  }

  const payload = parseJson(content);
  if (!isJsonObject(payload)) {
    return { ok: false, error: new GatewayError("unparseable", "Model reply is not a JSON object") };
  }
  return { ok: true, payload };
}
