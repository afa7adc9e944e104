import type { ConversationHistory } from "../session/conversation";
import type { ExtractedRecord } from "../types";

export type GatewayErrorKind = "transport" | "timeout" | "http_status" | "unparseable";

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;

  constructor(kind: GatewayErrorKind, message: string) {
    super(message);
    this.name = "GatewayError";
    this.kind = kind;
  }
}

export type GatewayResult = { ok: true; payload: ExtractedRecord } | { ok: false; error: GatewayError };

/** Maps a full conversation to the model's next structured reply. */
export interface ModelGateway {
  complete(history: ConversationHistory): Promise<GatewayResult>;
}
