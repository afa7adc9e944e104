import type { ExtractedRecord, TableFragment } from "../types";
import { AUDITOR_SYSTEM_PROMPT, buildAuditFeedback, buildExtractionPrompt } from "./prompts";

export type TurnRole = "system" | "user" | "assistant";

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
}

/**
 * Ordered turns sent to the model on every attempt. Values are never
 * mutated; each rejected attempt yields a new, two-turns-longer history.
 */
export type ConversationHistory = readonly ConversationTurn[];

export interface SeededConversation {
  history: ConversationHistory;
  truncated: boolean;
}

export function seedConversation(fragment: TableFragment, fragmentCharLimit: number): SeededConversation {
  // Counted in code points so a cut never splits a surrogate pair.
  const codePoints = Array.from(fragment.html);
  const truncated = codePoints.length > fragmentCharLimit;
  const tableHtml = truncated ? codePoints.slice(0, fragmentCharLimit).join("") : fragment.html;

  return {
    history: [
      { role: "system", content: AUDITOR_SYSTEM_PROMPT },
      { role: "user", content: buildExtractionPrompt(fragment.documentName, tableHtml) },
    ],
    truncated,
  };
}

export function appendAuditFailure(
  history: ConversationHistory,
  rejected: ExtractedRecord,
  reason: string,
): ConversationHistory {
  return [
    ...history,
    { role: "assistant", content: JSON.stringify(rejected) },
    { role: "user", content: buildAuditFeedback(reason) },
  ];
}
