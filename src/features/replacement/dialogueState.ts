import type { Draft } from "immer";

import type { Card } from "../../directory/accountDirectory";
import {
  REPLACEMENT_SLOTS,
  type Awaiting,
  type ReplacementSlotId,
  type SessionOutcome,
} from "./schema";

export type MessageRole = "user" | "assistant";

export interface TranscriptMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
}

export interface CardOption {
  id: string;
  last4: string;
  product: string;
}

export interface DialogueState {
  userId: string;
  startedAt: string | null;
  completedAt: string | null;
  latestUtterance: string | null;
  transcript: TranscriptMessage[];
  prompt: string;
  notice: string | null;
  cardOptions: CardOption[];
  reason: string | null;
  selectedCard: string | null;
  address: string | null;
  addressConfirmed: boolean;
  finalConfirmed: boolean;
  awaiting: Awaiting;
  /** Step a successful retry returns to after a failed directory write. */
  resumeAwaiting: Awaiting | null;
  outcome: SessionOutcome;
  confirmation: string | null;
}

export function createInitialDialogueState(userId: string): DialogueState {
  return {
    userId,
    startedAt: null,
    completedAt: null,
    latestUtterance: null,
    transcript: [],
    prompt: "",
    notice: null,
    cardOptions: [],
    reason: null,
    selectedCard: null,
    address: null,
    addressConfirmed: false,
    finalConfirmed: false,
    awaiting: "none",
    resumeAwaiting: null,
    outcome: "active",
    confirmation: null,
  };
}

export function isTerminal(state: DialogueState): boolean {
  return state.outcome !== "active";
}

export function toCardOption(card: Card): CardOption {
  return { id: card.id, last4: card.last4, product: card.product };
}

export function findCardOption(
  state: DialogueState,
  cardId: string | null,
): CardOption | null {
  if (!cardId) {
    return null;
  }
  return state.cardOptions.find((option) => option.id === cardId) ?? null;
}

/**
 * Appends to the transcript. An assistant message that repeats the previous
 * assistant message is dropped so re-emitted prompts are recorded once.
 */
export function appendMessage(
  draft: Draft<DialogueState>,
  role: MessageRole,
  content: string,
) {
  if (role === "assistant") {
    const last = draft.transcript[draft.transcript.length - 1];
    if (last && last.role === "assistant" && last.content === content) {
      return;
    }
  }
  draft.transcript.push({ role, content, timestamp: new Date().toISOString() });
}

export function isSlotResolved(state: DialogueState, slotId: ReplacementSlotId): boolean {
  switch (slotId) {
    case "reason":
      return state.reason !== null;
    case "selectedCard":
      return state.selectedCard !== null;
    case "address":
      return state.address !== null;
    case "addressConfirmed":
      return state.addressConfirmed;
    case "finalConfirmed":
      return state.finalConfirmed;
    default: {
      const unhandled: never = slotId;
      return unhandled;
    }
  }
}

/**
 * Returns the first slot that is resolved while an earlier slot is not, or
 * null when the slots were filled in order.
 */
export function findOrderingViolation(state: DialogueState): ReplacementSlotId | null {
  let gapSeen = false;
  for (const slot of REPLACEMENT_SLOTS) {
    const resolved = isSlotResolved(state, slot.id);
    if (!resolved) {
      gapSeen = true;
    } else if (gapSeen) {
      return slot.id;
    }
  }
  return null;
}

export interface SlotSummary {
  id: ReplacementSlotId;
  label: string;
  resolved: boolean;
}

export function summarizeSlots(state: DialogueState): SlotSummary[] {
  return REPLACEMENT_SLOTS.map((slot) => ({
    id: slot.id,
    label: slot.label,
    resolved: isSlotResolved(state, slot.id),
  }));
}
