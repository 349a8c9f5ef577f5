import { findCardOption, type CardOption, type DialogueState } from "./dialogueState";
import type { Awaiting } from "./schema";

export const PROMPTS = {
  reason: "Why do you need a replacement card? For example: lost, stolen or damaged.",
  noCards:
    "We couldn't find any cards on file for your account, so there is nothing to replace.",
  manualAddress:
    "We don't have a delivery address on file for that card. Please enter the full delivery address.",
  newAddress: "Please enter the full delivery address for the new card.",
  cancelled: "Card replacement cancelled. No changes were made to your account.",
  directoryRetry:
    'We couldn\'t reach the card service just now. Type "retry" to try again or "abort" to end this session.',
  aborted: "Session ended. No changes were made to your account.",
} as const;

export const NOTICES = {
  emptyReason: "A reason is required.",
  emptyAddress: "A delivery address is required.",
  yesOrNo: 'Please answer "yes" or "no".',
  confirmOrCancel: 'Please reply "confirm" or "cancel".',
  retryOrAbort: 'Please reply "retry" or "abort".',
  addressNotSaved: "We couldn't save that address.",
  invalidCard: (input: string) =>
    input ? `"${input}" is not a valid card.` : "That is not a valid card.",
} as const;

export function formatCardOption(option: CardOption): string {
  return `${option.last4} (${option.product})`;
}

function describeSelectedCard(state: DialogueState): string {
  const option = findCardOption(state, state.selectedCard);
  if (option) {
    return `your ${option.product} ending ${option.last4}`;
  }
  return `card ${state.selectedCard ?? ""}`.trim();
}

export function composePrompt(notice: string | null, prompt: string): string {
  return notice ? `${notice} ${prompt}` : prompt;
}

/**
 * Question text for an awaiting value. Reads only the slots already resolved,
 * so the same state always yields the same text.
 */
export function promptFor(awaiting: Awaiting, state: DialogueState): string {
  switch (awaiting) {
    case "none":
      return state.prompt;
    case "reasonInput":
      return PROMPTS.reason;
    case "cardSelection": {
      const choices = state.cardOptions.map(formatCardOption).join(", ");
      return `Which card would you like to replace? Reply with the last 4 digits: ${choices}.`;
    }
    case "addressConfirmation":
      return `We'll send the new card to ${state.address ?? "the address on file"}. Is that address correct? (yes/no)`;
    case "newAddress":
      return state.address === null ? PROMPTS.manualAddress : PROMPTS.newAddress;
    case "finalConfirmation":
      return (
        `Please review: replace ${describeSelectedCard(state)} ` +
        `and deliver the new card to ${state.address ?? "the address on file"}. ` +
        'Type "confirm" to proceed or "cancel" to stop.'
      );
    case "directoryRetry":
      return PROMPTS.directoryRetry;
    default: {
      const unhandled: never = awaiting;
      return unhandled;
    }
  }
}
