import { produce, type Draft } from "immer";

import type { AccountDirectory } from "../../directory/accountDirectory";
import { engineLogger } from "../../utils/logger";
import { appendMessage, toCardOption, type DialogueState } from "./dialogueState";
import { PROMPTS, composePrompt, promptFor } from "./prompts";
import type { Awaiting, TerminalOutcome } from "./schema";

export type Decision =
  | { state: DialogueState; prompt: string; done: false }
  | { state: DialogueState; prompt: string; done: true; outcome: TerminalOutcome };

type Patch = (draft: Draft<DialogueState>) => void;

function recordPrompt(state: DialogueState): DialogueState {
  return produce(state, (draft) => {
    appendMessage(draft, "assistant", draft.prompt);
  });
}

function ask(state: DialogueState, awaiting: Awaiting, patch?: Patch): Decision {
  const next = recordPrompt(
    produce(state, (draft) => {
      patch?.(draft);
      draft.awaiting = awaiting;
      draft.prompt = composePrompt(draft.notice, promptFor(awaiting, draft));
    }),
  );
  return { state: next, prompt: next.prompt, done: false };
}

function finish(state: DialogueState, outcome: TerminalOutcome): Decision {
  const next = recordPrompt(state);
  return { state: next, prompt: next.prompt, done: true, outcome };
}

function terminate(
  state: DialogueState,
  outcome: TerminalOutcome,
  prompt: string,
  patch?: Patch,
): Decision {
  const next = produce(state, (draft) => {
    patch?.(draft);
    draft.outcome = outcome;
    draft.prompt = prompt;
    draft.notice = null;
    draft.awaiting = "none";
    draft.completedAt = draft.completedAt ?? new Date().toISOString();
  });
  engineLogger.info("Session reached a terminal outcome", { userId: state.userId, outcome });
  return finish(next, outcome);
}

/**
 * Decides what to ask or do next. Slots are requested strictly in order and
 * an unresolved `awaiting` value is re-asked without moving forward. Directory
 * failures are returned as a retry-or-abort prompt.
 */
export async function decide(
  state: DialogueState,
  directory: AccountDirectory,
): Promise<Decision> {
  if (state.outcome !== "active") {
    return finish(state, state.outcome);
  }

  if (state.awaiting !== "none") {
    return ask(state, state.awaiting);
  }

  let working = state;
  try {
    if (working.startedAt === null) {
      const cards = await directory.listCards(working.userId);
      if (cards.length === 0) {
        return terminate(working, "no_cards", PROMPTS.noCards);
      }
      engineLogger.info("Replacement session started", {
        userId: working.userId,
        cardCount: cards.length,
      });
      return ask(working, "reasonInput", (draft) => {
        draft.startedAt = new Date().toISOString();
        draft.cardOptions = cards.map(toCardOption);
      });
    }

    if (working.reason === null) {
      return ask(working, "reasonInput");
    }

    let cardId = working.selectedCard;
    if (cardId === null) {
      const cards = await directory.listCards(working.userId);
      if (cards.length === 0) {
        return terminate(working, "no_cards", PROMPTS.noCards);
      }
      const options = cards.map(toCardOption);
      if (cards.length > 1) {
        return ask(working, "cardSelection", (draft) => {
          draft.cardOptions = options;
        });
      }
      const [only] = cards;
      cardId = only.id;
      engineLogger.debug("Auto-selected the only card on file", {
        userId: working.userId,
        cardId,
      });
      working = produce(working, (draft) => {
        draft.cardOptions = options;
        draft.selectedCard = only.id;
      });
    }

    if (working.address === null) {
      const address = await directory.fetchAddress(cardId, working.userId);
      if (address === null) {
        engineLogger.info("No address on file, asking for manual entry", {
          userId: working.userId,
          cardId,
        });
        return ask(working, "newAddress");
      }
      return ask(working, "addressConfirmation", (draft) => {
        draft.address = address;
      });
    }

    if (!working.addressConfirmed) {
      return ask(working, "addressConfirmation");
    }

    if (!working.finalConfirmed) {
      return ask(working, "finalConfirmation");
    }

    const confirmation = await directory.executeReplacement(
      cardId,
      working.address,
      working.userId,
    );
    return terminate(working, "completed", confirmation, (draft) => {
      draft.confirmation = confirmation;
    });
  } catch (error) {
    engineLogger.logError("Account directory call failed", error, {
      userId: working.userId,
      selectedCard: working.selectedCard,
    });
    return ask(working, "directoryRetry");
  }
}
