import { produce, type Draft } from "immer";

import type { AccountDirectory } from "../../directory/accountDirectory";
import { reducerLogger } from "../../utils/logger";
import { appendMessage, isTerminal, type DialogueState } from "./dialogueState";
import { NOTICES, PROMPTS, composePrompt, promptFor } from "./prompts";
import type { Awaiting, TerminalOutcome } from "./schema";
import {
  ADDRESS_CONFIRMATION,
  FINAL_CONFIRMATION,
  RETRY_CONFIRMATION,
  interpretConfirmation,
  matchCardOption,
  nonEmpty,
  normalizeWhitespace,
} from "./validate";

type Patch = (draft: Draft<DialogueState>) => void;

function accept(state: DialogueState, patch: Patch): DialogueState {
  return produce(state, (draft) => {
    patch(draft);
    draft.awaiting = "none";
  });
}

function reject(state: DialogueState, notice: string): DialogueState {
  return produce(state, (draft) => {
    draft.notice = notice;
    draft.prompt = composePrompt(notice, promptFor(draft.awaiting, draft));
  });
}

function redirect(
  state: DialogueState,
  awaiting: Awaiting,
  notice: string | null = null,
  resumeAwaiting: Awaiting | null = null,
): DialogueState {
  return produce(state, (draft) => {
    draft.awaiting = awaiting;
    draft.resumeAwaiting = resumeAwaiting;
    draft.notice = notice;
    draft.prompt = composePrompt(notice, promptFor(awaiting, draft));
  });
}

function end(state: DialogueState, outcome: TerminalOutcome, prompt: string): DialogueState {
  return produce(state, (draft) => {
    draft.outcome = outcome;
    draft.prompt = prompt;
    draft.notice = null;
    draft.awaiting = "none";
    draft.resumeAwaiting = null;
    draft.completedAt = draft.completedAt ?? new Date().toISOString();
  });
}

async function applyNewAddress(
  state: DialogueState,
  text: string,
  directory: AccountDirectory,
): Promise<DialogueState> {
  const result = nonEmpty(text, NOTICES.emptyAddress);
  if (!result.valid) {
    return reject(state, result.message);
  }

  const cardId = state.selectedCard;
  if (cardId === null) {
    reducerLogger.warn("Delivery address received before a card was selected", {
      userId: state.userId,
    });
    return accept(state, () => undefined);
  }

  try {
    const saved = await directory.updateAddress(cardId, result.value, state.userId);
    if (!saved) {
      reducerLogger.warn("Directory did not accept the address update", {
        userId: state.userId,
        cardId,
      });
      return redirect(state, "directoryRetry", NOTICES.addressNotSaved, "newAddress");
    }
  } catch (error) {
    reducerLogger.logError("Address update failed", error, { userId: state.userId, cardId });
    return redirect(state, "directoryRetry", NOTICES.addressNotSaved, "newAddress");
  }

  const address = result.value;
  return accept(state, (draft) => {
    draft.address = address;
    draft.addressConfirmed = true;
  });
}

/**
 * Folds one user utterance into the state. The `awaiting` value alone decides
 * how the text is read; rejected input leaves every slot and `awaiting` as they
 * were and only refreshes the prompt.
 */
export async function reduce(
  state: DialogueState,
  rawText: string,
  directory: AccountDirectory,
): Promise<DialogueState> {
  if (isTerminal(state)) {
    reducerLogger.warn("Input received after the session ended", {
      userId: state.userId,
      outcome: state.outcome,
    });
    return state;
  }

  const received = produce(state, (draft) => {
    draft.latestUtterance = rawText;
    draft.notice = null;
    appendMessage(draft, "user", rawText);
  });
  const text = normalizeWhitespace(rawText);
  const awaiting = received.awaiting;

  switch (awaiting) {
    case "none":
      return received;
    case "reasonInput": {
      const result = nonEmpty(rawText, NOTICES.emptyReason);
      if (!result.valid) {
        return reject(received, result.message);
      }
      const reason = result.value;
      return accept(received, (draft) => {
        draft.reason = reason;
      });
    }
    case "cardSelection": {
      const option = matchCardOption(received.cardOptions, text);
      if (!option) {
        return reject(received, NOTICES.invalidCard(text));
      }
      const cardId = option.id;
      return accept(received, (draft) => {
        draft.selectedCard = cardId;
      });
    }
    case "addressConfirmation": {
      const answer = interpretConfirmation(text, ADDRESS_CONFIRMATION);
      if (answer === "approve") {
        return accept(received, (draft) => {
          draft.addressConfirmed = true;
        });
      }
      if (answer === "reject") {
        return redirect(received, "newAddress");
      }
      return reject(received, NOTICES.yesOrNo);
    }
    case "newAddress":
      return applyNewAddress(received, rawText, directory);
    case "finalConfirmation": {
      const answer = interpretConfirmation(text, FINAL_CONFIRMATION);
      if (answer === "approve") {
        return accept(received, (draft) => {
          draft.finalConfirmed = true;
        });
      }
      if (answer === "reject") {
        reducerLogger.info("Replacement cancelled at final confirmation", {
          userId: received.userId,
        });
        return end(received, "cancelled", PROMPTS.cancelled);
      }
      return reject(received, NOTICES.confirmOrCancel);
    }
    case "directoryRetry": {
      const answer = interpretConfirmation(text, RETRY_CONFIRMATION);
      if (answer === "approve") {
        const resume = received.resumeAwaiting;
        if (resume !== null) {
          return redirect(received, resume);
        }
        return accept(received, () => undefined);
      }
      if (answer === "reject") {
        return end(received, "aborted", PROMPTS.aborted);
      }
      return reject(received, NOTICES.retryOrAbort);
    }
    default: {
      const unhandled: never = awaiting;
      return unhandled;
    }
  }
}
