import type { AccountDirectory } from "../../directory/accountDirectory";
import { sessionLogger } from "../../utils/logger";
import { decide } from "./decisionEngine";
import {
  createInitialDialogueState,
  findOrderingViolation,
  type DialogueState,
} from "./dialogueState";
import { reduce } from "./inputReducer";
import type { TerminalOutcome } from "./schema";

export const DEFAULT_MAX_TURNS = 50;

export const TURN_LIMIT_MESSAGE =
  "This session has reached its turn limit. Please start again when you're ready.";

export interface SessionIO {
  write(prompt: string): void | Promise<void>;
  /** Resolves null once no more input is available. */
  read(): Promise<string | null>;
}

export type SessionEndReason = TerminalOutcome | "turn_limit" | "input_closed";

export interface SessionResult {
  state: DialogueState;
  reason: SessionEndReason;
  turns: number;
}

export interface RunSessionOptions {
  directory: AccountDirectory;
  userId: string;
  io: SessionIO;
  maxTurns?: number;
  initialState?: DialogueState;
}

/**
 * Reference driver: decide, show the prompt, stop when done, otherwise read one
 * line and reduce it. Stops after `maxTurns` user replies without an outcome.
 */
export async function runSession(options: RunSessionOptions): Promise<SessionResult> {
  const { directory, userId, io } = options;
  const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  let state = options.initialState ?? createInitialDialogueState(userId);
  let turns = 0;

  for (;;) {
    const decision = await decide(state, directory);
    state = decision.state;
    await io.write(decision.prompt);

    if (decision.done) {
      sessionLogger.info("Session finished", { userId, outcome: decision.outcome, turns });
      return { state, reason: decision.outcome, turns };
    }

    if (turns >= maxTurns) {
      sessionLogger.warn("Session stopped at turn limit", { userId, turns });
      await io.write(TURN_LIMIT_MESSAGE);
      return { state, reason: "turn_limit", turns };
    }

    const line = await io.read();
    if (line === null) {
      sessionLogger.info("Input closed before the session finished", { userId, turns });
      return { state, reason: "input_closed", turns };
    }

    state = await reduce(state, line, directory);
    turns += 1;

    const violation = findOrderingViolation(state);
    if (violation) {
      sessionLogger.error("Slot resolved out of order", { userId, slot: violation });
    }
  }
}
