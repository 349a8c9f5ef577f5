import type { AccountDirectory } from "../../src/directory/accountDirectory";
import { createKeyedLock } from "../../src/lib/keyedLock";
import { decide, type Decision } from "../../src/features/replacement/decisionEngine";
import {
  createInitialDialogueState,
  type DialogueState,
} from "../../src/features/replacement/dialogueState";
import { reduce } from "../../src/features/replacement/inputReducer";
import { sessionLogger } from "../../src/utils/logger";

type AssistantEmitter = (message: string) => void;

export class ReplacementSessionError extends Error {
  status: number;
  code: string;

  constructor(message: string, status = 400, code = "bad_request") {
    super(message);
    this.name = "ReplacementSessionError";
    this.status = status;
    this.code = code;
  }
}

export class SessionNotFoundError extends ReplacementSessionError {
  constructor(message = "Conversation not found") {
    super(message, 404, "session_not_found");
  }
}

export class SessionConflictError extends ReplacementSessionError {
  constructor(message = "Conversation already started") {
    super(message, 409, "session_conflict");
  }
}

export interface StartSessionOptions {
  conversationId: string;
  userId: string;
  emitAssistantMessage?: AssistantEmitter;
}

export interface InteractionResult {
  conversationId: string;
  prompt: string;
  done: boolean;
  state: DialogueState;
}

interface SessionContext {
  state: DialogueState;
  done: boolean;
  emitAssistantMessage?: AssistantEmitter;
}

function normalizeConversationId(conversationId: string): string {
  const trimmed = conversationId.trim();
  if (!trimmed) {
    throw new ReplacementSessionError("conversationId is required");
  }
  return trimmed;
}

/**
 * Holds independent replacement sessions keyed by conversation id. Turns for
 * one conversation run one at a time; separate conversations only share the
 * account directory.
 */
export class ReplacementSessionManager {
  private readonly sessions = new Map<string, SessionContext>();
  private readonly turns = createKeyedLock();

  constructor(private readonly directory: AccountDirectory) {}

  async startSession(options: StartSessionOptions): Promise<InteractionResult> {
    const conversationId = normalizeConversationId(options.conversationId);
    return this.turns.run(conversationId, async () => {
      if (this.sessions.has(conversationId)) {
        throw new SessionConflictError();
      }
      const session: SessionContext = {
        state: createInitialDialogueState(options.userId),
        done: false,
        emitAssistantMessage: options.emitAssistantMessage,
      };
      this.sessions.set(conversationId, session);
      sessionLogger.info("Session started", { conversationId, userId: options.userId });
      return this.apply(conversationId, session, await decide(session.state, this.directory));
    });
  }

  async handleUserMessage(conversationId: string, message: string): Promise<InteractionResult> {
    const id = normalizeConversationId(conversationId);
    return this.turns.run(id, async () => {
      const session = this.requireSession(id);
      if (session.done) {
        sessionLogger.warn("Message received for a finished session", { conversationId: id });
        return { conversationId: id, prompt: session.state.prompt, done: true, state: session.state };
      }
      const reduced = await reduce(session.state, message, this.directory);
      session.state = reduced;
      return this.apply(id, session, await decide(reduced, this.directory));
    });
  }

  getState(conversationId: string): DialogueState {
    return this.requireSession(normalizeConversationId(conversationId)).state;
  }

  hasSession(conversationId: string): boolean {
    return this.sessions.has(conversationId.trim());
  }

  deleteSession(conversationId: string): boolean {
    const removed = this.sessions.delete(conversationId.trim());
    if (removed) {
      sessionLogger.debug("Session deleted", { conversationId });
    }
    return removed;
  }

  private requireSession(conversationId: string): SessionContext {
    const session = this.sessions.get(conversationId);
    if (!session) {
      throw new SessionNotFoundError();
    }
    return session;
  }

  private apply(
    conversationId: string,
    session: SessionContext,
    decision: Decision,
  ): InteractionResult {
    session.state = decision.state;
    session.done = decision.done;
    session.emitAssistantMessage?.(decision.prompt);
    if (decision.done) {
      sessionLogger.info("Session finished", { conversationId, outcome: decision.outcome });
    }
    return {
      conversationId,
      prompt: decision.prompt,
      done: decision.done,
      state: decision.state,
    };
  }
}
