import { describe, expect, it, vi } from "vitest";

import type { Card } from "../../src/directory/accountDirectory";
import { InMemoryAccountDirectory } from "../../src/directory/inMemoryDirectory";
import { PROMPTS } from "../../src/features/replacement/prompts";
import {
  ReplacementSessionManager,
  SessionConflictError,
  SessionNotFoundError,
} from "./sessionManager";

const CARD_1234: Card = {
  id: "card-1234",
  last4: "1234",
  product: "Visa Classic",
  address: "12 Harbour Road",
};

const CARD_5678: Card = {
  id: "card-5678",
  last4: "5678",
  product: "Mastercard Gold",
  address: "88 Elm Avenue",
};

const ADDRESS_PROMPT = "We'll send the new card to 12 Harbour Road. Is that address correct? (yes/no)";

function createManager() {
  const directory = new InMemoryAccountDirectory(
    { users: { "user-1": [CARD_1234, CARD_5678], "user-2": [{ ...CARD_1234, id: "card-2222", last4: "2222" }] } },
    { issueCardNumber: () => ({ id: "card-0001", last4: "0001" }) },
  );
  return { manager: new ReplacementSessionManager(directory), directory };
}

describe("ReplacementSessionManager", () => {
  it("walks a conversation through to a completed replacement", async () => {
    const { manager, directory } = createManager();

    const started = await manager.startSession({ conversationId: "c1", userId: "user-1" });
    expect(started).toMatchObject({ conversationId: "c1", prompt: PROMPTS.reason, done: false });

    await manager.handleUserMessage("c1", "lost");
    const selected = await manager.handleUserMessage("c1", "1234");
    expect(selected.prompt).toBe(ADDRESS_PROMPT);

    await manager.handleUserMessage("c1", "yes");
    const finished = await manager.handleUserMessage("c1", "confirm");

    expect(finished.done).toBe(true);
    expect(finished.state.outcome).toBe("completed");
    expect(finished.prompt.startsWith("Card ending 1234 cancelled successfully.")).toBe(true);
    expect(directory.getCard("card-1234")?.status).toBe("cancelled");
  });

  it("emits every assistant prompt", async () => {
    const { manager } = createManager();
    const emit = vi.fn();

    await manager.startSession({ conversationId: "c1", userId: "user-1", emitAssistantMessage: emit });
    await manager.handleUserMessage("c1", "stolen");

    expect(emit).toHaveBeenCalledTimes(2);
    expect(emit).toHaveBeenNthCalledWith(1, PROMPTS.reason);
    expect(emit).toHaveBeenNthCalledWith(
      2,
      "Which card would you like to replace? Reply with the last 4 digits: 1234 (Visa Classic), 5678 (Mastercard Gold).",
    );
  });

  it("answers messages to a finished conversation with its closing prompt", async () => {
    const { manager } = createManager();
    await manager.startSession({ conversationId: "c1", userId: "user-1" });
    await manager.handleUserMessage("c1", "lost");
    await manager.handleUserMessage("c1", "1234");
    await manager.handleUserMessage("c1", "yes");
    const cancelled = await manager.handleUserMessage("c1", "cancel");

    const after = await manager.handleUserMessage("c1", "hello?");

    expect(cancelled.prompt).toBe(PROMPTS.cancelled);
    expect(after.done).toBe(true);
    expect(after.prompt).toBe(PROMPTS.cancelled);
    expect(after.state).toBe(cancelled.state);
  });

  it("rejects unknown conversations", async () => {
    const { manager } = createManager();

    await expect(manager.handleUserMessage("missing", "hi")).rejects.toBeInstanceOf(SessionNotFoundError);
    expect(() => manager.getState("missing")).toThrow("Conversation not found");
  });

  it("rejects a second start for the same conversation", async () => {
    const { manager } = createManager();
    await manager.startSession({ conversationId: "c1", userId: "user-1" });

    await expect(manager.startSession({ conversationId: " c1 ", userId: "user-1" })).rejects.toBeInstanceOf(
      SessionConflictError,
    );
  });

  it("requires a conversation id", async () => {
    const { manager } = createManager();

    await expect(manager.startSession({ conversationId: "   ", userId: "user-1" })).rejects.toMatchObject({
      status: 400,
      code: "bad_request",
      message: "conversationId is required",
    });
  });

  it("applies concurrent messages for one conversation in order", async () => {
    const { manager } = createManager();
    await manager.startSession({ conversationId: "c1", userId: "user-1" });

    const [reasonTurn, cardTurn] = await Promise.all([
      manager.handleUserMessage("c1", "lost"),
      manager.handleUserMessage("c1", "1234"),
    ]);

    expect(reasonTurn.state.reason).toBe("lost");
    expect(reasonTurn.state.awaiting).toBe("cardSelection");
    expect(cardTurn.state.selectedCard).toBe("card-1234");
    expect(cardTurn.prompt).toBe(ADDRESS_PROMPT);
  });

  it("keeps conversations independent", async () => {
    const { manager } = createManager();
    await manager.startSession({ conversationId: "a", userId: "user-1" });
    await manager.startSession({ conversationId: "b", userId: "user-2" });

    await manager.handleUserMessage("a", "lost");
    const single = await manager.handleUserMessage("b", "damaged");

    expect(manager.getState("a").awaiting).toBe("cardSelection");
    expect(single.state.selectedCard).toBe("card-2222");
    expect(single.prompt).toBe(ADDRESS_PROMPT);
  });

  it("forgets deleted conversations", async () => {
    const { manager } = createManager();
    await manager.startSession({ conversationId: "c1", userId: "user-1" });

    expect(manager.deleteSession("c1")).toBe(true);
    expect(manager.hasSession("c1")).toBe(false);
    expect(manager.deleteSession("c1")).toBe(false);
  });
});
