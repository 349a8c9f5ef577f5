import { randomInt, randomUUID } from "node:crypto";

import { createKeyedLock, type KeyedLock } from "../lib/keyedLock";
import { directoryLogger } from "../utils/logger";
import { DirectoryError, type AccountDirectory, type Card } from "./accountDirectory";

export type CardStatus = "active" | "cancelled";

export interface CardRecord extends Card {
  ownerId: string;
  status: CardStatus;
  replacedBy: string | null;
}

export type AuditAction = "address_updated" | "card_replaced";

export interface AuditEntry {
  action: AuditAction;
  cardId: string;
  userId: string;
  at: string;
  details: Record<string, string>;
}

export interface DirectorySeed {
  users: Record<string, Card[]>;
}

export interface IssuedCardNumber {
  id: string;
  last4: string;
}

export interface InMemoryDirectoryOptions {
  issueCardNumber?: () => IssuedCardNumber;
  now?: () => Date;
}

function defaultIssueCardNumber(): IssuedCardNumber {
  return {
    id: `card-${randomUUID()}`,
    last4: String(randomInt(0, 10_000)).padStart(4, "0"),
  };
}

function toCard(record: CardRecord): Card {
  return {
    id: record.id,
    last4: record.last4,
    product: record.product,
    address: record.address,
  };
}

export function formatReplacementConfirmation(
  cancelled: Card,
  deliveryAddress: string,
): string {
  return (
    `Card ending ${cancelled.last4} cancelled successfully. ` +
    `A replacement ${cancelled.product} card will be delivered to ${deliveryAddress} within 5-7 business days.`
  );
}

/**
 * Process-local card store. Writes to a card are serialized per card id, so
 * concurrent sessions touching the same card apply their updates one at a time.
 */
export class InMemoryAccountDirectory implements AccountDirectory {
  private readonly cards = new Map<string, CardRecord>();
  private readonly audit: AuditEntry[] = [];
  private readonly locks: KeyedLock = createKeyedLock();
  private readonly issueCardNumber: () => IssuedCardNumber;
  private readonly now: () => Date;

  constructor(seed: DirectorySeed = { users: {} }, options: InMemoryDirectoryOptions = {}) {
    this.issueCardNumber = options.issueCardNumber ?? defaultIssueCardNumber;
    this.now = options.now ?? (() => new Date());

    for (const [ownerId, cards] of Object.entries(seed.users)) {
      for (const card of cards) {
        if (this.cards.has(card.id)) {
          throw new Error(`Duplicate card id in seed: ${card.id}`);
        }
        this.cards.set(card.id, {
          ...card,
          ownerId,
          status: "active",
          replacedBy: null,
        });
      }
    }
  }

  async listCards(userId: string): Promise<Card[]> {
    const owned: Card[] = [];
    for (const record of this.cards.values()) {
      if (record.ownerId === userId && record.status === "active") {
        owned.push(toCard(record));
      }
    }
    directoryLogger.debug("Listed cards", { userId, count: owned.length });
    return owned;
  }

  async fetchAddress(cardId: string, userId: string): Promise<string | null> {
    const record = this.findOwned(cardId, userId);
    return record?.address ?? null;
  }

  updateAddress(cardId: string, newAddress: string, userId: string): Promise<boolean> {
    return this.locks.run(cardId, () => {
      const record = this.findOwned(cardId, userId);
      if (!record || record.status !== "active") {
        directoryLogger.warn("Address update for unknown card", { cardId, userId });
        return false;
      }
      const previous = record.address ?? "";
      record.address = newAddress;
      this.record("address_updated", cardId, userId, { previous, address: newAddress });
      return true;
    });
  }

  executeReplacement(cardId: string, deliveryAddress: string, userId: string): Promise<string> {
    return this.locks.run(cardId, () => {
      const record = this.findOwned(cardId, userId);
      if (!record || record.status !== "active") {
        throw new DirectoryError(`Card ${cardId} is not active for this user`, "card_not_found");
      }

      const issued = this.issueCardNumber();
      record.status = "cancelled";
      record.replacedBy = issued.id;
      this.cards.set(issued.id, {
        id: issued.id,
        last4: issued.last4,
        product: record.product,
        address: deliveryAddress,
        ownerId: userId,
        status: "active",
        replacedBy: null,
      });

      this.record("card_replaced", cardId, userId, {
        replacementId: issued.id,
        deliveryAddress,
      });
      directoryLogger.info("Card replaced", { cardId, replacementId: issued.id, userId });

      return formatReplacementConfirmation(record, deliveryAddress);
    });
  }

  getCard(cardId: string): CardRecord | null {
    const record = this.cards.get(cardId);
    return record ? { ...record } : null;
  }

  listAuditLog(): AuditEntry[] {
    return this.audit.map((entry) => ({ ...entry, details: { ...entry.details } }));
  }

  private findOwned(cardId: string, userId: string): CardRecord | null {
    const record = this.cards.get(cardId);
    if (!record || record.ownerId !== userId) {
      return null;
    }
    return record;
  }

  private record(
    action: AuditAction,
    cardId: string,
    userId: string,
    details: Record<string, string>,
  ) {
    this.audit.push({
      action,
      cardId,
      userId,
      at: this.now().toISOString(),
      details,
    });
  }
}
