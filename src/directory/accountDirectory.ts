export interface Card {
  id: string;
  last4: string;
  product: string;
  address: string | null;
}

export type DirectoryErrorCode = "unavailable" | "card_not_found";

export class DirectoryError extends Error {
  code: DirectoryErrorCode;

  constructor(message: string, code: DirectoryErrorCode = "unavailable") {
    super(message);
    this.name = "DirectoryError";
    this.code = code;
  }
}

/**
 * Card store the dialogue core reads from and writes to. Implementations report
 * backend failures by rejecting, preferably with a {@link DirectoryError}.
 */
export interface AccountDirectory {
  listCards(userId: string): Promise<Card[]>;
  fetchAddress(cardId: string, userId: string): Promise<string | null>;
  /** Resolves `false` when the card is not on file for the user. */
  updateAddress(cardId: string, newAddress: string, userId: string): Promise<boolean>;
  /** Cancels the card, reissues it to `deliveryAddress` and returns the confirmation text. */
  executeReplacement(cardId: string, deliveryAddress: string, userId: string): Promise<string>;
}
