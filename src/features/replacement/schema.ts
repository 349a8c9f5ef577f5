export type Awaiting =
  | "none"
  | "reasonInput"
  | "cardSelection"
  | "addressConfirmation"
  | "newAddress"
  | "finalConfirmation"
  | "directoryRetry";

export type SessionOutcome =
  | "active"
  | "completed"
  | "cancelled"
  | "no_cards"
  | "aborted";

export type TerminalOutcome = Exclude<SessionOutcome, "active">;

export type ReplacementSlotId =
  | "reason"
  | "selectedCard"
  | "address"
  | "addressConfirmed"
  | "finalConfirmed";

export interface ReplacementSlot {
  id: ReplacementSlotId;
  label: string;
}

// Slots are collected strictly in this order.
export const REPLACEMENT_SLOTS: readonly ReplacementSlot[] = [
  { id: "reason", label: "Reason" },
  { id: "selectedCard", label: "Card" },
  { id: "address", label: "Delivery address" },
  { id: "addressConfirmed", label: "Address confirmed" },
  { id: "finalConfirmed", label: "Final confirmation" },
];
