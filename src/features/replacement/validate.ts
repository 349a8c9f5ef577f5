import type { CardOption } from "./dialogueState";

export type ValidationResult =
  | { valid: true; value: string }
  | { valid: false; message: string };

export type ConfirmationAnswer = "approve" | "reject";

export interface ConfirmationVocabulary {
  approve: ReadonlySet<string>;
  reject: ReadonlySet<string>;
}

export const ADDRESS_CONFIRMATION: ConfirmationVocabulary = {
  approve: new Set(["yes", "y"]),
  reject: new Set(["no", "n"]),
};

export const FINAL_CONFIRMATION: ConfirmationVocabulary = {
  approve: new Set(["confirm", "yes", "y"]),
  reject: new Set(["cancel", "no", "n"]),
};

export const RETRY_CONFIRMATION: ConfirmationVocabulary = {
  approve: new Set(["retry", "r", "try again"]),
  reject: new Set(["abort", "quit", "exit"]),
};

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function nonEmpty(raw: string, message: string): ValidationResult {
  const value = raw.trim();
  if (!value) {
    return { valid: false, message };
  }
  return { valid: true, value };
}

export function interpretConfirmation(
  raw: string,
  vocabulary: ConfirmationVocabulary,
): ConfirmationAnswer | null {
  const normalized = normalizeWhitespace(raw).toLowerCase().replace(/[.!]+$/, "");
  if (!normalized) {
    return null;
  }
  if (vocabulary.approve.has(normalized)) {
    return "approve";
  }
  if (vocabulary.reject.has(normalized)) {
    return "reject";
  }
  return null;
}

/**
 * Matches a reply against the listed cards by last 4 digits or by card id.
 */
export function matchCardOption(options: readonly CardOption[], raw: string): CardOption | null {
  const normalized = normalizeWhitespace(raw);
  if (!normalized) {
    return null;
  }
  const lower = normalized.toLowerCase();
  return (
    options.find((option) => option.last4 === normalized) ??
    options.find((option) => option.id.toLowerCase() === lower) ??
    null
  );
}
