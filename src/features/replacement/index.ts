/**
 * Card replacement dialogue
 *
 * Decision engine, input reducer and the reference session driver.
 */

export { decide, type Decision } from './decisionEngine';
export { reduce } from './inputReducer';
export {
  createInitialDialogueState,
  findOrderingViolation,
  isTerminal,
  summarizeSlots,
  type CardOption,
  type DialogueState,
  type SlotSummary,
  type TranscriptMessage,
} from './dialogueState';
export { PROMPTS } from './prompts';
export {
  runSession,
  DEFAULT_MAX_TURNS,
  TURN_LIMIT_MESSAGE,
  type RunSessionOptions,
  type SessionEndReason,
  type SessionIO,
  type SessionResult,
} from './sessionDriver';
export type { Awaiting, SessionOutcome, TerminalOutcome } from './schema';
