import { DEFAULT_SEED_PATH } from "../directory/seed";
import { DEFAULT_MAX_TURNS } from "../features/replacement/sessionDriver";
import { flag, readEnv, readIntEnv } from "../utils/env";

export interface AppConfig {
  userId: string;
  seedPath: string;
  maxTurns: number;
  debug: boolean;
}

export const DEFAULT_USER_ID = "user-001";

export function loadAppConfig(): AppConfig {
  return {
    userId: readEnv("CARD_REPLACEMENT_USER_ID", DEFAULT_USER_ID)?.trim() || DEFAULT_USER_ID,
    seedPath: readEnv("CARD_DIRECTORY_SEED")?.trim() || DEFAULT_SEED_PATH,
    maxTurns: readIntEnv("CARD_SESSION_MAX_TURNS", DEFAULT_MAX_TURNS),
    debug: flag("CARD_REPLACEMENT_DEBUG"),
  };
}
