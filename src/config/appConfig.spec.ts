import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_SEED_PATH } from "../directory/seed";
import { DEFAULT_USER_ID, loadAppConfig } from "./appConfig";

const KEYS = [
  "CARD_REPLACEMENT_USER_ID",
  "CARD_DIRECTORY_SEED",
  "CARD_SESSION_MAX_TURNS",
  "CARD_REPLACEMENT_DEBUG",
];

describe("loadAppConfig", () => {
  beforeEach(() => {
    for (const key of KEYS) {
      vi.stubEnv(key, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    globalThis.__FLAG_OVERRIDES__ = undefined;
  });

  it("falls back to defaults when nothing is set", () => {
    expect(loadAppConfig()).toEqual({
      userId: DEFAULT_USER_ID,
      seedPath: DEFAULT_SEED_PATH,
      maxTurns: 50,
      debug: false,
    });
  });

  it("reads values from the environment", () => {
    vi.stubEnv("CARD_REPLACEMENT_USER_ID", " user-002 ");
    vi.stubEnv("CARD_DIRECTORY_SEED", "/tmp/seed.json");
    vi.stubEnv("CARD_SESSION_MAX_TURNS", "12");
    vi.stubEnv("CARD_REPLACEMENT_DEBUG", "yes");

    expect(loadAppConfig()).toEqual({
      userId: "user-002",
      seedPath: "/tmp/seed.json",
      maxTurns: 12,
      debug: true,
    });
  });

  it("prefers overrides to the environment", () => {
    vi.stubEnv("CARD_REPLACEMENT_USER_ID", "user-002");
    globalThis.__FLAG_OVERRIDES__ = { CARD_REPLACEMENT_USER_ID: "user-003", CARD_SESSION_MAX_TURNS: 7 };

    const config = loadAppConfig();

    expect(config.userId).toBe("user-003");
    expect(config.maxTurns).toBe(7);
  });

  it.each(["0", "-3", "many"])("ignores a max turn count of %s", (value) => {
    vi.stubEnv("CARD_SESSION_MAX_TURNS", value);

    expect(loadAppConfig().maxTurns).toBe(50);
  });

  it("treats a blank user id override as unset", () => {
    globalThis.__FLAG_OVERRIDES__ = { CARD_REPLACEMENT_USER_ID: "   " };

    expect(loadAppConfig().userId).toBe(DEFAULT_USER_ID);
  });
});
