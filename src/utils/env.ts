// Environment helpers shared by the CLI, the session manager and tests.

type EnvValue = string | number | boolean | undefined | null;

declare global {
  // eslint-disable-next-line no-var
  var __FLAG_OVERRIDES__: Record<string, EnvValue> | undefined;
}

const coerceString = (value: EnvValue): string | undefined => {
  if (value == null) {
    return undefined;
  }

  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "boolean" || typeof value === "number") {
    return String(value);
  }

  return undefined;
};

const readOverride = (key: string): string | undefined => {
  if (typeof globalThis === "undefined") {
    return undefined;
  }

  const overrides = globalThis.__FLAG_OVERRIDES__;
  if (!overrides || !Object.prototype.hasOwnProperty.call(overrides, key)) {
    return undefined;
  }

  return coerceString(overrides[key]);
};

const readProcessEnv = (key: string): string | undefined => {
  if (typeof process === "undefined" || typeof process.env === "undefined") {
    return undefined;
  }

  return process.env[key];
};

export const readEnv = (key: string, fallback?: string): string | undefined => {
  const override = readOverride(key);
  if (override !== undefined) {
    return override;
  }

  const fromProcess = readProcessEnv(key);
  if (fromProcess !== undefined && fromProcess !== "") {
    return fromProcess;
  }

  return fallback;
};

export const flag = (key: string, defaultBool = false): boolean => {
  const raw = readEnv(key);
  if (raw == null) {
    return defaultBool;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") {
    return true;
  }

  if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") {
    return false;
  }

  return defaultBool;
};

export const readIntEnv = (key: string, fallback: number): number => {
  const raw = readEnv(key);
  if (raw == null) {
    return fallback;
  }

  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const isDevEnvironment = (): boolean => {
  return readProcessEnv("NODE_ENV") !== "production";
};
