import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { DirectorySeed } from "./inMemoryDirectory";

export const DEFAULT_SEED_PATH = fileURLToPath(
  new URL("../../data/directory.seed.json", import.meta.url),
);

const CardSchema = z.object({
  id: z.string().trim().min(1),
  last4: z.string().regex(/^\d{4}$/, "last4 must be four digits"),
  product: z.string().trim().min(1),
  address: z.string().trim().min(1).nullable().default(null),
});

export const DirectorySeedSchema = z
  .object({
    users: z.record(z.string().min(1), z.array(CardSchema)),
  })
  .superRefine((seed, ctx) => {
    const seen = new Set<string>();
    for (const [userId, cards] of Object.entries(seed.users)) {
      cards.forEach((card, index) => {
        if (seen.has(card.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["users", userId, index, "id"],
            message: `Duplicate card id ${card.id}`,
          });
        }
        seen.add(card.id);
      });
    }
  });

export class DirectorySeedError extends Error {
  code: string;
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "DirectorySeedError";
    this.code = "invalid_seed";
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseDirectorySeed(raw: unknown): DirectorySeed {
  const result = DirectorySeedSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new DirectorySeedError(`Invalid directory seed: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export async function loadDirectorySeed(filePath: string = DEFAULT_SEED_PATH): Promise<DirectorySeed> {
  let source: string;
  try {
    source = await readFile(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DirectorySeedError(`Unable to read directory seed at ${filePath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DirectorySeedError(`Directory seed at ${filePath} is not valid JSON: ${reason}`);
  }

  return parseDirectorySeed(raw);
}
