import { InvalidArgumentError } from "commander";

import { piiEntitySchema, reviewResolveSchema, type CorrectedValue, type ReviewResolveInput } from "@triage/shared";
import type { ReviewItemView, TriageClient } from "./client.js";
import { dim, green, red } from "./format.js";

export type Ask = (prompt: string) => Promise<string>;
export type ReviewClient = Pick<TriageClient, "claim" | "getResult" | "resolve" | "release">;
export type ReviewStep = "skipped" | "resolved" | "released";

/** `--entities` takes the corrected PII entity set as a JSON array. */
export function parseEntities(value: string): CorrectedValue {
  let json: unknown;
  try {
    json = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError("Expected a JSON array of entities");
  }
  const parsed = piiEntitySchema.array().safeParse(json);
  if (!parsed.success) throw new InvalidArgumentError(parsed.error.issues[0]?.message ?? "Invalid entities");
  return parsed.data;
}

function correction(contentType: ReviewItemView["contentType"], answer: string): ReviewResolveInput {
  const correctedValue = contentType === "pii" ? parseEntities(answer) : answer;
  const parsed = reviewResolveSchema.safeParse({ decision: "correct", correctedValue });
  if (!parsed.success) throw new InvalidArgumentError(parsed.error.issues[0]?.message ?? "Invalid correction");
  return parsed.data;
}

/**
 * Claims one pending item and asks the examiner what to do with it. The claim is released
 * again on skip or on any failure after it was taken, so the item is not held until the lease lapses.
 */
export async function reviewItem(
  client: ReviewClient,
  pending: ReviewItemView,
  ask: Ask,
  print: (line: string) => void = console.log
): Promise<ReviewStep> {
  // Another examiner may have taken it since the list was fetched.
  const claimed = await client.claim(pending.id).catch((err: unknown) => {
    print(dim(`skipped: ${err instanceof Error ? err.message : String(err)}`));
    return null;
  });
  if (!claimed) return "skipped";

  try {
    const result = await client.getResult(claimed.analysisResultId);
    print(`${result.analyzerId} on ${result.contentRef}`);
    print(`value: ${JSON.stringify(result.value)}`);

    const action = (await ask("Action [a]pprove [c]orrect [r]eject [s]kip: ")).trim().toLowerCase();
    let body: ReviewResolveInput | null = null;
    if (action === "a" || action === "r") body = { decision: action === "a" ? "approve" : "reject" };
    if (action === "c") {
      const prompt = claimed.contentType === "pii" ? "Corrected entities (JSON array): " : "Corrected text: ";
      body = correction(claimed.contentType, (await ask(prompt)).trim());
    }

    if (body) {
      const out = await client.resolve(claimed.id, body);
      print(green(`resolved: ${out.item.outcome ?? out.item.status}`));
      return "resolved";
    }
  } catch (err) {
    print(red(err instanceof Error ? err.message : String(err)));
  }

  await client.release(claimed.id);
  print(dim("released"));
  return "released";
}
