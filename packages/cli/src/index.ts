#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from "commander";
import process from "node:process";
import readline from "node:readline/promises";

import {
  CONTENT_TYPES,
  PRIORITIES,
  reviewResolveSchema,
  type ContentType,
  type CorrectedValue,
  type ListPendingQuery,
  type Priority,
} from "@triage/shared";
import { createClient } from "./client.js";
import { readConfig, writeConfig } from "./config.js";
import { dim, formatReport, formatReviewItem, formatStats, green, red } from "./format.js";
import { parseEntities, reviewItem } from "./review.js";

async function requireClient() {
  const cfg = await readConfig();
  if (!cfg) {
    throw new Error(`Missing config. Run: triage config --url http://localhost:3000 --actor <EXAMINER_ID>`);
  }
  return createClient(cfg);
}

function parseContentType(value: string): ContentType {
  const match = CONTENT_TYPES.find((t) => t === value);
  if (!match) throw new InvalidArgumentError(`Expected one of: ${CONTENT_TYPES.join(", ")}`);
  return match;
}

function parsePriority(value: string): Priority {
  const match = PRIORITIES.find((p) => String(p) === value);
  if (!match) throw new InvalidArgumentError(`Expected one of: ${PRIORITIES.join(", ")}`);
  return match;
}

function parseLimit(value: string) {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer");
  return n;
}

const program = new Command();
program.name("triage").description("Examiner CLI for the evidence triage review queue").version("0.1.0");

program
  .command("config")
  .description("Set or show API configuration")
  .option("--url <url>", "API base URL, e.g. http://localhost:3000")
  .option("--actor <actorId>", "Your examiner id, sent as x-actor-id")
  .option("--show", "Print current config")
  .action(async (opts: { url?: string; actor?: string; show?: boolean }) => {
    const current = await readConfig();
    if (opts.show) {
      if (!current) {
        console.log(dim("No config found."));
        return;
      }
      console.log(JSON.stringify(current, null, 2));
      return;
    }

    const apiUrl = opts.url ?? current?.apiUrl;
    const actorId = opts.actor ?? current?.actorId;
    if (!apiUrl || !actorId) throw new Error("Provide --url and --actor (or use --show).");

    await writeConfig({ apiUrl, actorId });
    console.log(green("Config saved."));
  });

program
  .command("pending")
  .description("List open review items, most urgent first")
  .option("--case <caseRef>", "Filter by case")
  .option("--type <contentType>", "Filter by content type", parseContentType)
  .option("--priority <n>", "Filter by priority (1 high, 3 low)", parsePriority)
  .option("--limit <n>", "Max items", parseLimit)
  .action(async (opts: { case?: string; type?: ContentType; priority?: Priority; limit?: number }) => {
    const client = await requireClient();
    const query: ListPendingQuery = {
      caseRef: opts.case,
      contentType: opts.type,
      priority: opts.priority,
      limit: opts.limit,
    };
    const items = await client.listPending(query);
    if (items.length === 0) {
      console.log(green("No pending review items."));
      return;
    }
    for (const item of items) console.log(formatReviewItem(item));
  });

program
  .command("claim")
  .description("Take the lease on a review item")
  .argument("<itemId>", "Review item UUID")
  .action(async (itemId: string) => {
    const item = await (await requireClient()).claim(itemId);
    console.log(green(`claimed until ${item.leaseExpiresAt ?? "?"}`));
  });

program
  .command("release")
  .description("Give a claimed item back to the queue")
  .argument("<itemId>", "Review item UUID")
  .action(async (itemId: string) => {
    const item = await (await requireClient()).release(itemId);
    console.log(green(`released: ${item.status}`));
  });

program
  .command("renew")
  .description("Extend the lease on a claimed item")
  .argument("<itemId>", "Review item UUID")
  .action(async (itemId: string) => {
    const item = await (await requireClient()).renew(itemId);
    console.log(green(`lease extended until ${item.leaseExpiresAt ?? "?"}`));
  });

program
  .command("resolve")
  .description("Record a decision on a claimed item")
  .argument("<itemId>", "Review item UUID")
  .argument("<decision>", "approve | correct | reject")
  .option("--value <text>", "Corrected text (ocr, caption, transcription)")
  .option("--entities <json>", "Corrected PII entities as a JSON array", parseEntities)
  .action(async (itemId: string, decision: string, opts: { value?: string; entities?: CorrectedValue }) => {
    const body = reviewResolveSchema.parse({ decision, correctedValue: opts.entities ?? opts.value });
    const out = await (await requireClient()).resolve(itemId, body);
    console.log(green(`resolved: ${out.item.outcome ?? out.item.status} (${out.result.disposition})`));
  });

program
  .command("stats")
  .description("Queue health")
  .option("--case <caseRef>", "Restrict to one case")
  .action(async (opts: { case?: string }) => {
    console.log(formatStats(await (await requireClient()).stats(opts.case)));
  });

program
  .command("calibration")
  .description("Show analyzer calibration health")
  .argument("[analyzerId]", "A single analyzer")
  .action(async (analyzerId: string | undefined) => {
    const reports = await (await requireClient()).calibrationReport(analyzerId);
    if (reports.length === 0) {
      console.log(dim("No analyzers registered."));
      return;
    }
    for (const report of reports) console.log(formatReport(report));
  });

program
  .command("calibrate")
  .description("Trigger a calibration run")
  .argument("[analyzerId]", "A single analyzer (default: all)")
  .action(async (analyzerId: string | undefined) => {
    const res = await (await requireClient()).runCalibration(analyzerId);
    if (res.queued) {
      console.log(green(`queued ${dim(res.jobId ?? "")}`));
      return;
    }
    for (const o of res.outcomes) {
      const line = `${o.analyzerId.padEnd(24)} ${o.status}  x${o.multiplier.toFixed(2)}`;
      console.log(o.error ? `${line}  ${red(o.error)}` : line);
    }
  });

program
  .command("review")
  .description("Work through pending items interactively")
  .option("--case <caseRef>", "Only this case")
  .option("--limit <n>", "Max items (default 20)", parseLimit, 20)
  .action(async (opts: { case?: string; limit: number }) => {
    const client = await requireClient();
    const items = await client.listPending({ caseRef: opts.case, limit: opts.limit });
    if (items.length === 0) {
      console.log(green("No pending review items."));
      return;
    }

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      for (const pending of items) {
        console.log("");
        console.log(formatReviewItem(pending));
        await reviewItem(client, pending, (prompt) => rl.question(prompt));
      }
    } finally {
      rl.close();
    }
  });

program.configureOutput({
  outputError: (str, write) => write(red(str)),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
