import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

const configSchema = z.object({
  apiUrl: z.string().url(),
  actorId: z.string().min(1),
});

export type Config = z.infer<typeof configSchema>;

export function getDefaultConfigPath() {
  return path.join(os.homedir(), ".triage", "config.json");
}

/** Null when the file is missing, unreadable, or lacks a field. */
export async function readConfig(opts?: { configPath?: string }): Promise<Config | null> {
  const configPath = opts?.configPath ?? getDefaultConfigPath();
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = configSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export async function writeConfig(cfg: Config, opts?: { configPath?: string }) {
  const configPath = opts?.configPath ?? getDefaultConfigPath();
  const valid = configSchema.parse(cfg);
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(valid, null, 2) + "\n", "utf8");
}
