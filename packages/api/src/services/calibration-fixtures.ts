import { readFile } from "node:fs/promises";
import path from "node:path";

import { calibrationFixtureFileSchema, type CalibrationFixtureFile } from "@triage/shared";
import { validationError } from "../lib/errors.js";

/** Ground-truth sample sets, keyed by analyzer id. Null means none is registered. */
export interface FixtureSource {
  load(analyzerId: string): Promise<CalibrationFixtureFile | null>;
}

export function fixtureFileName(analyzerId: string) {
  return `${analyzerId.replace(/[^A-Za-z0-9._-]/g, "_")}.json`;
}

function isMissingFile(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Reads `<dir>/<analyzerId>.json`, with characters unsafe in file names replaced by `_`. */
export class FileFixtureSource implements FixtureSource {
  constructor(private readonly dir: string) {}

  async load(analyzerId: string) {
    const file = path.join(this.dir, fixtureFileName(analyzerId));
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    const parsed = calibrationFixtureFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw validationError(`Invalid calibration fixture file for '${analyzerId}'`, {
        file,
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }
}
