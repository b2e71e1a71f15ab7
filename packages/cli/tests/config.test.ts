import { beforeEach, describe, expect, it, vi } from "vitest";

const mem = new Map<string, string>();

vi.mock("node:fs/promises", () => {
  return {
    default: {
      readFile: vi.fn(async (p: string) => {
        const data = mem.get(p);
        if (data === undefined) throw new Error("ENOENT");
        return data;
      }),
      writeFile: vi.fn(async (p: string, data: string) => {
        mem.set(p, data);
      }),
      mkdir: vi.fn(async () => undefined),
    },
  };
});

const { readConfig, writeConfig, getDefaultConfigPath } = await import("../src/config.js");

const configPath = "/home/test/.triage/config.json";

describe("cli config", () => {
  beforeEach(() => {
    mem.clear();
  });

  it("writes and reads config", async () => {
    await writeConfig({ apiUrl: "http://localhost:3000", actorId: "examiner-7" }, { configPath });

    expect(mem.get(configPath)).toBe('{\n  "apiUrl": "http://localhost:3000",\n  "actorId": "examiner-7"\n}\n');
    const cfg = await readConfig({ configPath });
    expect(cfg).toEqual({ apiUrl: "http://localhost:3000", actorId: "examiner-7" });
  });

  it("returns null when config is missing", async () => {
    expect(await readConfig({ configPath: "/missing/config.json" })).toBeNull();
  });

  it("returns null when required fields are missing", async () => {
    mem.set(configPath, JSON.stringify({ apiUrl: "http://localhost:3000" }) + "\n");
    expect(await readConfig({ configPath })).toBeNull();
  });

  it("returns null for malformed JSON or a bad URL", async () => {
    mem.set(configPath, "{ not json");
    expect(await readConfig({ configPath })).toBeNull();

    mem.set(configPath, JSON.stringify({ apiUrl: "localhost", actorId: "examiner-7" }));
    expect(await readConfig({ configPath })).toBeNull();
  });

  it("refuses to write an invalid config", async () => {
    await expect(writeConfig({ apiUrl: "http://localhost:3000", actorId: "" }, { configPath })).rejects.toThrow();
    expect(mem.has(configPath)).toBe(false);
  });

  it("defaults to ~/.triage/config.json", () => {
    expect(getDefaultConfigPath().endsWith("/.triage/config.json")).toBe(true);
  });
});
