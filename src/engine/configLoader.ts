import path from "node:path";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ScanConfig } from "./types.js";
import { ConfigError, errorMessage, isNotFound } from "./errors.js";
import { DEFAULT_INCLUDE } from "../scanner/discoverFiles.js";

export const CONFIG_FILES = ["sharpscan.json", "sharpscan.config.json", ".sharpscanrc.json"];

const severitySchema = z.enum(["error", "warning", "info"]);

export const configSchema = z
  .object({
    flavor: z.enum(["auto", "avalonia", "wpf", "maui", "generic"]).default("auto"),
    include: z.array(z.string().min(1)).default(DEFAULT_INCLUDE),
    ignore: z.array(z.string().min(1)).default([]),
    maxFileBytes: z.number().int().positive().default(1_000_000),
    rootNamespace: z.string().min(1).optional(),
    disabledRules: z.array(z.string()).default([]),
    severityOverrides: z.record(severitySchema).default({}),
  })
  .strict();

export function parseConfig(raw: unknown): ScanConfig {
  return configSchema.parse(raw);
}

export async function loadConfig(rootDir: string, override: Partial<ScanConfig>): Promise<ScanConfig> {
  let fileConfig: unknown = {};
  for (const name of CONFIG_FILES) {
    const file = path.join(rootDir, name);
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (e) {
      if (isNotFound(e)) continue;
      throw new ConfigError(`Cannot read ${name}: ${errorMessage(e)}`, file, { cause: e });
    }
    try {
      fileConfig = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError(`${name} is not valid JSON: ${errorMessage(e)}`, file, { cause: e });
    }
    const result = configSchema.safeParse(fileConfig);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      throw new ConfigError(`${name} is invalid: ${issues}`, file);
    }
    fileConfig = result.data;
    break;
  }

  const defined = Object.fromEntries(Object.entries(override).filter(([, v]) => v !== undefined));
  return parseConfig({ ...(isObject(fileConfig) ? fileConfig : {}), ...defined });
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
