import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";
import { logInfo } from "./logger";

dotenv.config();

export const cfg = {
  PORT: process.env.PORT || "3110",
  NODE_ENV: process.env.NODE_ENV || "development",
  ROUTER_CONFIG_PATH: process.env.ROUTER_CONFIG_PATH || "",
  MATCHER_BASE_URL: process.env.MATCHER_BASE_URL || "",
  MATCHER_API_TOKEN: process.env.MATCHER_API_TOKEN || "",
  MATCHER_TIMEOUT_MS: Number(process.env.MATCHER_TIMEOUT_MS || 5000),
};

export const FallbackModeSchema = z.enum(["accept_all", "blacklist", "whitelist"]);
export type FallbackMode = z.infer<typeof FallbackModeSchema>;

const Millis = z.number().int().positive();

export const RouterConfigSchema = z.object({
  lang: z.string().min(1).default("en-us"),
  secondary_langs: z.array(z.string().min(1)).default([]),
  fallback_priorities: z.record(z.number().int().min(1).max(100)).default({}),
  fallback_mode: FallbackModeSchema.default("accept_all"),
  fallback_blacklist: z.array(z.string()).default([]),
  fallback_whitelist: z.array(z.string()).default([]),
  discovery_timeout: Millis.default(500),
  discovery_poll_interval: Millis.default(20),
  per_handler_timeout: Millis.default(3000),
  legacy_timeout: Millis.default(10_000),
  converse_timeout: Millis.default(3000),
  active_skill_timeout: z.number().positive().default(5), // minutes
  max_active_skills: z.number().int().positive().default(10),
});

export type RouterConfig = z.infer<typeof RouterConfigSchema>;
export type RouterConfigInput = z.input<typeof RouterConfigSchema>;

function splitList(v: string): string[] {
  return v.split(",").map((s) => s.trim()).filter(Boolean);
}

/** `FALLBACK_PRIORITIES=weather:3,chat:95` */
function parsePriorities(v: string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const pair of splitList(v)) {
    const idx = pair.lastIndexOf(":");
    if (idx <= 0) continue;
    out[pair.slice(0, idx).trim()] = Number(pair.slice(idx + 1));
  }
  return out;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const o: Record<string, unknown> = {};
  if (env.DEFAULT_LANG) o.lang = env.DEFAULT_LANG;
  if (env.SECONDARY_LANGS) o.secondary_langs = splitList(env.SECONDARY_LANGS);
  if (env.FALLBACK_MODE) o.fallback_mode = env.FALLBACK_MODE.toLowerCase();
  if (env.FALLBACK_PRIORITIES) o.fallback_priorities = parsePriorities(env.FALLBACK_PRIORITIES);
  return o;
}

export function parseRouterConfig(raw: unknown): RouterConfig {
  const parsed = RouterConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    );
  }
  return parsed.data;
}

export function loadRouterConfig(
  file: string = cfg.ROUTER_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): RouterConfig {
  let fromFile: Record<string, unknown> = {};
  if (file) {
    const full = path.resolve(file);
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(full, "utf8"));
    } catch (e) {
      throw new ConfigError([`${full}: ${e instanceof Error ? e.message : String(e)}`]);
    }
    if (typeof json !== "object" || json === null || Array.isArray(json)) {
      throw new ConfigError([`${full}: expected a JSON object`]);
    }
    fromFile = { ...json };
    logInfo("config.loaded", { file: full });
  }
  return parseRouterConfig({ ...fromFile, ...envOverrides(env) });
}

export function assertConfig(opts: { remoteMatchers: boolean }) {
  const missing: string[] = [];
  if (opts.remoteMatchers && !cfg.MATCHER_BASE_URL) missing.push("MATCHER_BASE_URL");
  if (missing.length) throw new Error("Missing env: " + missing.join(", "));
}
