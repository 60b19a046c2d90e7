import { z } from "zod";
import { DEFAULT_API_BASE } from "./dashboardClient.js";
import { ConfigError } from "./errors.js";

function splitList(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const intFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? Number(v) : fallback))
    .pipe(z.number().int().nonnegative());

const envSchema = z.object({
  MERAKI_API_KEY: z.string({ required_error: "MERAKI_API_KEY is required" }).trim().min(1, "MERAKI_API_KEY is required"),
  MERAKI_ORG_ID: z.string({ required_error: "MERAKI_ORG_ID (or ORG_ID) is required" }).trim().min(1),
  NETWORK_NAMES: z.string().optional().transform(splitList),
  APP_NAME: z.string().trim().min(1).optional().default("policy-object-sync"),
  MERAKI_API_BASE: z.string().trim().url().optional().default(DEFAULT_API_BASE),
  MERAKI_MAX_RETRIES: intFromEnv(25),
  MERAKI_RATE_LIMIT_PER_SECOND: intFromEnv(10).pipe(z.number().min(1)),
  POLICY_OBJECTS_CSV: z.string().trim().min(1).optional().default("policy_objects.csv"),
  L3_RULES_CSV: z.string().trim().min(1).optional().default("l3_outbound_rules.csv"),
});

export type AppConfig = {
  appName: string;
  apiKey: string;
  orgId: string;
  networkNames: string[];
  apiBase: string;
  maxRetries: number;
  rateLimitPerSecond: number;
  policyObjectsCsv: string;
  l3RulesCsv: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank values are treated as unset
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (typeof v === "string" && v.trim() !== "") cleaned[k] = v;
  }
  if (!cleaned.MERAKI_ORG_ID && cleaned.ORG_ID) cleaned.MERAKI_ORG_ID = cleaned.ORG_ID;

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => (i.message.includes(String(i.path[0])) ? i.message : `${i.path.join(".")}: ${i.message}`))
    );
  }
  const e = parsed.data;
  return {
    appName: e.APP_NAME,
    apiKey: e.MERAKI_API_KEY,
    orgId: e.MERAKI_ORG_ID,
    networkNames: e.NETWORK_NAMES,
    apiBase: e.MERAKI_API_BASE,
    maxRetries: e.MERAKI_MAX_RETRIES,
    rateLimitPerSecond: e.MERAKI_RATE_LIMIT_PER_SECOND,
    policyObjectsCsv: e.POLICY_OBJECTS_CSV,
    l3RulesCsv: e.L3_RULES_CSV,
  };
}

export function maskSecret(secret: string): string {
  if (secret.length <= 4) return "*".repeat(secret.length);
  return `${"*".repeat(Math.min(secret.length - 4, 12))}${secret.slice(-4)}`;
}

export function describeConfig(config: AppConfig): Array<[string, string]> {
  return [
    ["App Name", config.appName],
    ["API Key", maskSecret(config.apiKey)],
    ["Organization ID", config.orgId],
    ["Networks", config.networkNames.length ? config.networkNames.join(", ") : "(all appliance networks)"],
    ["API Base", config.apiBase],
    ["Max Retries", String(config.maxRetries)],
    ["Rate Limit", `${config.rateLimitPerSecond}/s`],
    ["Policy Objects CSV", config.policyObjectsCsv],
    ["L3 Rules CSV", config.l3RulesCsv],
  ];
}
