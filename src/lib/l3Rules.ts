import { z } from "zod";
import type { CsvRow } from "./csv.js";
import type { L3Rule } from "./dashboardClient.js";
import type { PolicyCatalog } from "./policyCatalog.js";

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const cell = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const l3RuleRowSchema = z.object({
  comment: z.preprocess(blankToUndefined, z.string().trim().default("")),
  policy: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "policy is required" }).trim().toLowerCase().pipe(z.enum(["allow", "deny"]))
  ),
  protocol: z.preprocess(
    blankToUndefined,
    z.string().trim().toLowerCase().pipe(z.enum(["tcp", "udp", "icmp", "icmp6", "any"])).default("any")
  ),
  srcPort: cell("Any"),
  srcCidr: cell("Any"),
  destPort: cell("Any"),
  destCidr: cell("Any"),
  syslogEnabled: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .toLowerCase()
      .transform((v) => ["true", "yes", "1"].includes(v))
      .optional()
  ),
});

export type L3RuleParseResult =
  | { ok: true; rule: L3Rule }
  | { ok: false; errors: string[] };

export function parseL3RuleRow(row: CsvRow): L3RuleParseResult {
  const parsed = l3RuleRowSchema.safeParse(row);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    };
  }
  const { syslogEnabled, ...rule } = parsed.data;
  return { ok: true, rule: syslogEnabled === undefined ? rule : { ...rule, syslogEnabled } };
}

function lookup(name: string, catalog: PolicyCatalog): string | null {
  const objectId = catalog.objectId(name);
  if (objectId !== undefined) return `OBJ(${objectId})`;
  const groupId = catalog.groupId(name);
  if (groupId !== undefined) return `GRP(${groupId})`;
  return null;
}

/**
 * Rewrites policy object and group names in a CIDR field into OBJ(id) / GRP(id) references.
 * Comma-separated lists are translated token by token; anything unknown is kept as is.
 */
export function translateCidrToObjects(cidr: string, catalog: PolicyCatalog): string {
  const whole = lookup(cidr, catalog);
  if (whole) return whole;
  if (!cidr.includes(",")) return cidr;
  return cidr
    .split(",")
    .map((token) => token.trim())
    .map((token) => lookup(token, catalog) ?? token)
    .join(",");
}

export function translateRule(rule: L3Rule, catalog: PolicyCatalog): L3Rule {
  return {
    ...rule,
    srcCidr: translateCidrToObjects(rule.srcCidr, catalog),
    destCidr: translateCidrToObjects(rule.destCidr, catalog),
  };
}

const KEY_FIELDS = ["policy", "protocol", "srcCidr", "destCidr", "srcPort", "destPort"] as const;

export function ruleKey(rule: Partial<L3Rule>): string {
  return KEY_FIELDS.map((field) => (rule[field] ?? "any").toLowerCase()).join("|");
}

// The platform appends "allow any any any any any" to every rule list itself
const DEFAULT_RULE_KEY = ruleKey({ policy: "allow" });

export function isDefaultRule(rule: Partial<L3Rule>): boolean {
  return ruleKey(rule) === DEFAULT_RULE_KEY;
}

/**
 * Existing rules first (minus the implicit default rule), then each incoming rule whose
 * (policy, protocol, src/dest cidr, src/dest port) key has not been seen yet.
 */
export function combineRules(existing: L3Rule[], incoming: L3Rule[]): L3Rule[] {
  const combined: L3Rule[] = [];
  const seen = new Set<string>();

  for (const rule of existing) {
    if (isDefaultRule(rule)) continue;
    seen.add(ruleKey(rule));
    combined.push(rule);
  }

  for (const rule of incoming) {
    const key = ruleKey(rule);
    if (seen.has(key)) continue;
    seen.add(key);
    combined.push(rule);
  }

  return combined;
}
