import type { AppConfig } from "./lib/config.js";
import { describeConfig } from "./lib/config.js";
import { createConsoleOutput, type ConsoleOutput } from "./lib/console.js";
import { readCsvRows, type CsvRow } from "./lib/csv.js";
import type { DashboardClient, L3Rule, Network } from "./lib/dashboardClient.js";
import { CsvFileNotFoundError, errorMessage } from "./lib/errors.js";
import { combineRules, parseL3RuleRow, translateRule } from "./lib/l3Rules.js";
import { logger as defaultLogger, type Logger } from "./lib/logger.js";
import { missingNetworkNames, selectApplianceNetworks } from "./lib/networks.js";
import { PolicyCatalog } from "./lib/policyCatalog.js";
import { createPolicyObjects, type PolicyObjectSummary } from "./lib/policyObjects.js";

export type SyncClient = Pick<
  DashboardClient,
  | "getOrganizationPolicyObjects"
  | "getOrganizationPolicyObjectsGroups"
  | "createOrganizationPolicyObject"
  | "createOrganizationPolicyObjectsGroup"
  | "getOrganizationNetworks"
  | "getNetworkApplianceFirewallL3FirewallRules"
  | "updateNetworkApplianceFirewallL3FirewallRules"
>;

export type RuleMode = "merge" | "overwrite";

export type NetworkOutcome = {
  id: string;
  name: string;
  status: "updated" | "failed";
  ruleCount?: number;
  error?: string;
};

export type SyncReport = {
  status: "completed" | "aborted";
  reason?: string;
  objects?: PolicyObjectSummary;
  rulesRead: number;
  rulesInvalid: number;
  mode?: RuleMode;
  networks: NetworkOutcome[];
};

export type SyncOptions = {
  client: SyncClient;
  config: AppConfig;
  // Asked only when no mode is given; true means overwrite
  confirmOverwrite: () => Promise<boolean>;
  mode?: RuleMode;
  log?: Logger;
  out?: ConsoleOutput;
};

async function readInput(path: string, label: string, log: Logger): Promise<CsvRow[] | null> {
  try {
    const rows = await readCsvRows(path);
    log.info({ file: path, count: rows.length }, `Read ${rows.length} ${label}`);
    return rows;
  } catch (err) {
    if (err instanceof CsvFileNotFoundError) {
      log.error({ file: path }, `${label} file not found`);
      return null;
    }
    throw err;
  }
}

async function applyRules(
  client: SyncClient,
  network: Network,
  rules: L3Rule[],
  mode: RuleMode,
  log: Logger
): Promise<NetworkOutcome> {
  const base = { id: network.id, name: network.name };

  let next = rules;
  if (mode === "merge") {
    try {
      const current = await client.getNetworkApplianceFirewallL3FirewallRules(network.id);
      next = combineRules(current.rules, rules);
    } catch (err) {
      log.error({ network: network.name, err: errorMessage(err) }, "Error getting existing L3 rules");
      return { ...base, status: "failed", error: errorMessage(err) };
    }
  }

  try {
    await client.updateNetworkApplianceFirewallL3FirewallRules(network.id, next);
    log.info({ network: network.name, mode, ruleCount: next.length }, "Applied L3 rules to network");
    return { ...base, status: "updated", ruleCount: next.length };
  } catch (err) {
    log.error({ network: network.name, err: errorMessage(err) }, "Error applying L3 rules to network");
    return { ...base, status: "failed", error: errorMessage(err) };
  }
}

/**
 * Step 1 creates policy objects (and their groups) from the objects CSV.
 * Step 2 pushes the L3 outbound rules CSV to every selected appliance network,
 * merged with or replacing each network's current rules.
 */
export async function runSync(opts: SyncOptions): Promise<SyncReport> {
  const { client, config } = opts;
  const log = opts.log ?? defaultLogger;
  const out = opts.out ?? createConsoleOutput();
  const report: SyncReport = { status: "completed", rulesRead: 0, rulesInvalid: 0, networks: [] };
  const abort = (reason: string): SyncReport => ({ ...report, status: "aborted", reason });

  out.startPanel(config.appName);
  out.configTable(describeConfig(config));

  const objectRows = await readInput(config.policyObjectsCsv, "policy objects", log);
  if (!objectRows) return abort(`policy objects file not found: ${config.policyObjectsCsv}`);

  out.stepPanel("Step 1", "Create Policy Objects and Policy Groups");
  let catalog: PolicyCatalog;
  try {
    catalog = await PolicyCatalog.load(client, config.orgId);
    log.debug({ objects: catalog.objectCount, groups: catalog.groupCount }, "Loaded existing policy objects");
  } catch (err) {
    log.error({ err: errorMessage(err) }, "Error loading existing policy objects");
    return abort(`could not load policy objects: ${errorMessage(err)}`);
  }
  report.objects = await createPolicyObjects(objectRows, catalog, log);

  const ruleRows = await readInput(config.l3RulesCsv, "L3 rules", log);
  if (!ruleRows) return abort(`L3 rules file not found: ${config.l3RulesCsv}`);

  const rules: L3Rule[] = [];
  for (const [index, row] of ruleRows.entries()) {
    const parsed = parseL3RuleRow(row);
    if (!parsed.ok) {
      report.rulesInvalid++;
      log.error({ line: index + 2, errors: parsed.errors }, "Invalid L3 rule row, skipping");
      continue;
    }
    rules.push(translateRule(parsed.rule, catalog));
  }
  report.rulesRead = rules.length;

  out.stepPanel("Step 2", "Create L3 Outbound Rules for All Networks");
  if (rules.length === 0) {
    log.warn("No valid L3 rules to apply");
    return abort("no valid L3 rules");
  }

  let networks: Network[];
  try {
    const all = await client.getOrganizationNetworks(config.orgId);
    networks = selectApplianceNetworks(all, config.networkNames);
  } catch (err) {
    log.error({ err: errorMessage(err) }, "Error getting org networks");
    return abort(`could not list networks: ${errorMessage(err)}`);
  }
  const missing = missingNetworkNames(networks, config.networkNames);
  if (missing.length) log.warn({ missing }, "Configured networks not found among appliance networks");
  log.info({ networks: networks.map((n) => n.name) }, `Found ${networks.length} appliance networks`);
  if (!networks.length) return report;

  const mode: RuleMode = opts.mode ?? ((await opts.confirmOverwrite()) ? "overwrite" : "merge");
  report.mode = mode;

  for (const network of networks) {
    report.networks.push(await applyRules(client, network, rules, mode, log));
  }

  return report;
}

export function summarize(report: SyncReport): string[] {
  const lines: string[] = [];
  if (report.objects) {
    const count = (status: string) => report.objects?.outcomes.filter((o) => o.status === status).length ?? 0;
    lines.push(
      `Policy objects: ${count("created")} created, ${count("exists")} already present, ${count("failed") + count("invalid")} failed`
    );
    lines.push(`Policy object groups: ${report.objects.groupsCreated.length} created, ${report.objects.groupsFailed.length} failed`);
  }
  lines.push(`L3 rules: ${report.rulesRead} read, ${report.rulesInvalid} invalid`);
  if (report.mode) {
    const updated = report.networks.filter((n) => n.status === "updated").length;
    lines.push(`Networks (${report.mode}): ${updated} updated, ${report.networks.length - updated} failed`);
  }
  if (report.status === "aborted") lines.push(`Aborted: ${report.reason}`);
  return lines;
}
