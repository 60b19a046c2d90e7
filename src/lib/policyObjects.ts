import type { CreatePolicyObjectPayload } from "./dashboardClient.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { PolicyCatalog } from "./policyCatalog.js";
import type { CsvRow } from "./csv.js";

export const GROUP_NAME_COLUMN = "_group_name";

export type PolicyObjectRow = {
  payload: CreatePolicyObjectPayload;
  groupName?: string;
};

export type PolicyObjectOutcome = {
  name: string;
  groupName?: string;
  status: "created" | "exists" | "failed" | "invalid";
  id?: string;
  error?: string;
};

export type PolicyObjectSummary = {
  groupsCreated: string[];
  groupsFailed: string[];
  outcomes: PolicyObjectOutcome[];
};

export function parsePolicyObjectRow(row: CsvRow): PolicyObjectRow | null {
  const cells: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    const v = (value ?? "").trim();
    if (key && v) cells[key] = v;
  }
  const { [GROUP_NAME_COLUMN]: groupName, name, ...rest } = cells;
  if (!name) return null;
  return groupName ? { payload: { ...rest, name }, groupName } : { payload: { ...rest, name } };
}

export async function createPolicyObjects(
  rows: CsvRow[],
  catalog: PolicyCatalog,
  log: Logger
): Promise<PolicyObjectSummary> {
  const summary: PolicyObjectSummary = { groupsCreated: [], groupsFailed: [], outcomes: [] };

  for (const [index, row] of rows.entries()) {
    const parsed = parsePolicyObjectRow(row);
    if (!parsed) {
      log.error({ line: index + 2 }, "Policy object row has no name, skipping");
      summary.outcomes.push({ name: "", status: "invalid", error: "missing name" });
      continue;
    }
    const { payload, groupName } = parsed;

    let groupId: string | undefined;
    if (groupName) {
      if (summary.groupsFailed.includes(groupName)) {
        summary.outcomes.push({ name: payload.name, groupName, status: "failed", error: `group ${groupName} unavailable` });
        continue;
      }
      try {
        const group = await catalog.ensureGroup(groupName);
        if (group.created) {
          summary.groupsCreated.push(groupName);
          log.info({ group: groupName, id: group.id }, "Created policy object group");
        }
        groupId = group.id;
      } catch (err) {
        // No object without its group
        summary.groupsFailed.push(groupName);
        log.error({ group: groupName, err: errorMessage(err) }, "Error creating policy object group");
        summary.outcomes.push({ name: payload.name, groupName, status: "failed", error: errorMessage(err) });
        continue;
      }
    }

    const existingId = catalog.objectId(payload.name);
    if (existingId !== undefined) {
      log.warn({ object: payload.name, id: existingId }, "Policy object already exists, skipping");
      summary.outcomes.push({ name: payload.name, groupName, status: "exists", id: existingId });
      continue;
    }

    try {
      const created = await catalog.createObject(groupId ? { ...payload, groupIds: [groupId] } : payload);
      log.info({ object: payload.name, id: created.id, group: groupName }, "Created policy object");
      summary.outcomes.push({ name: payload.name, groupName, status: "created", id: created.id });
    } catch (err) {
      log.error({ object: payload.name, err: errorMessage(err) }, "Error creating policy object");
      summary.outcomes.push({ name: payload.name, groupName, status: "failed", error: errorMessage(err) });
    }
  }

  return summary;
}
