import type {
  CreatePolicyObjectPayload,
  DashboardClient,
  PolicyObject,
  PolicyObjectGroup,
} from "./dashboardClient.js";

export type CatalogClient = Pick<
  DashboardClient,
  | "getOrganizationPolicyObjects"
  | "getOrganizationPolicyObjectsGroups"
  | "createOrganizationPolicyObject"
  | "createOrganizationPolicyObjectsGroup"
>;

/**
 * Name to ID registry for an organization's policy objects and policy object groups.
 * Created objects and groups are recorded as they are made, so later lookups see them.
 */
export class PolicyCatalog {
  private readonly objects = new Map<string, string>();
  private readonly groups = new Map<string, string>();

  constructor(
    private readonly client: CatalogClient,
    readonly orgId: string,
    objects: Array<Pick<PolicyObject, "id" | "name">> = [],
    groups: Array<Pick<PolicyObjectGroup, "id" | "name">> = []
  ) {
    for (const o of objects) this.objects.set(o.name, o.id);
    for (const g of groups) this.groups.set(g.name, g.id);
  }

  static async load(client: CatalogClient, orgId: string): Promise<PolicyCatalog> {
    const objects = await client.getOrganizationPolicyObjects(orgId);
    const groups = await client.getOrganizationPolicyObjectsGroups(orgId);
    return new PolicyCatalog(client, orgId, objects, groups);
  }

  get objectCount() {
    return this.objects.size;
  }

  get groupCount() {
    return this.groups.size;
  }

  objectId(name: string): string | undefined {
    return this.objects.get(name);
  }

  groupId(name: string): string | undefined {
    return this.groups.get(name);
  }

  async createGroup(name: string): Promise<PolicyObjectGroup> {
    const group = await this.client.createOrganizationPolicyObjectsGroup(this.orgId, {
      name,
      category: "NetworkObjectGroup",
    });
    this.groups.set(name, group.id);
    return group;
  }

  async ensureGroup(name: string): Promise<{ id: string; created: boolean }> {
    const existing = this.groups.get(name);
    if (existing !== undefined) return { id: existing, created: false };
    const group = await this.createGroup(name);
    return { id: group.id, created: true };
  }

  async createObject(payload: CreatePolicyObjectPayload): Promise<PolicyObject> {
    const created = await this.client.createOrganizationPolicyObject(this.orgId, payload);
    this.objects.set(payload.name, created.id);
    return created;
  }
}
