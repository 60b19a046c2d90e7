import type { Dispatcher } from "undici";
import { DashboardApiError } from "./errors.js";
import { httpJson, type HttpMethod, type HttpResponse } from "./http.js";
import { createRateLimiter, type Scheduler } from "./rateLimiter.js";

export type PolicyObject = {
  id: string;
  name: string;
  category: string;
  type: string;
  cidr?: string;
  fqdn?: string;
  ip?: string;
  mask?: string;
  groupIds?: string[];
  networkIds?: string[];
};

export type PolicyObjectGroup = {
  id: string;
  name: string;
  category: string;
  objectIds?: string[];
  networkIds?: string[];
};

export type CreatePolicyObjectPayload = {
  name: string;
  category?: string;
  type?: string;
  cidr?: string;
  fqdn?: string;
  ip?: string;
  mask?: string;
  groupIds?: string[];
  [column: string]: string | string[] | undefined;
};

export type CreatePolicyObjectGroupPayload = {
  name: string;
  category: "NetworkObjectGroup" | "GeoLocationGroup";
  objectIds?: string[];
};

export type Network = {
  id: string;
  name: string;
  organizationId?: string;
  productTypes: string[];
  tags?: string[];
};

export type L3Rule = {
  comment: string;
  policy: string;
  protocol: string;
  srcPort: string;
  srcCidr: string;
  destPort: string;
  destCidr: string;
  syslogEnabled?: boolean;
};

export type L3RuleSet = { rules: L3Rule[] };

export type DashboardClientOpts = {
  apiKey: string;
  baseUrl?: string;
  appName?: string;
  retries?: number;
  backoffBaseMs?: number;
  perPage?: number;
  dispatcher?: Dispatcher;
  schedule?: Scheduler;
};

export const DEFAULT_API_BASE = "https://api.meraki.com/api/v1";

// Link: <https://...&startingAfter=x>; rel=next, <https://...>; rel=first
export function nextPageUrl(link: string | null): string | null {
  if (!link) return null;
  for (const part of link.split(/,\s*(?=<)/)) {
    const m = part.match(/^<([^>]+)>\s*;\s*rel="?next"?/i);
    if (m) return m[1];
  }
  return null;
}

/**
 * Thin wrapper over the Dashboard API v1 endpoints this tool needs.
 * Every request is rate limited and retried on 429/5xx; failures surface as DashboardApiError.
 */
export class DashboardClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly retries: number;
  private readonly backoffBaseMs: number;
  private readonly perPage: number;
  private readonly dispatcher?: Dispatcher;
  private readonly schedule: Scheduler;

  constructor(opts: DashboardClientOpts) {
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl || DEFAULT_API_BASE).replace(/\/$/, "");
    this.userAgent = `${opts.appName || "policy-object-sync"} policy-object-sync`;
    this.retries = opts.retries ?? 25;
    this.backoffBaseMs = opts.backoffBaseMs ?? 1000;
    this.perPage = opts.perPage ?? 1000;
    this.dispatcher = opts.dispatcher;
    this.schedule = opts.schedule ?? createRateLimiter({ windowMs: 1000, maxPerWindow: 10 });
  }

  private buildUrl(endpoint: string): string {
    if (/^https?:\/\//i.test(endpoint)) return endpoint;
    const path = endpoint.startsWith("/") ? endpoint : `/${endpoint}`;
    return `${this.baseUrl}${path}`;
  }

  private async request<T>(
    operation: string,
    method: HttpMethod,
    endpoint: string,
    body?: unknown
  ): Promise<HttpResponse<T>> {
    const url = this.buildUrl(endpoint);
    try {
      return await this.schedule(() =>
        httpJson<T>(url, {
          method,
          body,
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            Accept: "application/json",
            "User-Agent": this.userAgent,
          },
          retries: this.retries,
          backoffBaseMs: this.backoffBaseMs,
          dispatcher: this.dispatcher,
        })
      );
    } catch (err) {
      throw new DashboardApiError(operation, err);
    }
  }

  private async getAllPages<T>(operation: string, endpoint: string): Promise<T[]> {
    const items: T[] = [];
    const sep = endpoint.includes("?") ? "&" : "?";
    let next: string | null = `${endpoint}${sep}perPage=${this.perPage}`;
    while (next) {
      const res: HttpResponse<T[] | null> = await this.request<T[] | null>(operation, "GET", next);
      items.push(...(res.data ?? []));
      next = nextPageUrl(res.headers.get("link"));
    }
    return items;
  }

  private async send<T>(operation: string, method: HttpMethod, endpoint: string, body?: unknown): Promise<T> {
    const res = await this.request<T | null>(operation, method, endpoint, body);
    if (res.data === null) throw new DashboardApiError(operation, new Error("empty response body"));
    return res.data;
  }

  getOrganizationPolicyObjects(orgId: string) {
    return this.getAllPages<PolicyObject>(
      "getOrganizationPolicyObjects",
      `/organizations/${encodeURIComponent(orgId)}/policyObjects`
    );
  }

  getOrganizationPolicyObjectsGroups(orgId: string) {
    return this.getAllPages<PolicyObjectGroup>(
      "getOrganizationPolicyObjectsGroups",
      `/organizations/${encodeURIComponent(orgId)}/policyObjects/groups`
    );
  }

  createOrganizationPolicyObject(orgId: string, payload: CreatePolicyObjectPayload) {
    return this.send<PolicyObject>(
      "createOrganizationPolicyObject",
      "POST",
      `/organizations/${encodeURIComponent(orgId)}/policyObjects`,
      payload
    );
  }

  createOrganizationPolicyObjectsGroup(orgId: string, payload: CreatePolicyObjectGroupPayload) {
    return this.send<PolicyObjectGroup>(
      "createOrganizationPolicyObjectsGroup",
      "POST",
      `/organizations/${encodeURIComponent(orgId)}/policyObjects/groups`,
      payload
    );
  }

  getOrganizationNetworks(orgId: string) {
    return this.getAllPages<Network>(
      "getOrganizationNetworks",
      `/organizations/${encodeURIComponent(orgId)}/networks`
    );
  }

  getNetworkApplianceFirewallL3FirewallRules(networkId: string) {
    return this.send<L3RuleSet>(
      "getNetworkApplianceFirewallL3FirewallRules",
      "GET",
      `/networks/${encodeURIComponent(networkId)}/appliance/firewall/l3FirewallRules`
    );
  }

  updateNetworkApplianceFirewallL3FirewallRules(networkId: string, rules: L3Rule[]) {
    return this.send<L3RuleSet>(
      "updateNetworkApplianceFirewallL3FirewallRules",
      "PUT",
      `/networks/${encodeURIComponent(networkId)}/appliance/firewall/l3FirewallRules`,
      { rules }
    );
  }
}
