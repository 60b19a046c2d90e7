import { describe, expect, it } from "vitest";
import type { L3Rule } from "../src/lib/dashboardClient.js";
import {
  combineRules,
  isDefaultRule,
  parseL3RuleRow,
  ruleKey,
  translateCidrToObjects,
  translateRule,
} from "../src/lib/l3Rules.js";
import { PolicyCatalog } from "../src/lib/policyCatalog.js";
import { DEFAULT_RULE, FakeDashboard } from "./helpers/fakeDashboard.js";

function rule(overrides: Partial<L3Rule>): L3Rule {
  return {
    comment: "",
    policy: "allow",
    protocol: "tcp",
    srcPort: "Any",
    srcCidr: "Any",
    destPort: "443",
    destCidr: "Any",
    ...overrides,
  };
}

const catalog = new PolicyCatalog(
  new FakeDashboard(),
  "org-1",
  [
    { id: "11", name: "web" },
    { id: "12", name: "updates" },
  ],
  [
    { id: "22", name: "servers" },
    { id: "23", name: "web" },
  ]
);

describe("parseL3RuleRow", () => {
  it("normalizes a full row", () => {
    const parsed = parseL3RuleRow({
      comment: " Web out ",
      policy: "Allow",
      protocol: "TCP",
      srcPort: "Any",
      srcCidr: "web",
      destPort: "443",
      destCidr: "updates",
      syslogEnabled: "TRUE",
    });

    expect(parsed).toEqual({
      ok: true,
      rule: {
        comment: "Web out",
        policy: "allow",
        protocol: "tcp",
        srcPort: "Any",
        srcCidr: "web",
        destPort: "443",
        destCidr: "updates",
        syslogEnabled: true,
      },
    });
  });

  it("fills defaults and omits an empty syslog flag", () => {
    const parsed = parseL3RuleRow({ policy: "deny", protocol: "", srcCidr: "", syslogEnabled: "" });

    expect(parsed).toEqual({
      ok: true,
      rule: {
        comment: "",
        policy: "deny",
        protocol: "any",
        srcPort: "Any",
        srcCidr: "Any",
        destPort: "Any",
        destCidr: "Any",
      },
    });
  });

  it("reads anything other than true/yes/1 as syslog off", () => {
    const parsed = parseL3RuleRow({ policy: "allow", syslogEnabled: "no" });

    expect(parsed.ok && parsed.rule.syslogEnabled).toBe(false);
  });

  it("requires a policy", () => {
    expect(parseL3RuleRow({ protocol: "tcp" })).toEqual({ ok: false, errors: ["policy: policy is required"] });
  });

  it("rejects unknown policies and protocols", () => {
    const parsed = parseL3RuleRow({ policy: "permit", protocol: "gre" });

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.errors).toHaveLength(2);
      expect(parsed.errors[0]).toMatch(/^policy: /);
      expect(parsed.errors[1]).toMatch(/^protocol: /);
    }
  });
});

describe("translateCidrToObjects", () => {
  it("maps object names to OBJ() and group names to GRP()", () => {
    expect(translateCidrToObjects("updates", catalog)).toBe("OBJ(12)");
    expect(translateCidrToObjects("servers", catalog)).toBe("GRP(22)");
  });

  it("prefers an object over a group with the same name", () => {
    expect(translateCidrToObjects("web", catalog)).toBe("OBJ(11)");
  });

  it("leaves plain CIDRs and Any alone", () => {
    expect(translateCidrToObjects("10.0.0.0/8", catalog)).toBe("10.0.0.0/8");
    expect(translateCidrToObjects("Any", catalog)).toBe("Any");
  });

  it("translates each entry of a comma-separated list", () => {
    expect(translateCidrToObjects("10.0.0.0/8, servers,unknown", catalog)).toBe("10.0.0.0/8,GRP(22),unknown");
  });

  it("translates both ends of a rule", () => {
    const translated = translateRule(rule({ srcCidr: "servers", destCidr: "updates" }), catalog);

    expect(translated.srcCidr).toBe("GRP(22)");
    expect(translated.destCidr).toBe("OBJ(12)");
    expect(translated.destPort).toBe("443");
  });
});

describe("combineRules", () => {
  it("keeps existing rules first and drops the default rule", () => {
    const existing = [rule({ comment: "existing", destCidr: "10.1.0.0/16" }), DEFAULT_RULE];
    const incoming = [rule({ comment: "new", destCidr: "10.2.0.0/16" })];

    expect(combineRules(existing, incoming).map((r) => r.comment)).toEqual(["existing", "new"]);
  });

  it("skips incoming rules that already exist, ignoring case and comment", () => {
    const existing = [rule({ comment: "existing", policy: "Allow", protocol: "TCP", destCidr: "OBJ(11)" })];
    const incoming = [
      rule({ comment: "same rule", destCidr: "obj(11)" }),
      rule({ comment: "other port", destCidr: "OBJ(11)", destPort: "8443" }),
    ];

    expect(combineRules(existing, incoming).map((r) => r.comment)).toEqual(["existing", "other port"]);
  });

  it("collapses duplicates within the incoming list", () => {
    const incoming = [rule({ comment: "first" }), rule({ comment: "second" }), rule({ comment: "deny", policy: "deny" })];

    expect(combineRules([], incoming).map((r) => r.comment)).toEqual(["first", "deny"]);
  });

  it("keeps a deny-any rule that only looks like the default", () => {
    const denyAll = { ...DEFAULT_RULE, comment: "deny all", policy: "deny" };

    expect(combineRules([denyAll, DEFAULT_RULE], [])).toEqual([denyAll]);
  });
});

describe("ruleKey", () => {
  it("reads missing fields as any", () => {
    expect(ruleKey({ policy: "Deny" })).toBe("deny|any|any|any|any|any");
    expect(isDefaultRule({ policy: "allow" })).toBe(true);
    expect(isDefaultRule(DEFAULT_RULE)).toBe(true);
  });
});
