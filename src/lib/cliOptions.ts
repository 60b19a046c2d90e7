import type { AppConfig } from "./config.js";
import type { RuleMode } from "../sync.js";

export type CliOptions = {
  objects?: string;
  rules?: string;
  network?: string[];
  overwrite?: boolean;
  merge?: boolean;
  yes?: boolean;
};

export function resolveMode(options: CliOptions): RuleMode | undefined {
  if (options.overwrite && options.merge) {
    throw new Error("--overwrite and --merge cannot be used together");
  }
  if (options.overwrite) return "overwrite";
  if (options.merge || options.yes) return "merge";
  return undefined;
}

export function applyCliOverrides(config: AppConfig, options: CliOptions): AppConfig {
  return {
    ...config,
    policyObjectsCsv: options.objects ?? config.policyObjectsCsv,
    l3RulesCsv: options.rules ?? config.l3RulesCsv,
    networkNames: options.network?.length ? options.network : config.networkNames,
  };
}
