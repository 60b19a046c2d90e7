import type { Network } from "./dashboardClient.js";

export function isApplianceNetwork(network: Network): boolean {
  return Array.isArray(network.productTypes) && network.productTypes.includes("appliance");
}

export function selectApplianceNetworks(networks: Network[], names: string[] = []): Network[] {
  const wanted = new Set(names);
  return networks.filter((n) => isApplianceNetwork(n) && (wanted.size === 0 || wanted.has(n.name)));
}

export function missingNetworkNames(selected: Network[], names: string[]): string[] {
  const found = new Set(selected.map((n) => n.name));
  return names.filter((name) => !found.has(name));
}
