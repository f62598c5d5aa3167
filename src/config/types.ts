export type DiscoveryConfig = {
  /** Local IPv4 address to bind for scans. Default: "0.0.0.0" (all interfaces). */
  interface?: string;
  /** Collection window per scan in milliseconds. Default: 3000. */
  timeoutMs?: number;
};

export type RegistryConfig = {
  /** Hours without a sighting before a device counts as missing. Default: 24. */
  missingThresholdHours?: number;
};

export type EasyIpConfig = {
  discovery?: DiscoveryConfig;
  registry?: RegistryConfig;
};

export type ResolvedConfig = {
  discovery: Required<DiscoveryConfig>;
  registry: Required<RegistryConfig>;
};
