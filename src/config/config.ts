import { TrackerError, describeError } from "../infra/errors.js";
import { readJsonFileWithFallback } from "../infra/json-store.js";
import { resolveConfigPath } from "./paths.js";
import type { EasyIpConfig, ResolvedConfig } from "./types.js";
import { EasyIpConfigSchema } from "./zod-schema.js";

export const DEFAULT_CONFIG: ResolvedConfig = {
  discovery: { interface: "0.0.0.0", timeoutMs: 3_000 },
  registry: { missingThresholdHours: 24 },
};

export function resolveConfig(config: EasyIpConfig): ResolvedConfig {
  return {
    discovery: { ...DEFAULT_CONFIG.discovery, ...config.discovery },
    registry: { ...DEFAULT_CONFIG.registry, ...config.registry },
  };
}

export function parseConfig(raw: unknown, source = "config"): EasyIpConfig {
  const parsed = EasyIpConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new TrackerError("INVALID_CONFIG", `${source} is invalid: ${issues}`);
  }
  return parsed.data;
}

/** Load `<stateDir>/config.json`; a missing file means all defaults. */
export async function loadConfig(filePath = resolveConfigPath()): Promise<ResolvedConfig> {
  let raw: unknown;
  try {
    ({ value: raw } = await readJsonFileWithFallback(filePath, {}));
  } catch (err) {
    throw new TrackerError("INVALID_CONFIG", `cannot read ${filePath}: ${describeError(err)}`, {
      cause: err,
    });
  }
  return resolveConfig(parseConfig(raw, filePath));
}
