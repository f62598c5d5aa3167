import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "EASYIP_STATE_DIR";

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return override;
  }
  return path.join(os.homedir(), ".easyip");
}

export function resolveRegistryPath(stateDir = resolveStateDir()): string {
  return path.join(stateDir, "registry", "devices.json");
}

export function resolveConfigPath(stateDir = resolveStateDir()): string {
  return path.join(stateDir, "config.json");
}
