import { resolve } from "node:path";
import { ConfigService } from "../services/config.service.js";

/**
 * Resolves the configuration file path: explicit flag, then CONFIG_PATH,
 * then config/config.yaml under the working directory.
 */
export function getConfigPath(explicitPath?: string): {
  path: string;
  explicit: boolean;
} {
  if (explicitPath) return { path: resolve(explicitPath), explicit: true };
  if (process.env.CONFIG_PATH) {
    return { path: resolve(process.env.CONFIG_PATH), explicit: true };
  }
  return {
    path: resolve(process.cwd(), "config", "config.yaml"),
    explicit: false,
  };
}

export function loadConfig(explicitPath?: string): ConfigService {
  return new ConfigService(getConfigPath(explicitPath));
}
