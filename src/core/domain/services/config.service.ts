import { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
  /** File the config was read from, or null when only defaults apply. */
  getSourcePath(): string | null;
}
