import { existsSync, readFileSync } from "node:fs";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { IConfigService } from "../../core/domain/services/config.service.js";
import { Config } from "../../core/domain/entities/config.entity.js";
import {
  ApiConfigSchema,
  ConfigSchema,
  formatIssues,
} from "../../adapters/validation.js";

export interface ConfigServiceOptions {
  path: string;
  /** A missing file is an error only when the path was asked for explicitly. */
  explicit: boolean;
  env?: NodeJS.ProcessEnv;
}

function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

export class ConfigService implements IConfigService {
  private config: Config;
  private sourcePath: string | null;

  constructor(options: ConfigServiceOptions) {
    const env = options.env ?? process.env;
    if (!options.env) loadEnv();

    if (existsSync(options.path)) {
      this.sourcePath = options.path;
      this.config = this.loadConfig(options.path, env);
    } else if (options.explicit) {
      throw new Error(`Config file not found: ${options.path}`);
    } else {
      this.sourcePath = null;
      this.config = this.parse({}, options.path, env);
    }
  }

  private loadConfig(path: string, env: NodeJS.ProcessEnv): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to load config from ${path}. ${msg}`, { cause: e });
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`Invalid YAML in ${path}. ${msg}`, { cause: e });
    }
    // An empty document loads as undefined.
    return this.parse(parsed ?? {}, path, env);
  }

  private parse(raw: unknown, path: string, env: NodeJS.ProcessEnv): Config {
    if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
      throw new Error(`Config at ${path} must be a YAML object.`);
    }
    const result = ConfigSchema.safeParse(substituteEnv(raw, env));
    if (!result.success) {
      throw new Error(
        `Invalid config at ${path}. ${formatIssues(result.error)}.`,
      );
    }
    const config: Config = result.data;

    if (env.OPENCLASH_API_URL) {
      const override = ApiConfigSchema.shape.url.safeParse(env.OPENCLASH_API_URL);
      if (!override.success) {
        throw new Error(
          `Invalid OPENCLASH_API_URL. ${formatIssues(override.error)}.`,
        );
      }
      config.api.url = override.data;
    }
    return config;
  }

  getConfig(): Config {
    return this.config;
  }

  getSourcePath(): string | null {
    return this.sourcePath;
  }
}
