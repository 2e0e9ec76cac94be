import * as os from "os";
import * as path from "path";

import {
  DEFAULT_RENEW_THRESHOLD_SECONDS,
  DEFAULT_TTL_SECONDS,
  loadTokenSettings,
  tokenManagerEnvSchema,
} from "@session-tokens/core";
import * as fs from "fs-extra";
import * as YAML from "yaml";

import {
  Config,
  configSchema,
  ConnectionOptions,
  DEFAULT_REGION,
  DEFAULT_TABLE_NAME,
  ResolvedConfig,
} from "./schemas";

/**
 * Resolves CLI settings from, in order of precedence: command-line options,
 * the environment, the user config file, and built-in defaults.
 */
export class ConfigLoader {
  private readonly userConfigPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.userConfigPath = path.join(
      configDir || path.join(os.homedir(), ".session-tokens"),
      "config.yaml",
    );
    this.env = env;
  }

  async loadUserConfig(): Promise<Config | null> {
    const { userConfigPath } = this;
    if (!(await fs.pathExists(userConfigPath))) {
      return null;
    }

    const content = await fs.readFile(userConfigPath, "utf-8");
    const parsed: unknown = YAML.parse(content);
    const result = configSchema.safeParse(parsed ?? {});

    if (!result.success) {
      throw new Error(
        `Invalid config at ${userConfigPath}: ${result.error.message}`,
      );
    }

    return result.data;
  }

  async resolve(options: ConnectionOptions): Promise<ResolvedConfig> {
    const { env } = this;
    const fileConfig = (await this.loadUserConfig()) ?? {};
    // Lifetimes from the environment win only when they parse as integers.
    const envLifetimes = tokenManagerEnvSchema.parse(env);

    return {
      tableName:
        options.table ||
        env.TOKEN_TABLE_NAME ||
        fileConfig.tableName ||
        DEFAULT_TABLE_NAME,
      endpoint: options.endpoint || env.DYNAMODB_ENDPOINT || fileConfig.endpoint,
      region: options.region || env.AWS_REGION || fileConfig.region || DEFAULT_REGION,
      ttlSeconds:
        envLifetimes.TOKEN_TTL_SECONDS ??
        fileConfig.ttlSeconds ??
        DEFAULT_TTL_SECONDS,
      renewThresholdSeconds:
        envLifetimes.TOKEN_RENEW_THRESHOLD_SECONDS ??
        fileConfig.renewThresholdSeconds ??
        DEFAULT_RENEW_THRESHOLD_SECONDS,
      secret: loadTokenSettings(env).secret,
    };
  }
}
