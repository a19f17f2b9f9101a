import fs from "node:fs/promises";
import path from "node:path";
import envPaths from "env-paths";
import { configSchema, type Config } from "../shared/schema.js";
import { ConfigError, ConfigMissingError, errorMessage } from "./errors.js";
import { DEFAULT_ENDPOINT } from "./providers/hamster-provider.js";
import { DEFAULT_MAX_UPLOAD_BYTES } from "./utils/validation.js";
import { Logger } from "./utils/logger.js";

const paths = envPaths("hamlink", { suffix: "" });

export const CONFIG_DIR = paths.config;
export const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, "config.json");

export function defaultConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  return {
    apiKey: "",
    txtDir: path.join(path.dirname(configPath), "txt"),
    maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
    endpoint: DEFAULT_ENDPOINT,
    uniqueTail: true,
  };
}

export function resolveConfigPath(configPath?: string): string {
  return configPath ? path.resolve(configPath) : DEFAULT_CONFIG_PATH;
}

export async function loadConfig(configPath: string): Promise<Config> {
  const raw = await fs.readFile(configPath, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(error)}`, configPath);
  }

  // Missing keys fall back to the defaults so older files keep working
  const merged = typeof data === "object" && data !== null ? { ...defaultConfig(configPath), ...data } : data;
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid config file ${configPath}: ${issues}`, configPath);
  }

  return parsed.data;
}

export async function saveConfig(config: Config, configPath: string): Promise<void> {
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, "utf8");
}

/** Writes a placeholder config on first run. */
export async function loadOrCreateConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<Config> {
  try {
    const config = await loadConfig(configPath);
    Logger.debug(`Config loaded from ${configPath}`);
    return config;
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }

  const config = defaultConfig(configPath);
  await saveConfig(config, configPath);
  Logger.info(`New config saved in: ${configPath}`);
  return config;
}

export function applyEnvironment(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const apiKey = env.HAMLINK_API_KEY?.trim();
  return apiKey ? { ...config, apiKey } : config;
}

export function requireApiKey(config: Config, configPath: string): string {
  const apiKey = config.apiKey.trim();
  if (!apiKey) {
    throw new ConfigMissingError(
      `No API key configured. Add your hamster.is API key as "apiKey" in ${configPath} ` +
        `(or set HAMLINK_API_KEY) and run again.`,
      configPath,
    );
  }
  return apiKey;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
