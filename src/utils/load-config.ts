import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConversionConfig,
  ConfigError,
  PartialConversionConfig,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("mdpress", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return ConversionConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialConversionConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();
  if (!existsSync(userConfigPath)) {
    return null;
  }
  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    state: { ...base.state, ...override.state },
    page: { ...base.page, ...override.page },
    diagrams: {
      ...base.diagrams,
      ...override.diagrams,
      mermaid: { ...base.diagrams.mermaid, ...override.diagrams?.mermaid },
      plantuml: { ...base.diagrams.plantuml, ...override.diagrams?.plantuml },
    },
    ebook: { ...base.ebook, ...override.ebook },
    workers: { ...base.workers, ...override.workers },
    templates: { ...base.templates, ...override.templates },
    tools: { ...base.tools, ...override.tools },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Environment overrides for machine-specific settings
 * PLANTUML_SERVER, CHROME_PATH, MDPRESS_DB_PATH
 */
export function applyEnvironment(
  config: ConversionConfig,
  env: NodeJS.ProcessEnv = process.env,
): ConversionConfig {
  return mergeConfig(config, {
    diagrams: env.PLANTUML_SERVER
      ? { plantuml: { server: env.PLANTUML_SERVER } }
      : undefined,
    tools: env.CHROME_PATH ? { chrome: env.CHROME_PATH } : undefined,
    state: env.MDPRESS_DB_PATH ? { database: env.MDPRESS_DB_PATH } : undefined,
  });
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > environment > user config > default config
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  config = applyEnvironment(config);

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

/**
 * Default location of the conversion state database
 */
export function getDefaultDatabasePath(): string {
  return join(paths.data, "state.db");
}
