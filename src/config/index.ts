/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Values come from environment variables (optionally a `.env` file) and
 * `package.json`, validated with Zod.
 *
 * @module src/config/index
 */

import dotenv from "dotenv";
import { existsSync, mkdirSync, readFileSync, statSync } from "fs";
import path, { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

dotenv.config();

// --- Determine Project Root ---
const findProjectRoot = (startDir: string): string => {
  let currentDir = startDir;
  // If the start directory is in `dist`, start searching from the parent directory.
  if (path.basename(currentDir) === "dist") {
    currentDir = path.dirname(currentDir);
  }
  while (true) {
    const packageJsonPath = join(currentDir, "package.json");
    if (existsSync(packageJsonPath)) {
      return currentDir;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      throw new Error(
        `Could not find project root (package.json) starting from ${startDir}`,
      );
    }
    currentDir = parentDir;
  }
};
let projectRoot: string;
try {
  const currentModuleDir = dirname(fileURLToPath(import.meta.url));
  projectRoot = findProjectRoot(currentModuleDir);
} catch (error: unknown) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(`FATAL: Error determining project root: ${errorMessage}`);
  projectRoot = process.cwd();
  if (process.stdout.isTTY) {
    console.warn(
      `Warning: Using process.cwd() (${projectRoot}) as fallback project root.`,
    );
  }
}
// --- End Determine Project Root ---

/**
 * Loads and parses the package.json file from the project root.
 * @returns The parsed package.json object or a fallback default.
 * @private
 */
const loadPackageJson = (): {
  name: string;
  version: string;
  description: string;
} => {
  const pkgPath = join(projectRoot, "package.json");
  const fallback = {
    name: "causal-evidence-mcp-server",
    version: "0.0.0",
    description: "No description provided.",
  };

  if (!existsSync(pkgPath)) {
    if (process.stdout.isTTY) {
      console.warn(
        `Warning: package.json not found at ${pkgPath}. Using fallback values. This is expected in some environments (e.g., Docker) but may indicate an issue with project root detection.`,
      );
    }
    return fallback;
  }

  try {
    const fileContents = readFileSync(pkgPath, "utf-8");
    const parsed: unknown = JSON.parse(fileContents);
    const PackageJsonSchema = z.object({
      name: z.string().catch(fallback.name),
      version: z.string().catch(fallback.version),
      description: z.string().catch(fallback.description),
    });
    return PackageJsonSchema.parse(parsed);
  } catch (error) {
    if (process.stdout.isTTY) {
      console.error(
        "Warning: Could not read or parse package.json. Using hardcoded defaults.",
        error,
      );
    }
    return fallback;
  }
};

const pkg = loadPackageJson();

const EnvSchema = z.object({
  // Core Server Config
  MCP_SERVER_NAME: z.string().optional(),
  MCP_SERVER_VERSION: z.string().optional(),
  NODE_ENV: z.string().default("development"),

  // Logging
  MCP_LOG_LEVEL: z.string().default("info"),
  LOGS_DIR: z.string().default(path.join(projectRoot, "logs")),

  // Causal model storage
  MODEL_DB_PATH: z
    .string()
    .default(path.join(projectRoot, "storage", "causal-model.sqlite")),
  EXPORTS_DIR: z.string().default(path.join(projectRoot, "exports")),

  // Quantification
  QUANT_SAMPLE_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .max(1_000_000)
    .default(10_000),
  QUANT_MAX_PARENTS: z.coerce.number().int().positive().max(20).default(12),
  QUANT_RANDOM_SEED: z.coerce.number().int().optional(),

  // --- START: OpenTelemetry Configuration ---
  /** If 'true', OpenTelemetry will be initialized and enabled. Default: 'false'. */
  OTEL_ENABLED: z
    .string()
    .transform((v) => v.toLowerCase() === "true")
    .default("false"),
  /** The logical name of the service. Defaults to MCP_SERVER_NAME or package name. */
  OTEL_SERVICE_NAME: z.string().optional(),
  /** The version of the service. Defaults to MCP_SERVER_VERSION or package version. */
  OTEL_SERVICE_VERSION: z.string().optional(),
  /** The OTLP endpoint for traces. If not set, traces are logged to a file. */
  OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: z.string().url().optional(),
  /** The OTLP endpoint for metrics. If not set, metrics are not exported. */
  OTEL_EXPORTER_OTLP_METRICS_ENDPOINT: z.string().url().optional(),
  OTEL_TRACES_SAMPLER_ARG: z.coerce.number().min(0).max(1).default(1.0),
  OTEL_LOG_LEVEL: z
    .enum(["NONE", "ERROR", "WARN", "INFO", "DEBUG", "VERBOSE", "ALL"])
    .default("INFO"),
});

const parsedEnv = EnvSchema.safeParse(process.env);

if (!parsedEnv.success) {
  if (process.stdout.isTTY) {
    console.error(
      "Invalid environment variables:",
      parsedEnv.error.flatten().fieldErrors,
    );
  }
}

const env = parsedEnv.success ? parsedEnv.data : EnvSchema.parse({});

const ensureDirectory = (
  dirPath: string,
  rootDir: string,
  dirName: string,
): string | null => {
  const resolvedDirPath = path.isAbsolute(dirPath)
    ? dirPath
    : path.resolve(rootDir, dirPath);

  if (
    !resolvedDirPath.startsWith(rootDir + path.sep) &&
    resolvedDirPath !== rootDir
  ) {
    if (process.stdout.isTTY) {
      console.error(
        `Error: ${dirName} path "${dirPath}" resolves to "${resolvedDirPath}", which is outside the project boundary "${rootDir}".`,
      );
    }
    return null;
  }

  if (!existsSync(resolvedDirPath)) {
    try {
      mkdirSync(resolvedDirPath, { recursive: true });
      if (process.stdout.isTTY) {
        console.log(`Created ${dirName} directory: ${resolvedDirPath}`);
      }
    } catch (err: unknown) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      if (process.stdout.isTTY) {
        console.error(
          `Error creating ${dirName} directory at ${resolvedDirPath}: ${errorMessage}`,
        );
      }
      return null;
    }
  } else {
    try {
      const stats = statSync(resolvedDirPath);
      if (!stats.isDirectory()) {
        if (process.stdout.isTTY) {
          console.error(
            `Error: ${dirName} path ${resolvedDirPath} exists but is not a directory.`,
          );
        }
        return null;
      }
    } catch (statError: unknown) {
      const errorMessage =
        statError instanceof Error
          ? statError.message
          : "An unknown error occurred";
      if (process.stdout.isTTY) {
        console.error(
          `Error accessing ${dirName} path ${resolvedDirPath}: ${errorMessage}`,
        );
      }
      return null;
    }
  }
  return resolvedDirPath;
};

/**
 * Resolves a configured directory, falling back to `<root>/<name>` when the
 * configured one cannot be used.
 * @private
 */
const resolveDirectory = (configured: string, dirName: string): string | null => {
  const validated = ensureDirectory(configured, projectRoot, dirName);
  if (validated) {
    return validated;
  }
  if (process.stdout.isTTY) {
    console.warn(
      `Warning: Custom ${dirName} directory ('${configured}') is invalid or outside the project boundary. Falling back to default.`,
    );
  }
  return ensureDirectory(path.join(projectRoot, dirName), projectRoot, dirName);
};

const validatedLogsPath = resolveDirectory(env.LOGS_DIR, "logs");
if (!validatedLogsPath && process.stdout.isTTY) {
  console.warn(
    "Warning: Default logs directory could not be created. File logging will be disabled.",
  );
}

const validatedExportsPath =
  resolveDirectory(env.EXPORTS_DIR, "exports") ??
  path.join(projectRoot, "exports");

// ":memory:" keeps the model in process, anything else is a file path.
const modelDbPath =
  env.MODEL_DB_PATH === ":memory:"
    ? env.MODEL_DB_PATH
    : path.isAbsolute(env.MODEL_DB_PATH)
      ? env.MODEL_DB_PATH
      : path.resolve(projectRoot, env.MODEL_DB_PATH);

export const config = {
  pkg,
  projectRoot,
  mcpServerName: env.MCP_SERVER_NAME || pkg.name,
  mcpServerVersion: env.MCP_SERVER_VERSION || pkg.version,
  mcpServerDescription: pkg.description,
  logLevel: env.MCP_LOG_LEVEL,
  logsPath: validatedLogsPath,
  environment: env.NODE_ENV,
  modelDbPath,
  exportsPath: validatedExportsPath,
  quantification: {
    sampleSize: env.QUANT_SAMPLE_SIZE,
    maxParents: env.QUANT_MAX_PARENTS,
    randomSeed: env.QUANT_RANDOM_SEED,
  },
  openTelemetry: {
    enabled: env.OTEL_ENABLED,
    serviceName: env.OTEL_SERVICE_NAME || env.MCP_SERVER_NAME || pkg.name,
    serviceVersion:
      env.OTEL_SERVICE_VERSION || env.MCP_SERVER_VERSION || pkg.version,
    tracesEndpoint: env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
    metricsEndpoint: env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT,
    samplingRatio: env.OTEL_TRACES_SAMPLER_ARG,
    logLevel: env.OTEL_LOG_LEVEL,
  },
};

export const environment: string = config.environment;

