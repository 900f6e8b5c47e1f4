import path from "path";

/**
 * Service configuration, read from the environment (`.env` is loaded by
 * the entry point) with `--bind` and `--data-dir` command-line overrides.
 */
export interface AppConfig {
  server: {
    host: string;
    port: number;
  };
  database: {
    dataDir: string;
    url: string;
    updateIntervalMs: number;
    downloadTimeoutMs: number;
    minSizeBytes: number;
    minSizeRatio: number;
    maxGenerations: number;
  };
  startup: {
    retryAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  access: {
    allowedHosts: string[];
    apiKey?: string;
  };
  logging: {
    level: string;
  };
}

type Env = Record<string, string | undefined>;

export const DEFAULT_DATABASE_URL =
  "https://download.db-ip.com/free/dbip-city-lite-{YYYY}-{MM}.mmdb.gz";

const getEnv = (env: Env, key: string, defaultValue: string): string => {
  const value = env[key];
  return value === undefined || value === "" ? defaultValue : value;
};

const getEnvNumber = (env: Env, key: string, defaultValue: number): number => {
  const value = env[key];
  if (value === undefined || value === "") return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative number`);
  }
  return parsed;
};

/**
 * Split "host:port", "[v6]:port" or a bare port.
 */
export function parseBindAddress(bind: string): { host: string; port: number } {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/.exec(bind);
  const host = match ? match[1] ?? match[2] : "0.0.0.0";
  const portText = match ? match[3] : bind;
  const port = Number(portText);

  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new Error(`Invalid bind address: ${bind}`);
  }

  return { host: host || "0.0.0.0", port };
}

/**
 * Read "--name value" pairs from the command line.
 */
export function parseArgs(argv: string[]): Record<string, string> {
  const args: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;

    const eq = arg.indexOf("=");
    if (eq !== -1) {
      args[arg.substring(2, eq)] = arg.substring(eq + 1);
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${arg}`);
    }
    args[arg.substring(2)] = value;
    i++;
  }

  return args;
}

export function loadConfig(
  env: Env = process.env,
  argv: string[] = process.argv.slice(2)
): AppConfig {
  const args = parseArgs(argv);
  const bind = args.bind ?? getEnv(env, "BIND_ADDRESS", "0.0.0.0:3001");
  const dataDir = args["data-dir"] ?? getEnv(env, "DATA_DIR", "./data");

  const minSizeRatio = getEnvNumber(env, "MIN_SIZE_RATIO", 0.5);
  if (minSizeRatio > 1) {
    throw new Error("Environment variable MIN_SIZE_RATIO must be at most 1");
  }

  const maxGenerations = getEnvNumber(env, "MAX_GENERATIONS", 3);
  if (!Number.isInteger(maxGenerations) || maxGenerations < 1) {
    throw new Error("Environment variable MAX_GENERATIONS must be a positive integer");
  }

  return {
    server: parseBindAddress(bind),
    database: {
      dataDir: path.resolve(dataDir),
      url: getEnv(env, "DATABASE_URL", DEFAULT_DATABASE_URL),
      updateIntervalMs: getEnvNumber(env, "UPDATE_INTERVAL_MS", 24 * 60 * 60 * 1000),
      downloadTimeoutMs: getEnvNumber(env, "DOWNLOAD_TIMEOUT_MS", 5 * 60 * 1000),
      minSizeBytes: getEnvNumber(env, "MIN_DATABASE_BYTES", 1024 * 1024),
      minSizeRatio,
      maxGenerations,
    },
    startup: {
      retryAttempts: Math.max(1, getEnvNumber(env, "STARTUP_RETRY_ATTEMPTS", 5)),
      retryBaseDelayMs: getEnvNumber(env, "STARTUP_RETRY_BASE_MS", 1000),
      retryMaxDelayMs: getEnvNumber(env, "STARTUP_RETRY_MAX_MS", 30000),
    },
    access: {
      allowedHosts: getEnv(env, "ALLOWED_HOSTS", "localhost,127.0.0.1")
        .split(",")
        .map((host) => host.trim().toLowerCase())
        .filter(Boolean),
      apiKey: env.API_KEY || undefined,
    },
    logging: {
      level: getEnv(env, "LOG_LEVEL", "info"),
    },
  };
}
