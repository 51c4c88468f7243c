import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { FatalConfigError, getErrorMessage, isNodeError } from "../utils/errors.js";

export const configSchema = z
  .object({
    initialMode: z.enum(["insert", "normal"]).default("insert"),
    debug: z.boolean().default(false),
    debugLogFile: z.string().min(1).optional(),
  })
  .strict();

export type EditorConfig = z.infer<typeof configSchema>;

export type CliOverrides = {
  normal?: boolean;
  debug?: boolean;
};

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env["XDG_CONFIG_HOME"] || path.join(os.homedir(), ".config");
  return path.join(base, "vibe", "config.json");
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length ? issue.path.join(".") : "(root)";
      return `  ${where}: ${issue.message}`;
    })
    .join("\n");
}

export function parseConfig(raw: unknown, source: string): EditorConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new FatalConfigError(
      `Invalid config in ${source}:\n${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Reads the config file. A missing file is only an error when the path was
 * given explicitly.
 */
export function loadConfig(
  explicitPath?: string,
  overrides: CliOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): EditorConfig {
  const filePath = explicitPath ?? defaultConfigPath(env);

  let raw: unknown = {};
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    if (!(isNodeError(error) && error.code === "ENOENT" && !explicitPath)) {
      throw new FatalConfigError(
        `Could not read config ${filePath}: ${getErrorMessage(error)}`,
      );
    }
  }

  const config = parseConfig(raw, filePath);
  if (overrides.normal) config.initialMode = "normal";
  if (overrides.debug) config.debug = true;
  const envLog = env["VIBE_DEBUG_LOG_FILE"];
  if (envLog) config.debugLogFile = envLog;
  return config;
}
