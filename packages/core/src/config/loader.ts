import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { applyEnvOverrides } from "./env.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
  /**
   * Environment consulted for overrides. Overrides never reach config.json.
   * Pass `{}` to read the file alone.
   */
  env?: Record<string, string | undefined>;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json")
  );
}

async function readIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      return undefined;
    }
    throw err;
  }
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ServerConfig> {
  const configPath = configPathFor(options);
  const raw = await readIfExists(configPath);

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const fileConfig = ServerConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(fileConfig, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return applyEnvOverrides(fileConfig, options?.env ?? process.env);
}
