import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const STATE_DIR_ENV = "PACER_STATE_DIR";
export const CONFIG_PATH_ENV = "PACER_CONFIG_PATH";

/** Where pacer.db lives. An explicit override beats the environment. */
export function getStateDir(override?: string): string {
  return override ?? process.env[STATE_DIR_ENV] ?? join(homedir(), ".pacer");
}

export function getConfigPath(override?: string): string {
  return resolve(override ?? process.env[CONFIG_PATH_ENV] ?? "pacer.config.json");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}

export function prepareStateDir(override?: string): string {
  return ensureDir(getStateDir(override));
}
