import { homedir } from "node:os";
import { resolve } from "node:path";
import { CONFIG_NAME } from "./config.consts";

export function homeDir(): string {
  return process.env.HOME ?? homedir();
}

export function defaultRuntimeDir(): string {
  return resolve(homeDir(), ".config", CONFIG_NAME);
}
