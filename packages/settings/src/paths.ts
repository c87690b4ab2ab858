import { homedir } from "node:os";
import { join } from "node:path";

export interface PlatformInfo {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

/**
 * Per-user configuration directory for an application.
 *
 * - Windows: `%APPDATA%\<app>`
 * - macOS: `~/Library/Application Support/<app>`
 * - elsewhere: `$XDG_CONFIG_HOME/<app>`, falling back to `~/.config/<app>`
 */
export function appDataDir(appName: string, info: PlatformInfo = {}): string {
  const platform = info.platform ?? process.platform;
  const env = info.env ?? process.env;
  const home = info.home ?? homedir();

  if (platform === "win32") {
    return join(env.APPDATA || join(home, "AppData", "Roaming"), appName);
  }
  if (platform === "darwin") {
    return join(home, "Library", "Application Support", appName);
  }
  return join(env.XDG_CONFIG_HOME || join(home, ".config"), appName);
}
