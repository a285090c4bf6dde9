import { homedir } from "os";
import { join } from "path";

// Environment variable that names the configuration file explicitly.
export const CONFIG_ENV_VAR = "TUNNELS_CONFIG";

export const CONFIG_DIR_NAME = "tunnels";
export const CONFIG_FILE_NAME = "config.yaml";

// `$XDG_CONFIG_HOME/tunnels/config.yaml`, with XDG_CONFIG_HOME falling back to ~/.config.
export function defaultConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  home: () => string = homedir,
): string {
  const configHome = env.XDG_CONFIG_HOME?.trim() || join(home(), ".config");
  return join(configHome, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}
