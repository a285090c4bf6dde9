export const CLI_NAME = "tunnels";

// Keep in step with package.json.
export const CLI_VERSION = "0.3.0";
