// Keep CLI usage text in one editable module.
export const CLI_USAGE_TEXT = `tunnels - Manage tagged SSH tunnels

Usage:
  tunnels [--config <path>] <command> [options]

Commands:
  start     Start tunnels in the background
  stop      Stop running tunnels
  status    Show the state of every configured tunnel

Global options:
  --config, -c <path>   Configuration file (default: $TUNNELS_CONFIG or
                        $XDG_CONFIG_HOME/tunnels/config.yaml)
  --version, -v         Show the version and exit
  --help, -h            Show this help message

Start / stop options:
  --name, -n <name>     Select a tunnel by name (repeatable)
  --group, -g <group>   Select every tunnel in a group
  --all, -a             Select every configured tunnel
  --no-autossh          Launch with ssh even when autossh is installed (start only)

Status options:
  --live, -l                  Refresh every 4 seconds until Ctrl-C
  --format, -f <format>       table | panel | json | yaml | toml (default: panel)
  --column <column>           Only show this column (repeatable)
  --kind <kind>               Socket kind for connections (default: inet4)

Examples:
  tunnels start --name db
  tunnels start --group staging --no-autossh
  tunnels stop --all
  tunnels status --format json --column name --column status
`;
