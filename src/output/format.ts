import { stringify as stringifyToml } from "smol-toml";
import YAML from "yaml";
import { renderPanel, renderTable, type Align, type TableColumn } from "./table";
import { colorize, isRich, theme, type ThemeColor } from "./theme";

export const OUTPUT_FORMATS = ["table", "panel", "json", "yaml", "toml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type OutputRow = Record<string, string>;

export type FormatOptions = {
  // Keys to keep, in order. Unknown keys are dropped.
  columns?: readonly string[];
  // Shown above `table` output.
  title?: string;
  color?: boolean;
};

export const PANEL_TITLE = "Active Tunnels";
export const TOML_ROOT_KEY = "Tunnel";

const PORT_COLUMNS = new Set(["port", "local_port", "remote_port"]);

const STATUS_STYLES: Record<string, { label: string; color: ThemeColor }> = {
  running: { label: "Running", color: theme.successStrong },
  inactive: { label: "Inactive", color: theme.errorStrong },
  connecting: { label: "Connecting", color: theme.muted },
};

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function selectColumns(rows: readonly OutputRow[], columns?: readonly string[]): OutputRow[] {
  if (!columns || columns.length === 0) {
    return rows.map((row) => ({ ...row }));
  }
  return rows.map((row) => {
    const picked: OutputRow = {};
    for (const key of columns) {
      const value = row[key];
      if (value !== undefined) picked[key] = value;
    }
    return picked;
  });
}

// "local_port" → "Local Port"
export function columnHeader(key: string): string {
  return key
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/(^|\s)([a-z])/g, (_match, sep: string, ch: string) => `${sep}${ch.toUpperCase()}`);
}

function columnStyle(key: string): { align: Align; color: ThemeColor } {
  if (key === "name") return { align: "left", color: theme.success };
  if (key === "status") return { align: "center", color: theme.strong };
  if (PORT_COLUMNS.has(key)) return { align: "right", color: theme.port };
  return { align: "left", color: theme.muted };
}

function styleLines(value: string, rich: boolean, color: ThemeColor): string {
  return value
    .split("\n")
    .map((line) => colorize(rich, color, line))
    .join("\n");
}

export function formatStatusValue(value: string, rich: boolean): string {
  const known = STATUS_STYLES[value.toLowerCase()];
  if (known) return colorize(rich, known.color, known.label);
  return colorize(rich, theme.muted, value);
}

function renderRows(
  rows: readonly OutputRow[],
  rich: boolean,
  border: "rounded" | "none",
): string {
  const first = rows[0];
  if (!first) return "";

  const keys = Object.keys(first);
  const columns: TableColumn[] = keys.map((key) => ({
    key,
    header: colorize(rich, theme.header, columnHeader(key)),
    align: columnStyle(key).align,
  }));

  const styled = rows.map((row) => {
    const out: OutputRow = {};
    for (const key of keys) {
      const value = row[key] ?? "";
      out[key] =
        key === "status"
          ? formatStatusValue(value, rich)
          : styleLines(value, rich, columnStyle(key).color);
    }
    return out;
  });

  return renderTable({ columns, rows: styled, border });
}

export function formatOutput(
  rows: readonly OutputRow[],
  format: OutputFormat,
  options: FormatOptions = {},
): string {
  const selected = selectColumns(rows, options.columns);
  const rich = options.color ?? isRich();

  switch (format) {
    case "json":
      return `${JSON.stringify(selected, null, 2)}\n`;
    case "yaml":
      return YAML.stringify(selected);
    case "toml":
      return `${stringifyToml({ [TOML_ROOT_KEY]: selected }).replace(/\n+$/, "")}\n`;
    case "table": {
      const table = renderRows(selected, rich, "rounded");
      if (!options.title) return table;
      return `${colorize(rich, theme.title, options.title)}\n${table}`;
    }
    case "panel":
      return renderPanel(
        colorize(rich, theme.strong, PANEL_TITLE),
        renderRows(selected, rich, "none"),
      );
  }
}
