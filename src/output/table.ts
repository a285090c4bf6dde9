import { visibleWidth } from "./ansi";

export type Align = "left" | "right" | "center";

export type TableColumn = {
  key: string;
  header: string;
  align?: Align;
};

export type RenderTableOptions = {
  columns: TableColumn[];
  // Cell values may span several lines separated by "\n".
  rows: Array<Record<string, string>>;
  padding?: number;
  border?: "rounded" | "none";
};

const ROUNDED = {
  tl: "╭",
  tr: "╮",
  bl: "╰",
  br: "╯",
  h: "─",
  v: "│",
  t: "┬",
  ml: "├",
  m: "┼",
  mr: "┤",
  b: "┴",
};

function repeat(ch: string, n: number): string {
  if (n <= 0) return "";
  return ch.repeat(n);
}

export function padCell(text: string, width: number, align: Align): string {
  const w = visibleWidth(text);
  if (w >= width) return text;
  const pad = width - w;
  if (align === "right") return `${repeat(" ", pad)}${text}`;
  if (align === "center") {
    const left = Math.floor(pad / 2);
    const right = pad - left;
    return `${repeat(" ", left)}${text}${repeat(" ", right)}`;
  }
  return `${text}${repeat(" ", pad)}`;
}

function cellLines(value: string): string[] {
  return value.split("\n");
}

export function renderTable(opts: RenderTableOptions): string {
  const { columns, rows } = opts;
  if (columns.length === 0) return "";

  const padding = Math.max(0, opts.padding ?? 1);
  const border = opts.border ?? "rounded";

  const widths = columns.map((c) => {
    const cellW = Math.max(
      0,
      ...rows.flatMap((r) => cellLines(r[c.key] ?? "").map((line) => visibleWidth(line))),
    );
    return Math.max(visibleWidth(c.header), cellW);
  });

  const padStr = repeat(" ", padding);

  const renderRow = (cells: string[]) => {
    const wrapped = cells.map(cellLines);
    const height = Math.max(...wrapped.map((lines) => lines.length));
    const out: string[] = [];
    for (let li = 0; li < height; li += 1) {
      const parts = wrapped.map((lines, i) => {
        const aligned = padCell(lines[li] ?? "", widths[i] ?? 0, columns[i]?.align ?? "left");
        return `${padStr}${aligned}${padStr}`;
      });
      if (border === "none") {
        out.push(parts.join("").trimEnd());
      } else {
        out.push(`${ROUNDED.v}${parts.join(ROUNDED.v)}${ROUNDED.v}`);
      }
    }
    return out;
  };

  const header = renderRow(columns.map((c) => c.header));
  const body = rows.flatMap((row) => renderRow(columns.map((c) => row[c.key] ?? "")));

  if (border === "none") {
    return `${[...header, ...body].join("\n")}\n`;
  }

  const hLine = (left: string, mid: string, right: string) =>
    `${left}${widths.map((w) => repeat(ROUNDED.h, w + padding * 2)).join(mid)}${right}`;

  const lines = [
    hLine(ROUNDED.tl, ROUNDED.t, ROUNDED.tr),
    ...header,
    hLine(ROUNDED.ml, ROUNDED.m, ROUNDED.mr),
    ...body,
    hLine(ROUNDED.bl, ROUNDED.b, ROUNDED.br),
  ];
  return `${lines.join("\n")}\n`;
}

// Frame `body` in a rounded box with `title` set into the top edge.
export function renderPanel(title: string, body: string): string {
  const lines = body.replace(/\n+$/, "").split("\n");
  const titleWidth = visibleWidth(title);
  const inner = Math.max(titleWidth + 2, ...lines.map((line) => visibleWidth(line)));

  const top = `${ROUNDED.tl}${ROUNDED.h} ${title} ${repeat(ROUNDED.h, inner - titleWidth - 1)}${ROUNDED.tr}`;
  const middle = lines.map((line) => `${ROUNDED.v} ${padCell(line, inner, "left")} ${ROUNDED.v}`);
  const bottom = `${ROUNDED.bl}${repeat(ROUNDED.h, inner + 2)}${ROUNDED.br}`;
  return `${[top, ...middle, bottom].join("\n")}\n`;
}
