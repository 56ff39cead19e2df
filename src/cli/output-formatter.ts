/**
 * Output Formatter - Pretty CLI output with colors using chalk
 */

import chalk from "chalk";

export type MessageLevel = "info" | "success" | "warning" | "error" | "debug";

export interface TableColumn {
  key: string;
  header: string;
  width?: number;
  align?: "left" | "right";
}

/**
 * Output formatter for consistent CLI output
 */
export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly noColor: boolean;

  constructor(options: { quiet?: boolean; noColor?: boolean } = {}) {
    this.quiet = options.quiet ?? false;
    this.noColor = options.noColor ?? !process.stdout.isTTY;
  }

  /**
   * Print a message with appropriate styling. Errors go to stderr and are
   * never silenced.
   */
  print(message: string, level: MessageLevel = "info"): void {
    if (this.quiet && level !== "error") return;

    const styled = this.noColor ? message : this.styleMessage(message, level);
    const stream = level === "error" ? process.stderr : process.stdout;
    stream.write(styled + "\n");
  }

  success(message: string): void {
    this.print(message, "success");
  }

  info(message: string): void {
    this.print(message, "info");
  }

  warn(message: string): void {
    this.print(message, "warning");
  }

  error(message: string): void {
    this.print(message, "error");
  }

  /**
   * Plain text to stdout, unstyled and never silenced
   */
  raw(text: string): void {
    process.stdout.write(text.endsWith("\n") ? text : text + "\n");
  }

  header(title: string): void {
    if (this.quiet) return;
    const styled = this.noColor
      ? `\n${title}\n${"=".repeat(title.length)}`
      : `\n${chalk.bold.cyan(title)}\n${chalk.dim("=".repeat(title.length))}`;
    console.log(styled);
  }

  keyValue(key: string, value: string | number | boolean): void {
    if (this.quiet) return;
    const formattedKey = this.noColor ? `  ${key}:` : chalk.dim(`  ${key}:`);
    const formattedValue = this.noColor ? ` ${value}` : ` ${chalk.white(String(value))}`;
    console.log(formattedKey + formattedValue);
  }

  listItem(item: string, indent = 0): void {
    if (this.quiet) return;
    const prefix = "  ".repeat(indent) + "• ";
    const styled = this.noColor ? `${prefix}${item}` : `${chalk.dim(prefix)}${item}`;
    console.log(styled);
  }

  /**
   * Print a simple table
   */
  table(data: Array<Record<string, string | number>>, columns: TableColumn[]): void {
    if (this.quiet || data.length === 0) return;

    const widths = columns.map((col) => {
      const maxDataWidth = Math.max(...data.map((row) => String(row[col.key] ?? "").length));
      return col.width ?? Math.max(col.header.length, maxDataWidth);
    });

    const headerRow = columns.map((col, i) => padCell(col.header, widths[i] ?? 0, col.align ?? "left")).join("  ");
    const separator = widths.map((w) => "-".repeat(w)).join("  ");

    if (this.noColor) {
      console.log(headerRow);
      console.log(separator);
    } else {
      console.log(chalk.bold(headerRow));
      console.log(chalk.dim(separator));
    }

    for (const row of data) {
      console.log(columns.map((col, i) => padCell(String(row[col.key] ?? ""), widths[i] ?? 0, col.align ?? "left")).join("  "));
    }
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  newline(): void {
    if (this.quiet) return;
    console.log();
  }

  private styleMessage(message: string, level: MessageLevel): string {
    switch (level) {
      case "success":
        return chalk.green("✓ ") + message;
      case "warning":
        return chalk.yellow("⚠ ") + message;
      case "error":
        return chalk.red("✗ ") + message;
      case "debug":
        return chalk.dim("› ") + chalk.dim(message);
      default:
        return chalk.blue("ℹ ") + message;
    }
  }
}

function padCell(value: string, width: number, align: "left" | "right"): string {
  if (value.length >= width) return value.slice(0, width);
  return align === "right" ? value.padStart(width) : value.padEnd(width);
}
