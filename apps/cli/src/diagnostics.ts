import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@multireceiver/resolver";

export type SourceReader = (path: string) => string | undefined;

/** Names the scenario entry a span covers, e.g. `declarations[2]`. */
export type EntryLabeller = (span: SourceSpan) => string | undefined;

export interface CliDiagnosticOptions {
  color?: boolean;
  /** Defaults to reading the span's file from disk. */
  readSource?: SourceReader;
  entryLabel?: EntryLabeller;
}

interface Excerpt {
  path: string;
  line: number;
  column: number;
  lineText: string;
  /** Highlighted columns, clipped to the first line of the span. */
  width: number;
}

const readFromDisk: SourceReader = (path) => {
  try {
    return readFileSync(path, "utf8");
  } catch {
    return undefined;
  }
};

const absolute = (file: string): string => (isAbsolute(file) ? file : resolve(file));

const excerptOf = (span: SourceSpan, readSource: SourceReader): Excerpt | undefined => {
  const path = absolute(span.file);
  const source = readSource(path);
  if (source === undefined) {
    return undefined;
  }

  const start = Math.min(Math.max(span.start, 0), source.length);
  const end = Math.min(Math.max(span.end, start), source.length);
  const lineStart = source.lastIndexOf("\n", start - 1) + 1;
  const newline = source.indexOf("\n", start);
  const lineEnd = newline < 0 ? source.length : newline;

  return {
    path,
    line: source.slice(0, start).split("\n").length,
    column: start - lineStart,
    lineText: source.slice(lineStart, lineEnd),
    width: Math.max(1, Math.min(end, lineEnd) - start),
  };
};

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  dim: "\u001B[2m",
  red: "\u001B[31m",
  yellow: "\u001B[33m",
  magenta: "\u001B[35m",
  cyan: "\u001B[36m",
} as const;

const severityColor: Record<DiagnosticSeverity, string> = {
  error: ANSI.red,
  warning: ANSI.yellow,
  note: ANSI.cyan,
};

interface Palette {
  severity(severity: DiagnosticSeverity, text: string): string;
  emphasis(text: string): string;
  code(text: string): string;
  muted(text: string): string;
}

const paint = (code: string, text: string) => `${code}${text}${ANSI.reset}`;

const plain: Palette = {
  severity: (_severity, text) => text,
  emphasis: (text) => text,
  code: (text) => text,
  muted: (text) => text,
};

const ansi: Palette = {
  severity: (severity, text) => paint(severityColor[severity], text),
  emphasis: (text) => paint(ANSI.bold, text),
  code: (text) => paint(ANSI.magenta, text),
  muted: (text) => paint(ANSI.dim, text),
};

const formatExcerpt = (
  diagnostic: Diagnostic,
  excerpt: Excerpt,
  palette: Palette,
  entry: string | undefined
): string => {
  const gutter = `${excerpt.line}`;
  const blank = " ".repeat(gutter.length);
  const marker = palette.severity(diagnostic.severity, "^".repeat(excerpt.width));

  return [
    entry ? `${blank} | ${palette.muted(entry)}` : `${blank} |`,
    `${gutter} | ${excerpt.lineText}`,
    `${blank} | ${" ".repeat(excerpt.column)}${marker} ${palette.muted(diagnostic.message)}`,
  ].join("\n");
};

const formatHeader = (
  diagnostic: Diagnostic,
  excerpt: Excerpt | undefined,
  palette: Palette
): string => {
  const { span } = diagnostic;
  const location = excerpt
    ? `${excerpt.path}:${excerpt.line}:${excerpt.column + 1}`
    : `${absolute(span.file)}:${span.start}-${span.end}`;
  const severity = palette.emphasis(
    palette.severity(diagnostic.severity, diagnostic.severity.toUpperCase())
  );
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  return `${location} ${severity}${phase} ${palette.code(diagnostic.code)}: ${diagnostic.message}`;
};

/**
 * Renders a diagnostic for a terminal: location header, the offending line
 * with the scenario entry it belongs to, hints, then related notes indented
 * beneath.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: CliDiagnosticOptions = {}
): string => {
  const palette = (options.color ?? true) ? ansi : plain;
  const excerpt = excerptOf(diagnostic.span, options.readSource ?? readFromDisk);
  const lines = [formatHeader(diagnostic, excerpt, palette)];

  if (excerpt?.lineText) {
    lines.push(
      formatExcerpt(diagnostic, excerpt, palette, options.entryLabel?.(diagnostic.span))
    );
  }
  (diagnostic.hints ?? []).forEach((hint) => lines.push(`= help: ${hint.message}`));
  (diagnostic.related ?? []).forEach((note) =>
    lines.push(
      formatCliDiagnostic(note, options)
        .split("\n")
        .map((line) => `  ${line}`)
        .join("\n")
    )
  );

  return lines.join("\n");
};
