import { extname, join, relative, sep } from "node:path";

/**
 * Map a source file to its markdown output path
 * Mirrors the path relative to the source root under the processed root and
 * swaps the extension for `.md`.
 *
 * @example
 * mapOutputPath("/docs/source", "/docs/processed", "/docs/source/sub/b.pdf")
 * // → "/docs/processed/sub/b.md"
 */
export function mapOutputPath(
  sourceDir: string,
  processedDir: string,
  sourcePath: string,
): string {
  const relativePath = relative(sourceDir, sourcePath);
  const ext = extname(relativePath);
  const stem = ext ? relativePath.slice(0, -ext.length) : relativePath;
  return join(processedDir, `${stem}.md`);
}

/**
 * Relative path with forward slashes, for log lines and reports
 */
export function toPosixRelative(from: string, to: string): string {
  return relative(from, to).split(sep).join("/");
}
