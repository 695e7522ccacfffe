import { extname } from "node:path";
import { SUPPORTED_EXTENSIONS } from "../types/files";
import { MarkItDownConverter } from "./markitdown";
import { TextConverter } from "./text";
import type { ConversionResult, DocumentConverter } from "./types";

export { MarkItDownConverter } from "./markitdown";
export { TextConverter, stripNul } from "./text";
export type { ConversionResult, DocumentConverter } from "./types";

const TEXT_EXTENSIONS: ReadonlySet<string> = new Set(SUPPORTED_EXTENSIONS.text);

/**
 * Default backend: text and markdown files are read as-is, everything else
 * goes through markitdown-ts
 */
export class DefaultConverter implements DocumentConverter {
  constructor(
    private readonly text: DocumentConverter = new TextConverter(),
    private readonly documents: DocumentConverter = new MarkItDownConverter(),
  ) {}

  convert(filePath: string): Promise<ConversionResult> {
    const ext = extname(filePath).toLowerCase();
    return TEXT_EXTENSIONS.has(ext)
      ? this.text.convert(filePath)
      : this.documents.convert(filePath);
  }
}
