import type { ConversionError } from "../utils/errors";

/**
 * Result of converting a document to markdown
 */
export type ConversionResult =
  | {
      ok: true;
      /** The converted markdown content */
      markdown: string;
    }
  | { ok: false; error: ConversionError };

/**
 * Document-to-markdown capability
 * Any backend with this shape can replace the default one.
 */
export interface DocumentConverter {
  convert(filePath: string): Promise<ConversionResult>;
}
