import { readFile } from "fs/promises";
import { ConversionError, errorMessage } from "../utils/errors";
import type { ConversionResult, DocumentConverter } from "./types";

/**
 * Remove NUL characters, which some exporters leave behind
 */
export function stripNul(content: string): string {
  return content.replaceAll("\u0000", "");
}

/**
 * Reads plain text and markdown files as UTF-8, unchanged apart from NUL
 * removal
 */
export class TextConverter implements DocumentConverter {
  async convert(filePath: string): Promise<ConversionResult> {
    try {
      const content = await readFile(filePath, "utf-8");
      return { ok: true, markdown: stripNul(content) };
    } catch (error) {
      return {
        ok: false,
        error: new ConversionError(filePath, errorMessage(error), {
          cause: error,
        }),
      };
    }
  }
}
