import { readFile } from "fs/promises";
import { extname } from "node:path";
import { MarkItDown } from "markitdown-ts";
import { ConversionError, errorMessage } from "../utils/errors";
import { stripNul } from "./text";
import type { ConversionResult, DocumentConverter } from "./types";

/**
 * Office and PDF documents through markitdown-ts
 */
export class MarkItDownConverter implements DocumentConverter {
  private readonly markitdown = new MarkItDown();

  async convert(filePath: string): Promise<ConversionResult> {
    const ext = extname(filePath).toLowerCase();

    try {
      const buffer = await readFile(filePath);
      const result = await this.markitdown.convertBuffer(buffer, {
        file_extension: ext,
      });

      if (!result) {
        return {
          ok: false,
          error: new ConversionError(filePath, "no result returned"),
        };
      }

      return {
        ok: true,
        markdown: stripNul(result.text_content),
      };
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
