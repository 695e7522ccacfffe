import { describe, expect, it } from "vitest";
import { DefaultConverter } from "./index";
import type { ConversionResult, DocumentConverter } from "./types";

class RecordingConverter implements DocumentConverter {
  readonly calls: string[] = [];

  constructor(private readonly label: string) {}

  async convert(filePath: string): Promise<ConversionResult> {
    this.calls.push(filePath);
    return { ok: true, markdown: this.label };
  }
}

describe("DefaultConverter", () => {
  it("reads text and markdown files directly", async () => {
    const text = new RecordingConverter("text");
    const documents = new RecordingConverter("documents");
    const converter = new DefaultConverter(text, documents);

    await converter.convert("/src/a.txt");
    await converter.convert("/src/b.MD");
    await converter.convert("/src/c.markdown");

    expect(text.calls).toEqual(["/src/a.txt", "/src/b.MD", "/src/c.markdown"]);
    expect(documents.calls).toEqual([]);
  });

  it("sends office and pdf files to the document backend", async () => {
    const text = new RecordingConverter("text");
    const documents = new RecordingConverter("documents");
    const converter = new DefaultConverter(text, documents);

    const result = await converter.convert("/src/deck.PPTX");
    await converter.convert("/src/report.pdf");
    await converter.convert("/src/letter.docx");

    expect(result).toEqual({ ok: true, markdown: "documents" });
    expect(documents.calls).toEqual([
      "/src/deck.PPTX",
      "/src/report.pdf",
      "/src/letter.docx",
    ]);
    expect(text.calls).toEqual([]);
  });
});
