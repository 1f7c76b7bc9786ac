import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ExtractionFailedError } from "./errors";
import { ExtractorRegistry, PdfTextExtractor, defaultExtractor } from "./extractor";

const pdf = vi.hoisted(() => ({
  getText: vi.fn<() => Promise<{ text: string; pages: Array<{ text: string; num: number }> }>>(),
  destroy: vi.fn<() => Promise<void>>(),
}));

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    public getText() {
      return pdf.getText();
    }
    public destroy() {
      return pdf.destroy();
    }
  },
}));

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  pdf.destroy.mockResolvedValue(undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  pdf.getText.mockReset();
  pdf.destroy.mockReset();
});

describe("PdfTextExtractor", () => {
  it("returns the parsed text and releases the parser", async () => {
    pdf.getText.mockResolvedValue({ text: "Page one\nPage two", pages: [{ text: "Page one", num: 1 }, { text: "Page two", num: 2 }] });
    const text = await new PdfTextExtractor().extract(Buffer.from("%PDF-1.4"), "pdf");
    expect(text).toBe("Page one\nPage two");
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it("wraps parser failures in ExtractionFailedError", async () => {
    pdf.getText.mockRejectedValue(new Error("Invalid PDF structure"));
    const err = await new PdfTextExtractor().extract(Buffer.from("junk"), "pdf").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExtractionFailedError);
    expect(err).toMatchObject({ message: "PDF could not be parsed: Invalid PDF structure" });
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it("refuses other file types", async () => {
    await expect(new PdfTextExtractor().extract(Buffer.from(""), "epub")).rejects.toBeInstanceOf(ExtractionFailedError);
    expect(pdf.getText).not.toHaveBeenCalled();
  });
});

describe("ExtractorRegistry", () => {
  it("dispatches by file type", async () => {
    const notebook = { extract: vi.fn(async () => "handwriting") };
    const registry = new ExtractorRegistry().register("notebook", notebook);
    await expect(registry.extract(Buffer.from("x"), "notebook")).resolves.toBe("handwriting");
    expect(notebook.extract).toHaveBeenCalledTimes(1);
  });

  it("fails for types with no decoder", async () => {
    const registry = defaultExtractor();
    await expect(registry.extract(Buffer.from("x"), "epub")).rejects.toThrow(
      "No text decoder is installed for epub documents.",
    );
  });
});
