/**
 * Content collaborators: text extraction and page rendering.
 *
 * The cache layer only ever sees the {@link Extractor} and {@link Renderer}
 * interfaces. The built-in extractor reads PDF text with pdf-parse; notebooks
 * and EPUBs need an external decoder plugged in through the context.
 */

import { PDFParse } from "pdf-parse";
import { ExtractionFailedError } from "./errors";
import type { FileType } from "./types";

export interface Extractor {
  /**
   * Full text of a document. Either succeeds completely or throws
   * {@link ExtractionFailedError}; never returns partial text.
   */
  extract(bytes: Buffer, fileType: FileType, signal?: AbortSignal): Promise<string>;
}

export interface Renderer {
  /** Image bytes for one page (0-based) drawn over `background` (CSS colour). */
  render(bytes: Buffer, pageIndex: number, background: string, signal?: AbortSignal): Promise<Buffer>;
}

/** Extracts text from PDF bytes. */
export class PdfTextExtractor implements Extractor {
  private readonly verbose: boolean;

  public constructor(verbose = false) {
    this.verbose = verbose;
  }

  public async extract(bytes: Buffer, fileType: FileType): Promise<string> {
    if (fileType !== "pdf") {
      throw new ExtractionFailedError(`PdfTextExtractor cannot read ${fileType} content.`);
    }
    const parser = new PDFParse({ data: new Uint8Array(bytes) });
    try {
      const result = await parser.getText();
      if (this.verbose) console.error(`[PDF][verbose] Extracted ${result.pages.length} page(s)`);
      return result.text || "";
    } catch (e) {
      console.error(`[PDF] Failed to extract text:`, e);
      throw new ExtractionFailedError(
        `PDF could not be parsed: ${e instanceof Error ? e.message : String(e)}`,
        undefined,
        { cause: e },
      );
    } finally {
      await parser.destroy();
    }
  }
}

/**
 * Routes by file type. Types without a registered extractor fail with
 * {@link ExtractionFailedError}, which the cache stores as a sentinel.
 */
export class ExtractorRegistry implements Extractor {
  private readonly byType = new Map<FileType, Extractor>();

  public register(fileType: FileType, extractor: Extractor): this {
    this.byType.set(fileType, extractor);
    return this;
  }

  public extract(bytes: Buffer, fileType: FileType, signal?: AbortSignal): Promise<string> {
    const extractor = this.byType.get(fileType);
    if (!extractor) {
      return Promise.reject(new ExtractionFailedError(`No text decoder is installed for ${fileType} documents.`));
    }
    return extractor.extract(bytes, fileType, signal);
  }
}

/** Registry with the built-in PDF extractor. */
export function defaultExtractor(verbose = false): ExtractorRegistry {
  return new ExtractorRegistry().register("pdf", new PdfTextExtractor(verbose));
}
