import { promises as fs } from "fs";
import path from "path";
import { PDFParse } from "pdf-parse";
import { UnreadableFileError, describeError } from "../../errors.js";
import type { TextExtractor } from "./TextExtractor.js";

const PDF_SIGNATURE = "%PDF-";

export type PdfExtractorOptions = {
  // Tried when a document is encrypted
  password?: string;
};

export class PdfExtractor implements TextExtractor {
  private password?: string;

  constructor(options: PdfExtractorOptions = {}) {
    this.password = options.password;
  }

  supports(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }

  async extract(filePath: string): Promise<string[]> {
    const buffer = await this.read(filePath);

    const parser = new PDFParse({
      data: new Uint8Array(buffer),
      ...(this.password !== undefined ? { password: this.password } : {}),
    });
    try {
      const result = await parser.getText();
      return [...result.pages]
        .sort((a, b) => a.num - b.num)
        .map((page) => page.text);
    } catch (error) {
      if (isPasswordError(error)) {
        throw new UnreadableFileError(filePath, "PDF is encrypted", {
          cause: error,
        });
      }
      throw new UnreadableFileError(
        filePath,
        `could not parse PDF: ${describeError(error)}`,
        { cause: error }
      );
    } finally {
      await parser.destroy();
    }
  }

  private async read(filePath: string): Promise<Buffer> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new UnreadableFileError(
        filePath,
        `could not open file: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (buffer.length === 0) {
      throw new UnreadableFileError(filePath, "file is empty");
    }
    if (buffer.subarray(0, PDF_SIGNATURE.length).toString("latin1") !== PDF_SIGNATURE) {
      throw new UnreadableFileError(filePath, "not a PDF file");
    }
    return buffer;
  }
}

export const isPasswordError = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === "PasswordException" || /password/i.test(error.message));
