import { extname } from 'path';
import { PDFParse } from 'pdf-parse';
import mammoth from 'mammoth';
import { ValidationError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export interface ExtractedDocument {
  text: string;
  mimeType: string;
  extension: string;
  pages?: number;
}

export const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

// Extension decides the type; browsers often send application/octet-stream.
const MIME_BY_EXTENSION: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.docx': DOCX_MIME,
  '.txt': 'text/plain',
  '.md': 'text/markdown',
};

export const SUPPORTED_EXTENSIONS = Object.keys(MIME_BY_EXTENSION);

const MAX_TEXT_LENGTH = 200_000;

export function resolveMimeType(fileName: string): string {
  const mimeType = MIME_BY_EXTENSION[extname(fileName).toLowerCase()];
  if (!mimeType) {
    throw new ValidationError(
      `Unsupported file type: ${fileName} (expected one of ${SUPPORTED_EXTENSIONS.join(', ')})`,
    );
  }
  return mimeType;
}

export class DocumentExtractor {
  async extract(buffer: Buffer, fileName: string): Promise<ExtractedDocument> {
    const mimeType = resolveMimeType(fileName);
    const extension = extname(fileName).toLowerCase();

    logger.debug({ fileName, mimeType, sizeBytes: buffer.length }, 'Extracting document text');

    try {
      switch (mimeType) {
        case 'application/pdf':
          return { ...(await this.extractPdf(buffer)), mimeType, extension };
        case DOCX_MIME:
          return { text: truncateText((await mammoth.extractRawText({ buffer })).value), mimeType, extension };
        default:
          return { text: truncateText(buffer.toString('utf-8')), mimeType, extension };
      }
    } catch (error) {
      logger.warn({ fileName, mimeType, error: errorMessage(error) }, 'Text extraction failed');
      throw new ValidationError(`Could not read ${fileName}: ${errorMessage(error)}`);
    }
  }

  private async extractPdf(buffer: Buffer): Promise<{ text: string; pages: number }> {
    const parser = new PDFParse({ data: new Uint8Array(buffer) });
    try {
      const result = await parser.getText();
      return { text: truncateText(result.text), pages: result.total };
    } finally {
      await parser.destroy();
    }
  }
}

function truncateText(text: string): string {
  if (text.length <= MAX_TEXT_LENGTH) return text;
  return text.slice(0, MAX_TEXT_LENGTH) + '\n\n[...truncated]';
}
