import { describe, expect, it } from 'vitest';
import { DocumentExtractor, resolveMimeType } from './document-extractor.js';
import { ValidationError } from './errors.js';

describe('resolveMimeType', () => {
  it('maps known extensions case-insensitively', () => {
    expect(resolveMimeType('paper.PDF')).toBe('application/pdf');
    expect(resolveMimeType('notes.md')).toBe('text/markdown');
    expect(resolveMimeType('letter.docx')).toBe('application/vnd.openxmlformats-officedocument.wordprocessingml.document');
  });

  it('rejects other files', () => {
    expect(() => resolveMimeType('slides.pptx')).toThrow(ValidationError);
    expect(() => resolveMimeType('README')).toThrow('Unsupported file type: README (expected one of .pdf, .docx, .txt, .md)');
  });
});

describe('DocumentExtractor', () => {
  const extractor = new DocumentExtractor();

  it('reads plain text as utf-8', async () => {
    const doc = await extractor.extract(Buffer.from('Grüße aus dem Labor', 'utf-8'), 'greeting.txt');

    expect(doc).toEqual({ text: 'Grüße aus dem Labor', mimeType: 'text/plain', extension: '.txt' });
  });

  it('reports unreadable documents as validation errors', async () => {
    await expect(extractor.extract(Buffer.from('not a zip archive'), 'broken.docx'))
      .rejects.toBeInstanceOf(ValidationError);
  });
});
