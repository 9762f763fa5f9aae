import { describe, it, expect, vi } from 'vitest';
import pdfParse from 'pdf-parse';
import * as mammoth from 'mammoth';
import { detectFileKind, MAX_TEXT_LENGTH, parseFile } from '../../src/utils/textParser';
import type { UploadedFile } from '../../src/utils/textParser';

vi.mock('pdf-parse', () => ({
  default: vi.fn(async () => ({ text: 'Experienced platform engineer.\n\n'.repeat(5) }))
}));

vi.mock('mammoth', () => ({
  extractRawText: vi.fn(async () => ({ value: 'Product designer   with research background. '.repeat(4), messages: [] }))
}));

const LONG_TEXT = 'Senior data engineer building streaming pipelines with Kafka and Flink.';

function file(originalname: string, mimetype: string, content = ''): UploadedFile {
  return { originalname, mimetype, buffer: Buffer.from(content, 'utf-8') };
}

describe('detectFileKind', () => {
  it('recognises files by mime type or extension', () => {
    expect(detectFileKind(file('cv.pdf', 'application/octet-stream'))).toBe('pdf');
    expect(detectFileKind(file('cv', 'application/vnd.openxmlformats-officedocument.wordprocessingml.document'))).toBe('docx');
    expect(detectFileKind(file('CV.TXT', 'application/octet-stream'))).toBe('txt');
    expect(detectFileKind(file('cv.png', 'image/png'))).toBeNull();
  });
});

describe('parseFile', () => {
  it('reads plain text and collapses whitespace', async () => {
    const text = await parseFile(file('cv.txt', 'text/plain', `${LONG_TEXT}\n\n\t${LONG_TEXT}  `));

    expect(text).toBe(`${LONG_TEXT} ${LONG_TEXT}`);
  });

  it('extracts PDF text', async () => {
    const text = await parseFile(file('cv.pdf', 'application/pdf', '%PDF-1.4'));

    expect(text).toBe(Array(5).fill('Experienced platform engineer.').join(' '));
    expect(pdfParse).toHaveBeenCalledTimes(1);
  });

  it('extracts DOCX text', async () => {
    const text = await parseFile(file('cv.docx', 'application/octet-stream', 'PK'));

    expect(text).toBe(Array(4).fill('Product designer with research background.').join(' '));
    expect(mammoth.extractRawText).toHaveBeenCalledTimes(1);
  });

  it('rejects unsupported formats with 415', async () => {
    await expect(parseFile(file('cv.png', 'image/png', LONG_TEXT))).rejects.toMatchObject({
      statusCode: 415,
      message: 'Unsupported file type: image/png'
    });
  });

  it('rejects text that is too short to analyse', async () => {
    await expect(parseFile(file('cv.txt', 'text/plain', 'Too short'))).rejects.toMatchObject({
      statusCode: 422,
      message: 'Extracted text too short (less than 100 characters)'
    });
  });

  it('reports an unreadable document as 422', async () => {
    vi.mocked(pdfParse).mockRejectedValueOnce(new Error('Invalid PDF structure'));

    await expect(parseFile(file('cv.pdf', 'application/pdf', 'garbage'))).rejects.toMatchObject({
      statusCode: 422,
      message: 'Could not extract text from file'
    });
  });

  it('truncates very long documents', async () => {
    const text = await parseFile(file('cv.txt', 'text/plain', 'a'.repeat(MAX_TEXT_LENGTH + 500)));

    expect(text).toHaveLength(MAX_TEXT_LENGTH);
  });
});
