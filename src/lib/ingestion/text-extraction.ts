import { extname } from 'node:path';
import fs from 'fs-extra';

const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.markdown', '.html', '.htm']);

export function isSupportedExtractionExtension(filePath: string): boolean {
  const extension = extname(filePath).toLowerCase();
  return TEXT_EXTENSIONS.has(extension) || extension === '.pdf';
}

async function extractPdfText(filePath: string): Promise<string> {
  const { PDFParse } = await import('pdf-parse');
  const buffer = await fs.readFile(filePath);
  const parser = new PDFParse({ data: buffer });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

export async function extractTextFromFile(filePath: string): Promise<string> {
  const extension = extname(filePath).toLowerCase();

  if (TEXT_EXTENSIONS.has(extension)) {
    return fs.readFile(filePath, 'utf8');
  }

  if (extension === '.pdf') {
    return extractPdfText(filePath);
  }

  throw new Error(`Unsupported file extension for extraction: ${extension || 'none'}`);
}
