/**
 * FILE PURPOSE: Turn uploaded or fetched bytes into plain text
 *
 * WHY: Checks accept documents, and the crawler meets more than HTML. The
 *      engine only ever consumes normalized text, so every format funnels
 *      through here.
 *
 * HOW: Plain text is decoded directly (UTF-8, Latin-1 when the bytes are not
 *      valid UTF-8). CSV via Papa Parse, spreadsheets via SheetJS, HTML via
 *      the main-content extractor. PDF and Word formats go to the
 *      Unstructured.io API when a key is configured. Results are typed so
 *      callers can tell "no text" from "cannot parse" from "service down".
 */

import { extractMainText } from '../crawl/html-extract.js';
import type { FetchFn } from '../crawl/fetcher.js';

export type DocumentFormat = 'text' | 'csv' | 'spreadsheet' | 'html' | 'pdf' | 'docx' | 'doc';

export type ExtractFailureReason = 'unsupported-format' | 'empty' | 'parse-failed' | 'unavailable';

export type ExtractResult =
  | { ok: true; text: string; format: DocumentFormat; pageCount?: number }
  | { ok: false; reason: ExtractFailureReason; message: string; format?: DocumentFormat };

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  txt: 'text',
  text: 'text',
  md: 'text',
  markdown: 'text',
  csv: 'csv',
  xlsx: 'spreadsheet',
  xls: 'spreadsheet',
  html: 'html',
  htm: 'html',
  pdf: 'pdf',
  docx: 'docx',
  doc: 'doc',
};

const CONTENT_TYPE_FORMATS: Record<string, DocumentFormat> = {
  'text/plain': 'text',
  'text/markdown': 'text',
  'text/csv': 'csv',
  'text/html': 'html',
  'application/xhtml+xml': 'html',
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'application/msword': 'doc',
  'application/vnd.ms-excel': 'spreadsheet',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'spreadsheet',
};

const UPLOAD_MIME: Record<'pdf' | 'docx' | 'doc', string> = {
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  doc: 'application/msword',
};

export function formatFromFilename(filename: string): DocumentFormat | null {
  const dot = filename.lastIndexOf('.');
  if (dot < 0 || dot === filename.length - 1) return null;
  return EXTENSION_FORMATS[filename.slice(dot + 1).toLowerCase()] ?? null;
}

/** Format for a Content-Type header value, parameters ignored. */
export function formatFromContentType(contentType: string): DocumentFormat | null {
  const base = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return CONTENT_TYPE_FORMATS[base] ?? null;
}

/** UTF-8 when valid, Latin-1 otherwise. A leading BOM is dropped. */
export function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
  }
}

export interface DocumentExtractorOptions {
  unstructuredApiUrl?: string;
  unstructuredApiKey?: string;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

const DEFAULT_UNSTRUCTURED_URL = 'https://api.unstructured.io/general/v0/general';

export class DocumentExtractor {
  private readonly apiUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: DocumentExtractorOptions = {}) {
    this.apiUrl = options.unstructuredApiUrl || DEFAULT_UNSTRUCTURED_URL;
    this.apiKey = options.unstructuredApiKey || undefined;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** Extract by file name extension. */
  async extract(filename: string, bytes: Uint8Array): Promise<ExtractResult> {
    const format = formatFromFilename(filename);
    if (!format) {
      return { ok: false, reason: 'unsupported-format', message: `Unsupported file type: ${filename}` };
    }
    return this.extractFormat(format, bytes, filename);
  }

  async extractFormat(format: DocumentFormat, bytes: Uint8Array, filename = `document.${format}`): Promise<ExtractResult> {
    if (bytes.length === 0) {
      return { ok: false, reason: 'empty', message: 'Document is empty', format };
    }

    let result: ExtractResult;
    try {
      switch (format) {
        case 'text':
          result = { ok: true, text: decodeText(bytes), format };
          break;
        case 'html':
          result = { ok: true, text: extractMainText(decodeText(bytes)).text, format };
          break;
        case 'csv':
          result = { ok: true, text: await this.parseCsv(bytes), format };
          break;
        case 'spreadsheet':
          result = { ok: true, text: await this.parseSpreadsheet(bytes), format };
          break;
        case 'pdf':
        case 'docx':
        case 'doc':
          result = await this.parseWithUnstructured(format, bytes, filename);
          break;
      }
    } catch (err) {
      process.stderr.write(`WARN: ${format} extraction failed for ${filename}: ${err}\n`);
      return { ok: false, reason: 'parse-failed', message: String(err), format };
    }

    if (result.ok && result.text.trim().length === 0) {
      return { ok: false, reason: 'empty', message: `No text found in ${filename}`, format };
    }
    return result;
  }

  private async parseCsv(bytes: Uint8Array): Promise<string> {
    const Papa = await import('papaparse');
    const parse = Papa.default?.parse ?? Papa.parse;
    const parsed = parse<string[]>(decodeText(bytes), { skipEmptyLines: true });
    if (parsed.errors.length > 0 && parsed.data.length === 0) {
      throw new Error(parsed.errors[0]?.message ?? 'CSV parse failed');
    }
    return parsed.data.map((row) => row.join(' ')).join('\n');
  }

  private async parseSpreadsheet(bytes: Uint8Array): Promise<string> {
    const XLSX = await import('xlsx');
    const read = XLSX.default?.read ?? XLSX.read;
    const utils = XLSX.default?.utils ?? XLSX.utils;

    const workbook = read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength), { type: 'buffer' });
    const lines: string[] = [];
    for (const sheetName of workbook.SheetNames) {
      const sheet = workbook.Sheets[sheetName];
      if (!sheet) continue;
      const rows = utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: '' });
      for (const row of rows) {
        const cells = row.map((cell) => String(cell ?? '')).filter((cell) => cell.length > 0);
        if (cells.length > 0) lines.push(cells.join(' '));
      }
    }
    return lines.join('\n');
  }

  private async parseWithUnstructured(
    format: 'pdf' | 'docx' | 'doc',
    bytes: Uint8Array,
    filename: string,
  ): Promise<ExtractResult> {
    if (!this.apiKey) {
      process.stderr.write('WARN: UNSTRUCTURED_API_KEY not set; binary document parsing unavailable\n');
      return { ok: false, reason: 'unavailable', message: `No extraction service configured for ${format}`, format };
    }

    const formData = new FormData();
    formData.append('files', new Blob([new Uint8Array(bytes)], { type: UPLOAD_MIME[format] }), filename);

    let response: Response;
    try {
      response = await this.fetchImpl(this.apiUrl, {
        method: 'POST',
        headers: { 'unstructured-api-key': this.apiKey },
        body: formData,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      // Timeouts and connection failures are transient, not a verdict on the file.
      process.stderr.write(`WARN: Unstructured API unreachable: ${err}\n`);
      return { ok: false, reason: 'unavailable', message: `Extraction service unreachable: ${err}`, format };
    }

    if (!response.ok) {
      process.stderr.write(`WARN: Unstructured API returned ${response.status}\n`);
      return { ok: false, reason: 'unavailable', message: `Extraction service returned ${response.status}`, format };
    }

    const elements = await response.json() as Array<{ text?: string; metadata?: { page_number?: unknown } }>;
    const text = elements.map((el) => el.text ?? '').filter(Boolean).join('\n\n');
    const pageNumbers = elements
      .map((el) => el.metadata?.page_number)
      .filter((p): p is number => typeof p === 'number');
    const pageCount = pageNumbers.length > 0 ? Math.max(...pageNumbers) : undefined;

    return pageCount === undefined
      ? { ok: true, text, format }
      : { ok: true, text, format, pageCount };
  }
}
