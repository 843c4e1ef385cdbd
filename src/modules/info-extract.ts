import ExcelJS from 'exceljs';
import { z } from 'zod';
import { EXECUTION_POLICIES } from '../config/modules.js';
import { ValidationError } from '../lib/errors.js';
import { extractJsonObject } from '../lib/llm-client.js';
import {
  MAX_DOCUMENTS,
  documentAt,
  documentItemSchema,
  estimateTextTokens,
  planDocuments,
  textDocumentSchema,
  type DocumentItem,
} from './documents.js';
import type { ToolModule } from './types.js';

export const MAX_DOCUMENT_TEXT_CHARS = 20_000;
const MAX_FIELDS = 60;
const RESPONSE_TOKENS = 2048;

const fieldSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().trim().min(1).nullable().default(null),
  examples: z.array(z.string().trim().min(1)).default([]),
  allowedValues: z.array(z.string().trim().min(1)).default([]),
}).refine(
  field => field.description !== null || field.examples.length > 0 || field.allowedValues.length > 0,
  field => ({ message: `Field "${field.name}" needs a description, examples or allowed values` }),
).refine(
  field => field.examples.length === 0 || field.allowedValues.length === 0,
  field => ({ message: `Field "${field.name}" cannot have both examples and allowed values` }),
);

export type ExtractionField = z.infer<typeof fieldSchema>;

const payloadSchema = z.object({
  documents: z.array(textDocumentSchema).min(1).max(MAX_DOCUMENTS),
  fields: z.array(fieldSchema).min(1).max(MAX_FIELDS).refine(
    fields => new Set(fields.map(f => f.name)).size === fields.length,
    { message: 'Field names must be unique' },
  ),
});

export type InfoExtractPayload = z.infer<typeof payloadSchema>;

const DEFAULT_PROMPTS = {
  extraction: [
    'You extract structured information from research papers.',
    'Return a single JSON object whose keys are exactly the requested field names.',
    'Use null for a field the paper does not report. When allowed values are listed, answer with one of them.',
    'Do not add commentary outside the JSON object.',
  ].join('\n'),
};

function cellText(value: ExcelJS.CellValue): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'object' && 'richText' in value) {
    return value.richText.map(part => part.text).join('').trim() || null;
  }
  if (typeof value === 'object' && 'text' in value && typeof value.text === 'string') {
    return value.text.trim() || null;
  }
  const text = value instanceof Date ? value.toISOString() : String(value);
  return text.trim() || null;
}

function splitList(raw: string | null): string[] {
  if (!raw) return [];
  return raw.split(/[;；]/).map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Reads a field definition sheet: one column per field, with the name in row 1
 * and the description, examples and allowed values (semicolon separated) in rows 2-4.
 */
export async function parseFieldSpec(data: Buffer): Promise<ExtractionField[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(data);
  } catch (error) {
    throw new ValidationError(`Could not open the field definition workbook: ${String(error)}`);
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) throw new ValidationError('The field definition workbook has no sheets');

  const raw: unknown[] = [];
  for (let col = 1; col <= sheet.columnCount; col++) {
    const name = cellText(sheet.getCell(1, col).value);
    if (!name) continue;
    raw.push({
      name,
      description: cellText(sheet.getCell(2, col).value),
      examples: splitList(cellText(sheet.getCell(3, col).value)),
      allowedValues: splitList(cellText(sheet.getCell(4, col).value)),
    });
  }

  const parsed = z.array(fieldSchema).min(1, 'No fields found in the first row').safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(issue => issue.message).join('; '));
  }
  return parsed.data;
}

export function buildExtractionPrompt(fileName: string, fields: readonly ExtractionField[], text: string): string {
  const truncated = text.length > MAX_DOCUMENT_TEXT_CHARS;
  const lines = [`File: ${fileName}`, '', 'Extract these fields:'];

  fields.forEach((field, i) => {
    lines.push(`${i + 1}. ${field.name}`);
    if (field.description) lines.push(`   Description: ${field.description}`);
    if (field.examples.length > 0) lines.push(`   Examples: ${field.examples.join('; ')}`);
    if (field.allowedValues.length > 0) lines.push(`   Allowed values: ${field.allowedValues.join('; ')}`);
  });

  lines.push('');
  if (truncated) {
    lines.push(`Note: the text was cut to its first ${MAX_DOCUMENT_TEXT_CHARS} characters.`, '');
  }
  lines.push('Paper text:', '', truncated ? text.slice(0, MAX_DOCUMENT_TEXT_CHARS) : text);
  return lines.join('\n');
}

export function valueToCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(valueToCell).filter(s => s.length > 0).join('; ');
  return JSON.stringify(value);
}

/** Keeps only the requested fields, each flattened to a cell string. */
export function pickFields(text: string, fields: readonly ExtractionField[]): Record<string, string> {
  const json = extractJsonObject(text);
  return Object.fromEntries(fields.map(field => [field.name, valueToCell(json[field.name])]));
}

const cellsSchema = z.record(z.string());

export const infoExtractModule: ToolModule<InfoExtractPayload, DocumentItem> = {
  key: 'info-extract',
  label: 'Information extraction',
  unitLabel: 'documents',
  payloadSchema,
  itemSchema: documentItemSchema,
  defaults: {
    models: { extraction: 'claude-sonnet-4-20250514' },
    prompts: DEFAULT_PROMPTS,
  },
  rounds: [
    {
      round: 1,
      label: 'Extractions',
      policy: EXECUTION_POLICIES['info-extract'].documents,
      plan: (payload) => planDocuments(payload.documents),
      async request(ctx, item) {
        const doc = documentAt(ctx.payload.documents, item.input.document);
        return {
          model: ctx.settings.model('extraction'),
          system: ctx.settings.prompt('extraction'),
          messages: [{ role: 'user', text: buildExtractionPrompt(doc.fileName, ctx.payload.fields, doc.text) }],
          maxTokens: RESPONSE_TOKENS,
        };
      },
      parse: (text, ctx) => JSON.stringify(pickFields(text, ctx.payload.fields)),
    },
  ],
  projectedUnits: (payload) => payload.documents.length,
  estimateTokens: (payload) => payload.documents.reduce(
    (sum, doc) => sum + Math.min(estimateTextTokens(doc.text), MAX_DOCUMENT_TEXT_CHARS / 4) + RESPONSE_TOKENS,
    0,
  ),
  async assemble(ctx, completed) {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Results');

    sheet.columns = [
      { header: 'File', key: '__file', width: 32 },
      ...ctx.payload.fields.map(field => ({ header: field.name, key: field.name, width: 24 })),
    ];
    sheet.getRow(1).font = { bold: true };

    for (const item of [...completed].sort((a, b) => a.ordinal - b.ordinal)) {
      const cells = cellsSchema.parse(JSON.parse(item.text));
      sheet.addRow({ __file: item.label, ...cells });
    }

    const buffer = await workbook.xlsx.writeBuffer();
    const path = await ctx.storage.writeBuffer(ctx.moduleKey, ctx.jobId, 'results.xlsx', new Uint8Array(buffer));
    return { artifacts: { 'results.xlsx': path } };
  },
};
