/**
 * Cloud OCR Engine (OpenAI vision)
 *
 * Submits the raw PDF bytes as a file content part and asks for a structured
 * transcription: the document's text lines in reading order, and every table
 * as positioned cells. Tables are placed into a grid by their 1-based row and
 * column indices.
 */

import fs from 'fs';
import path from 'path';
import OpenAI from 'openai';
import type { OcrEngine, TableGrid } from './types';
import { gridFromCells, type PositionedCell } from './grid';
import { config } from '../config';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';

const TRANSCRIPTION_SCHEMA = {
  name: 'document_transcription',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['lines', 'tables'],
    properties: {
      lines: {
        type: 'array',
        description: 'Every line of text in reading order, transcribed verbatim',
        items: { type: 'string' },
      },
      tables: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['page_number', 'cells'],
          properties: {
            page_number: { type: 'integer' },
            cells: {
              type: 'array',
              items: {
                type: 'object',
                additionalProperties: false,
                required: ['row_index', 'column_index', 'text'],
                properties: {
                  row_index: { type: 'integer', description: '1-based' },
                  column_index: { type: 'integer', description: '1-based' },
                  text: { type: 'string' },
                },
              },
            },
          },
        },
      },
    },
  },
} as const;

const SYSTEM_PROMPT =
  'You are a document OCR engine. Transcribe exactly what is printed. ' +
  'Do not summarize, correct, or infer missing values.';

interface VisionTable {
  page_number: number;
  cells: PositionedCell[];
}

export interface VisionTranscription {
  lines: string[];
  tables: VisionTable[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCell(value: unknown): value is PositionedCell {
  return (
    isRecord(value) &&
    typeof value.row_index === 'number' &&
    typeof value.column_index === 'number' &&
    typeof value.text === 'string'
  );
}

function isTable(value: unknown): value is VisionTable {
  return (
    isRecord(value) &&
    typeof value.page_number === 'number' &&
    Array.isArray(value.cells) &&
    value.cells.every(isCell)
  );
}

/**
 * Parse the model's JSON reply; throws when it does not match the schema.
 */
export function parseTranscription(content: string): VisionTranscription {
  const parsed: unknown = JSON.parse(content);
  if (
    !isRecord(parsed) ||
    !Array.isArray(parsed.lines) ||
    !Array.isArray(parsed.tables) ||
    !parsed.lines.every((l): l is string => typeof l === 'string') ||
    !parsed.tables.every(isTable)
  ) {
    throw new Error('OpenAI transcription did not match the expected shape');
  }
  return { lines: parsed.lines, tables: parsed.tables };
}

export interface OpenAiVisionEngineOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

export class OpenAiVisionEngine implements OcrEngine {
  readonly name = 'openai_vision';
  readonly tier = 'cloud_ocr';
  readonly description = 'PDF transcription with OpenAI vision (structured output)';
  readonly capabilities = ['text', 'table'] as const;

  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private client: OpenAI | null = null;

  constructor(options: OpenAiVisionEngineOptions = {}) {
    this.apiKey = options.apiKey ?? config.openaiApiKey;
    this.model = options.model ?? config.llmModelOcr;
    this.timeoutMs = options.timeoutMs ?? config.llmRequestTimeoutMs;
  }

  isAvailable(): boolean {
    return this.apiKey !== '';
  }

  async extractText(filePath: string): Promise<string> {
    const transcription = await this.transcribe(
      filePath,
      'Transcribe every line of text in this document. Leave tables empty.'
    );
    return transcription.lines.join('\n');
  }

  async extractTable(filePath: string, pageIndex: number): Promise<TableGrid> {
    const pageNumber = pageIndex + 1;
    const transcription = await this.transcribe(
      filePath,
      `Transcribe the tables on page ${pageNumber} as cells with 1-based row and column indices. ` +
        'Leave lines empty.'
    );

    const table =
      transcription.tables.find((t) => t.page_number === pageNumber) ?? transcription.tables[0];
    if (!table) return [];
    return gridFromCells(table.cells);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey, timeout: this.timeoutMs });
    }
    return this.client;
  }

  private async transcribe(filePath: string, instruction: string): Promise<VisionTranscription> {
    const base64Pdf = fs.readFileSync(filePath).toString('base64');
    const startTime = Date.now();

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.getClient().chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          {
            role: 'user',
            content: [
              {
                type: 'file',
                file: {
                  filename: path.basename(filePath),
                  file_data: `data:application/pdf;base64,${base64Pdf}`,
                },
              },
              { type: 'text', text: instruction },
            ],
          },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: TRANSCRIPTION_SCHEMA,
        },
      });
    } catch (error) {
      llmRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      throw error;
    }

    llmRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);
    llmRequestsCounter.inc({ model: this.model, status: 'success' });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty transcription response from OpenAI');
    }

    const transcription = parseTranscription(content);
    logger.info('OpenAI transcription complete', {
      model: this.model,
      request_id: response.id,
      lines: transcription.lines.length,
      tables: transcription.tables.length,
    });
    return transcription;
  }
}
