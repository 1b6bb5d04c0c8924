import { Injectable } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import {
  ContentBlock,
  ModelMessage,
  ResponseSchema,
} from '../entities/model-message.entity';
import { ConfidenceLevel } from '../enums/confidence-level.enum';
import { toMarkdownTable } from '../utils/markdown-table.util';

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.tiff': 'image/tiff',
};

const SYSTEM_PROMPT =
  'You are a document understanding assistant. You read scanned documents ' +
  'and answer only with the information visible in them.';

function describe(names: string[], descriptions: string[]): string {
  return names
    .map((name, index) => {
      const description = descriptions[index]?.trim();
      return description ? `- ${name}: ${description}` : `- ${name}`;
    })
    .join('\n');
}

/**
 * Prompt Builder (Domain Layer)
 *
 * Builds the message sequences sent through the model gateway. Field and
 * column names are listed verbatim and in request order so the model's JSON
 * keys and table headers match them exactly.
 */
@Injectable()
export class PromptBuilderDomainService {
  async buildFieldPrompt(
    fieldNames: string[],
    fieldDescriptions: string[],
    imagePaths: string[],
  ): Promise<ModelMessage[]> {
    const instruction = [
      'Extract the following fields from the documents:',
      describe(fieldNames, fieldDescriptions),
      '',
      'If a field is not present, return an empty string for it.',
      'Return the answer as a JSON object whose keys are exactly the field names above.',
      'If the images contain several distinct documents, return a JSON list with one object per document, in the order the images are given.',
    ].join('\n');

    return this.withImages(instruction, imagePaths);
  }

  async buildTablePrompt(
    columnNames: string[],
    columnDescriptions: string[],
    imagePaths: string[],
  ): Promise<ModelMessage[]> {
    const instruction = [
      'Extract the table rows from the documents with these columns:',
      describe(columnNames, columnDescriptions),
      '',
      'Return only a markdown table that starts with this header:',
      toMarkdownTable(columnNames),
      'Add one row per table line found in the documents. Leave a cell empty if the value is missing.',
    ].join('\n');

    return this.withImages(instruction, imagePaths);
  }

  /**
   * Second pass of the two-pass self-critique: the prior conversation plus
   * the model's own answer, then a request to grade each field.
   */
  buildConfidencePrompt(
    priorMessages: ModelMessage[],
    priorAnswer: string,
    fieldNames: string[],
  ): ModelMessage[] {
    const instruction = [
      'For each field below, rate how confident you are that your answer above is correct and fully supported by the documents:',
      fieldNames.map((name) => `- ${name}`).join('\n'),
      '',
      `Use "${ConfidenceLevel.HIGH}" when the value is clearly readable and unambiguous, otherwise "${ConfidenceLevel.LOW}".`,
      'Return a JSON object whose keys are exactly the field names above and whose values are "High" or "Low".',
      'If your answer was a list of documents, return a JSON list with one object per document, in the same order.',
    ].join('\n');

    return [
      ...priorMessages,
      { role: 'assistant', content: priorAnswer },
      { role: 'user', content: [{ type: 'text', text: instruction }] },
    ];
  }

  buildFieldAnswerSchema(fieldNames: string[]): ResponseSchema {
    return {
      type: 'object',
      properties: Object.fromEntries(
        fieldNames.map((name) => [name, { type: 'string' as const }]),
      ),
      required: [...fieldNames],
      additionalProperties: false,
    };
  }

  buildConfidenceSchema(fieldNames: string[]): ResponseSchema {
    const levels = [ConfidenceLevel.HIGH, ConfidenceLevel.LOW];
    return {
      type: 'object',
      properties: Object.fromEntries(
        fieldNames.map((name) => [
          name,
          { type: 'string' as const, enum: [...levels] },
        ]),
      ),
      required: [...fieldNames],
      additionalProperties: false,
    };
  }

  async encodeImage(imagePath: string): Promise<string> {
    const mimeType =
      IMAGE_MIME_TYPES[extname(imagePath).toLowerCase()] ?? 'image/jpeg';
    const data = await readFile(imagePath);
    return `data:${mimeType};base64,${data.toString('base64')}`;
  }

  private async withImages(
    instruction: string,
    imagePaths: string[],
  ): Promise<ModelMessage[]> {
    const images: ContentBlock[] = await Promise.all(
      imagePaths.map(async (imagePath) => ({
        type: 'image_url' as const,
        image_url: { url: await this.encodeImage(imagePath) },
      })),
    );

    return [
      { role: 'system', content: SYSTEM_PROMPT },
      {
        role: 'user',
        content: [...images, { type: 'text', text: instruction }],
      },
    ];
  }
}
