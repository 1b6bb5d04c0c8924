export type MessageRole = 'system' | 'user' | 'assistant';

export interface TextContentBlock {
  type: 'text';
  text: string;
}

export interface ImageContentBlock {
  type: 'image_url';
  image_url: {
    url: string; // data:<mime>;base64,<payload>
  };
}

export type ContentBlock = TextContentBlock | ImageContentBlock;

/**
 * Role-tagged message in the OpenAI chat shape. Provider profiles convert
 * it when their wire format differs.
 */
export interface ModelMessage {
  role: MessageRole;
  content: string | ContentBlock[];
}

/**
 * JSON-schema constraint passed to providers that support structured output.
 * Shaped for strict mode: every property required, no extra keys.
 */
export interface ResponseSchema {
  type: 'object';
  properties: Record<string, { type: 'string'; enum?: string[] }>;
  required: string[];
  additionalProperties: false;
}

export function messageText(message: ModelMessage): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .filter((block): block is TextContentBlock => block.type === 'text')
    .map((block) => block.text)
    .join('\n');
}
