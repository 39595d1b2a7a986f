import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../utils/logger';

export interface ClaudeOCRConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
}

export interface ClaudeOCRResult {
  text: string;
  isComplete: boolean;
}

type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

function imageMediaType(mimeType: string): ImageMediaType {
  switch (mimeType) {
    case 'image/jpeg':
    case 'image/png':
    case 'image/gif':
    case 'image/webp':
      return mimeType;
    default:
      throw new Error(`Unsupported image type for Claude: ${mimeType}`);
  }
}

/**
 * Claude vision transcription. Claude only accepts images, so PDFs are rendered first.
 */
export class ClaudeOCRClient {
  private client: Anthropic;
  private model: string;
  private temperature: number;

  constructor(config: ClaudeOCRConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.model = config.model || 'claude-sonnet-4-5-20250929';
    this.temperature = config.temperature ?? 0.0;
  }

  async extractTextFromImage(base64Data: string, mimeType: string, prompt: string): Promise<ClaudeOCRResult> {
    logger.debug({ model: this.model, imageSize: base64Data.length }, 'Extracting text from image with Claude');

    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: 8000,
      temperature: this.temperature,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: { type: 'base64', media_type: imageMediaType(mimeType), data: base64Data },
            },
            { type: 'text', text: prompt },
          ],
        },
      ],
    });

    const textContent = message.content.find(block => block.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text content in Claude response');
    }

    const isComplete = message.stop_reason === 'end_turn';
    logger.debug({ textLength: textContent.text.length, stopReason: message.stop_reason }, 'Claude transcription completed');

    return { text: textContent.text, isComplete };
  }
}
