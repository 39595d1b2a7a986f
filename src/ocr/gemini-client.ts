import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { GoogleAIFileManager, FileState } from '@google/generative-ai/server';
import path from 'path';
import { logger } from '../utils/logger';

export interface GeminiUploadResult {
  fileUri: string;
  mimeType: string;
  name: string;
}

export interface GeminiOCRResult {
  success: boolean;
  content: string;
  error?: string;
}

/**
 * Client for the Gemini File API: upload a PDF, transcribe it, delete it.
 */
export class GeminiClient {
  private genAI: GoogleGenerativeAI;
  private fileManager: GoogleAIFileManager;
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string = 'gemini-2.0-flash') {
    if (!apiKey) {
      throw new Error('Gemini API key is required');
    }

    this.genAI = new GoogleGenerativeAI(apiKey);
    this.fileManager = new GoogleAIFileManager(apiKey);
    this.model = this.genAI.getGenerativeModel({
      model: modelName,
      generationConfig: {
        temperature: 0,
        maxOutputTokens: 8192,
      },
    });

    logger.debug({ modelName }, 'Gemini client initialized');
  }

  async uploadFile(filePath: string, mimeType: string = 'application/pdf'): Promise<GeminiUploadResult> {
    try {
      logger.debug({ filePath, mimeType }, 'Uploading file to Gemini');

      const uploadResult = await this.fileManager.uploadFile(filePath, {
        mimeType,
        displayName: path.basename(filePath),
      });

      if (uploadResult.file.state === FileState.PROCESSING) {
        logger.debug({ fileName: uploadResult.file.name }, 'File is processing, waiting...');
        await this.waitForFileProcessing(uploadResult.file.name);
      }

      return {
        fileUri: uploadResult.file.uri,
        mimeType: uploadResult.file.mimeType,
        name: uploadResult.file.name,
      };
    } catch (error) {
      logger.error({ error, filePath }, 'Failed to upload file to Gemini');
      throw new Error(`Gemini file upload failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  private async waitForFileProcessing(fileName: string, maxWaitMs: number = 60000): Promise<void> {
    const startTime = Date.now();
    const pollInterval = 2000;

    while (Date.now() - startTime < maxWaitMs) {
      const file = await this.fileManager.getFile(fileName);

      if (file.state === FileState.ACTIVE) {
        return;
      }
      if (file.state === FileState.FAILED) {
        throw new Error(`File processing failed: ${fileName}`);
      }

      logger.debug({ fileName, state: file.state }, 'File still processing...');
      await new Promise(resolve => setTimeout(resolve, pollInterval));
    }

    throw new Error(`File processing timeout after ${maxWaitMs}ms: ${fileName}`);
  }

  async extractText(fileUri: string, mimeType: string, prompt: string): Promise<GeminiOCRResult> {
    try {
      const result = await this.model.generateContent([{ fileData: { mimeType, fileUri } }, { text: prompt }]);
      const text = result.response.text();

      if (!text) {
        throw new Error('Empty response from Gemini');
      }

      logger.debug({ fileUri, responseLength: text.length }, 'Gemini transcription successful');
      return { success: true, content: text };
    } catch (error) {
      logger.warn({ error, fileUri }, 'Gemini transcription failed');
      return {
        success: false,
        content: '',
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  async deleteFile(fileName: string): Promise<void> {
    try {
      await this.fileManager.deleteFile(fileName);
    } catch (error) {
      logger.warn({ error, fileName }, 'Failed to delete file from Gemini (non-critical)');
    }
  }

  /**
   * Upload, transcribe and clean up a local PDF
   */
  async processFile(localFilePath: string, prompt: string): Promise<GeminiOCRResult> {
    let uploadedFileName: string | null = null;

    try {
      const upload = await this.uploadFile(localFilePath);
      uploadedFileName = upload.name;
      return await this.extractText(upload.fileUri, upload.mimeType, prompt);
    } catch (error) {
      logger.warn({ error, localFilePath }, 'Gemini file processing failed');
      return {
        success: false,
        content: '',
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    } finally {
      if (uploadedFileName) {
        await this.deleteFile(uploadedFileName);
      }
    }
  }
}
