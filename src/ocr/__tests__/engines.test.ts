import fs from 'fs';
import os from 'os';
import path from 'path';
import { config } from '../../config';
import type { AppConfig } from '../../config';
import { EngineFailureError } from '../../utils/errors';
import { createEngines } from '../engines';
import { GeminiEngine } from '../engines/gemini-engine';
import { GeminiClient } from '../gemini-client';
import { PDFConverter } from '../pdf-converter';
import { TRANSCRIBE_PROMPT } from '../prompts';

jest.mock('pdf-parse', () => jest.fn());
jest.mock('../gemini-client');

function appConfig(ocr: Partial<AppConfig['ocr']>): AppConfig {
  return {
    ...config,
    ocr: { ...config.ocr, geminiApiKey: undefined, anthropicApiKey: undefined, tesseractEnabled: true, ...ocr },
  };
}

describe('createEngines', () => {
  it('leaves out cloud engines that have no credentials', () => {
    expect(createEngines(appConfig({})).map(engine => engine.id)).toEqual(['text-layer', 'tesseract']);
  });

  it('registers every engine in cost order when all are configured', () => {
    const engines = createEngines(appConfig({ geminiApiKey: 'test-key', anthropicApiKey: 'test-key' }));

    expect(engines.map(engine => engine.id)).toEqual(['text-layer', 'tesseract', 'gemini', 'claude']);
    expect(engines.map(engine => engine.usesNetwork)).toEqual([false, false, true, true]);
  });

  it('drops tesseract when it is disabled', () => {
    const engines = createEngines(appConfig({ tesseractEnabled: false, anthropicApiKey: 'test-key' }));

    expect(engines.map(engine => engine.id)).toEqual(['text-layer', 'claude']);
  });
});

describe('GeminiEngine', () => {
  let tempDir: string;
  let client: GeminiClient;
  const processFile = () => jest.mocked(client.processFile);

  beforeEach(() => {
    jest.clearAllMocks();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gemini-engine-'));
    client = new GeminiClient('test-key');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns the transcription of an in-memory document and removes its temp copy', async () => {
    processFile().mockResolvedValue({ success: true, content: 'ORDER APPOINTING GUARDIAN' });
    const engine = new GeminiEngine(client, new PDFConverter(tempDir));

    const text = await engine.extractText({ fileName: 'ORDER - Park.pdf', bytes: Buffer.from('%PDF-1.4') });

    expect(text).toBe('ORDER APPOINTING GUARDIAN');
    const [uploaded, prompt] = processFile().mock.calls[0];
    expect(path.dirname(uploaded)).toBe(tempDir);
    expect(prompt).toBe(TRANSCRIBE_PROMPT);
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });

  it('turns a failed transcription into an EngineFailureError for the cascade', async () => {
    processFile().mockResolvedValue({ success: false, content: '', error: 'quota exceeded' });
    const engine = new GeminiEngine(client, new PDFConverter(tempDir));

    const error = await engine
      .extractText({ fileName: 'ORDER - Park.pdf', path: '/data/ORDER - Park.pdf', bytes: Buffer.alloc(0) })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineFailureError);
    expect(error).toMatchObject({ engine: 'gemini', message: 'quota exceeded', details: { fileName: 'ORDER - Park.pdf' } });
    expect(processFile()).toHaveBeenCalledWith('/data/ORDER - Park.pdf', TRANSCRIBE_PROMPT);
  });

  it('falls back to a generic message when the client gives none', async () => {
    processFile().mockResolvedValue({ success: false, content: '' });
    const engine = new GeminiEngine(client, new PDFConverter(tempDir));

    await expect(
      engine.extractText({ fileName: 'scan.pdf', path: '/data/scan.pdf', bytes: Buffer.alloc(0) })
    ).rejects.toThrow('Gemini transcription failed');
  });
});
