/**
 * OCR cascade ordering, fallthrough, retries and escalation, with in-process engines
 */

import { OcrCascade, countChars } from '../cascade';
import type { EngineId, OcrEngine, SourceDocument } from '../../types/ocr';

const document: SourceDocument = { fileName: 'ARP - Park.pdf', bytes: Buffer.from('%PDF-1.4') };

function fakeEngine(id: EngineId, tier: number, usesNetwork = false) {
  const extractText = jest.fn<Promise<string>, [SourceDocument]>();
  const engine: OcrEngine = { id, tier, usesNetwork, extractText };
  return { engine, extractText };
}

function cascadeOf(engines: OcrEngine[], cloudTimeoutMs = 1000) {
  return new OcrCascade(engines, {
    sufficiencyThreshold: 80,
    cloudTimeoutMs,
    retry: { baseDelayMs: 1, jitterMs: 0 },
  });
}

describe('countChars', () => {
  it('ignores whitespace', () => {
    expect(countChars(' a b\n\tc ')).toBe(3);
  });
});

describe('OcrCascade.run', () => {
  it('runs engines cheapest first and stops at the first sufficient output', async () => {
    const claude = fakeEngine('claude', 3, true);
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    textLayer.extractText.mockResolvedValue('a'.repeat(200));

    const cascade = cascadeOf([claude.engine, textLayer.engine, tesseract.engine]);
    const run = await cascade.run(document);

    expect(cascade.engineIds).toEqual(['text-layer', 'tesseract', 'claude']);
    expect(run.chosen).toEqual({ engine: 'text-layer', text: 'a'.repeat(200), charCount: 200, lowConfidence: false });
    expect(run.attempts.map(a => a.status)).toEqual(['success']);
    expect(tesseract.extractText).not.toHaveBeenCalled();
    expect(claude.extractText).not.toHaveBeenCalled();
  });

  it('falls through insufficient and failing engines', async () => {
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    const gemini = fakeEngine('gemini', 2, true);
    const claude = fakeEngine('claude', 3, true);
    textLayer.extractText.mockResolvedValue('short text');
    tesseract.extractText.mockRejectedValue(new Error('tesseract exited with code 1'));
    gemini.extractText.mockResolvedValue('b'.repeat(100));

    const run = await cascadeOf([textLayer.engine, tesseract.engine, gemini.engine, claude.engine]).run(document);

    expect(run.chosen.engine).toBe('gemini');
    expect(run.attempts.map(a => `${a.engine}:${a.status}`)).toEqual([
      'text-layer:insufficient',
      'tesseract:error',
      'gemini:success',
    ]);
    expect(run.attempts[1].error).toBe('tesseract exited with code 1');
    expect(tesseract.extractText).toHaveBeenCalledTimes(1);
    expect(claude.extractText).not.toHaveBeenCalled();
  });

  it('retries a transient engine failure once', async () => {
    const gemini = fakeEngine('gemini', 2, true);
    gemini.extractText.mockRejectedValueOnce(new Error('503 Service Unavailable')).mockResolvedValueOnce('c'.repeat(90));

    const run = await cascadeOf([gemini.engine]).run(document);

    expect(gemini.extractText).toHaveBeenCalledTimes(2);
    expect(run.chosen.engine).toBe('gemini');
    expect(run.attempts).toHaveLength(1);
    expect(run.attempts[0].status).toBe('success');
  });

  it('bounds a network engine that never answers', async () => {
    const gemini = fakeEngine('gemini', 2, true);
    gemini.extractText.mockReturnValue(new Promise<string>(() => undefined));

    const run = await cascadeOf([gemini.engine], 20).run(document);

    expect(run.attempts[0].status).toBe('error');
    expect(run.attempts[0].error).toBe('gemini OCR timed out after 20ms');
    expect(run.chosen.engine).toBeNull();
  });

  it('keeps the longest output when nothing is sufficient', async () => {
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    textLayer.extractText.mockResolvedValue('abc');
    tesseract.extractText.mockResolvedValue('a b c d e');

    const run = await cascadeOf([textLayer.engine, tesseract.engine]).run(document);

    expect(run.chosen).toEqual({ engine: 'tesseract', text: 'a b c d e', charCount: 5, lowConfidence: true });
  });

  it('prefers the cheaper engine on a tie', async () => {
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    textLayer.extractText.mockResolvedValue('abcde');
    tesseract.extractText.mockResolvedValue('vwxyz');

    const run = await cascadeOf([tesseract.engine, textLayer.engine]).run(document);

    expect(run.chosen.engine).toBe('text-layer');
  });

  it('returns an empty low-confidence output when every engine fails', async () => {
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    textLayer.extractText.mockRejectedValue(new Error('bad XRef entry'));
    tesseract.extractText.mockRejectedValue(new Error('tesseract not found'));

    const run = await cascadeOf([textLayer.engine, tesseract.engine]).run(document);

    expect(run.chosen).toEqual({ engine: null, text: '', charCount: 0, lowConfidence: true });
    expect(run.attempts.map(a => a.status)).toEqual(['error', 'error']);
  });
});

describe('OcrCascade.escalate', () => {
  it('invokes untried higher tiers once and reuses their output later', async () => {
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    const gemini = fakeEngine('gemini', 2, true);
    textLayer.extractText.mockResolvedValue('x'.repeat(100));
    tesseract.extractText.mockResolvedValue('plain text only');
    gemini.extractText.mockResolvedValue('GUARDIAN(s) Karen Hall');

    const cascade = cascadeOf([textLayer.engine, tesseract.engine, gemini.engine]);
    const run = await cascade.run(document);
    const accepted = await cascade.escalate(run, output => output.text.includes('GUARDIAN'));

    expect(accepted?.engine).toBe('gemini');
    expect(accepted?.text).toBe('GUARDIAN(s) Karen Hall');

    const again = await cascade.escalate(run, () => false);

    expect(again).toBeNull();
    expect(tesseract.extractText).toHaveBeenCalledTimes(1);
    expect(gemini.extractText).toHaveBeenCalledTimes(1);
  });

  it('never calls an engine that already failed', async () => {
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    const gemini = fakeEngine('gemini', 2, true);
    textLayer.extractText.mockResolvedValue('abcdefgh');
    tesseract.extractText.mockRejectedValue(new Error('boom'));
    gemini.extractText.mockResolvedValue('abc');

    const cascade = cascadeOf([textLayer.engine, tesseract.engine, gemini.engine]);
    const run = await cascade.run(document);
    expect(run.chosen.engine).toBe('text-layer');

    const accepted = await cascade.escalate(run, () => true);

    expect(accepted?.engine).toBe('gemini');
    expect(tesseract.extractText).toHaveBeenCalledTimes(1);
    expect(gemini.extractText).toHaveBeenCalledTimes(1);
  });

  it('only looks above the chosen tier', async () => {
    const textLayer = fakeEngine('text-layer', 0);
    const tesseract = fakeEngine('tesseract', 1);
    textLayer.extractText.mockResolvedValue('abc');
    tesseract.extractText.mockResolvedValue('abcdef');

    const cascade = cascadeOf([textLayer.engine, tesseract.engine]);
    const run = await cascade.run(document);
    const accepted = await cascade.escalate(run, () => true);

    expect(run.chosen.engine).toBe('tesseract');
    expect(accepted).toBeNull();
  });
});
