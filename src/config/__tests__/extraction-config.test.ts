/**
 * Loading and validating the extraction rule tables
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import defaultSettings from '../../../config/extraction.json';
import { loadExtractionConfig, parseExtractionConfig, rulesForScope } from '../extraction-config';
import { ConfigurationError } from '../../utils/errors';

describe('Extraction config', () => {
  it('loads the bundled defaults', () => {
    const config = loadExtractionConfig();

    expect(config.sufficiencyThreshold).toBe(80);
    expect(config.separators.map(sep => sep.name)).toEqual(['conjunction', 'slash', 'semicolon', 'comma']);
    expect(config.settings.causeNumberHint.maxDigitDifference).toBe(1);
  });

  it('numbers correction rules per scope', () => {
    const config = loadExtractionConfig();
    const ids = rulesForScope(config, 'punctuation').map(rule => rule.id);

    expect(ids).toEqual(['punctuation#1', 'punctuation#2']);
  });

  it('adds the numeric rules to date and phone scopes', () => {
    const config = loadExtractionConfig();
    const ids = rulesForScope(config, 'phone').map(rule => rule.id);

    expect(ids).toEqual(['numeric#1', 'numeric#2', 'phone#1']);
  });

  it('freezes the compiled configuration', () => {
    const config = loadExtractionConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.corrections)).toBe(true);
    expect(Object.isFrozen(config.settings.anchors.guardian.primary)).toBe(true);
    expect(Object.isFrozen(config.settings.relationships.nonFamily)).toBe(true);
    expect(Object.isFrozen(config.settings.corrections[0])).toBe(true);
  });

  it('rejects a configuration with the wrong shape', () => {
    expect(() => parseExtractionConfig({ version: 1 })).toThrow(ConfigurationError);
    expect(() => parseExtractionConfig({ version: 1 })).toThrow('Extraction configuration is invalid');
  });

  it('names the separator whose pattern does not compile', () => {
    const broken = {
      ...defaultSettings,
      separators: [{ name: 'conjunction', pattern: '(' }],
    };

    expect(() => parseExtractionConfig(broken)).toThrow('Invalid pattern in separators.conjunction: (');
  });

  it('loads a configuration file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'extraction-config-'));
    const filePath = path.join(dir, 'extraction.json');
    fs.writeFileSync(filePath, JSON.stringify({ ...defaultSettings, cascade: { sufficiencyThreshold: 120 } }));

    try {
      expect(loadExtractionConfig(filePath).sufficiencyThreshold).toBe(120);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails with a configuration error when the file is missing', () => {
    const missing = path.join(os.tmpdir(), 'no-such-dir', 'extraction.json');

    expect(() => loadExtractionConfig(missing)).toThrow(ConfigurationError);
  });
});
