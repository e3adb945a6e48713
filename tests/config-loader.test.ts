import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import {
  ConfigValidationError,
  clearConfigCache,
  formatValidationErrors,
  loadGeneratorConfig,
  loadGeneratorConfigOrDefault,
  mergeConfigs,
  toGenerateOptions,
  validateConfigObject,
} from '../src/config-loader.js';
import { DEFAULT_CONFIG } from '../src/config-schema.js';
import { createTempWorkspace, type TempWorkspace } from './helpers/temp-workspace.js';

describe('config loader', () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    clearConfigCache();
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('should return null when there is no configuration', async () => {
    expect(await loadGeneratorConfig(workspace.root)).toBeNull();
  });

  it('should read .sfsymbolsrc.json and resolve paths from its directory', async () => {
    await workspace.writeJson('.sfsymbolsrc.json', {
      catalogDir: 'catalog',
      outputPath: 'Sources/Symbols.swift',
      accessModifier: 'public',
    });

    expect(await loadGeneratorConfig(workspace.root)).toEqual({
      catalogDir: join(workspace.root, 'catalog'),
      outputPath: join(workspace.root, 'Sources', 'Symbols.swift'),
      accessModifier: 'public',
    });
  });

  it('should read the sfsymbols field of package.json', async () => {
    await workspace.writeJson('package.json', {
      name: 'example-app',
      sfsymbols: { exportSemanticSymbols: true },
    });

    expect(await loadGeneratorConfig(workspace.root)).toEqual({ exportSemanticSymbols: true });
  });

  it('should merge file values over the defaults', async () => {
    await workspace.writeJson('.sfsymbolsrc.json', { enabledExtensions: ['SwiftUI'] });

    expect(await loadGeneratorConfigOrDefault(workspace.root)).toEqual({
      ...DEFAULT_CONFIG,
      catalogDir: undefined,
      outputPath: undefined,
      exportLocalizations: undefined,
      enabledExtensions: ['SwiftUI'],
    });
  });

  it('should reject invalid values', async () => {
    await workspace.writeJson('.sfsymbolsrc.json', { accessModifier: 'open' });

    await expect(loadGeneratorConfig(workspace.root)).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('should collect every validation error', () => {
    let caught: unknown;
    try {
      validateConfigObject({ accessModifier: 'open', unknownKey: 1 }, 'test.json');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.errors).toEqual([
      { path: '(root)', message: 'must NOT have additional properties' },
      { path: '/accessModifier', message: 'must be equal to one of the allowed values' },
    ]);
    expect(formatValidationErrors(caught)).toBe(
      [
        'Invalid configuration in test.json',
        '',
        'Errors:',
        '  - (root): must NOT have additional properties',
        '  - /accessModifier: must be equal to one of the allowed values',
      ].join('\n')
    );
  });

  it('should let defined override values win', () => {
    expect(
      mergeConfigs(DEFAULT_CONFIG, { accessModifier: 'package', exportSemanticSymbols: undefined })
    ).toEqual({
      ...DEFAULT_CONFIG,
      catalogDir: undefined,
      outputPath: undefined,
      exportLocalizations: undefined,
      accessModifier: 'package',
    });
    expect(mergeConfigs(DEFAULT_CONFIG, null)).toBe(DEFAULT_CONFIG);
  });

  it('should turn a configuration into generation options', () => {
    expect(toGenerateOptions({ ...DEFAULT_CONFIG, exportLocalizations: 'rightToLeft' })).toEqual({
      accessModifier: 'internal',
      enabledExtensions: ['SwiftUI', 'UIKit', 'AppKit'],
      exportSemanticSymbols: false,
      localization: { languageCode: false, rightToLeft: true },
      onMissingAvailability: 'fail',
    });
  });
});
