import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import {
  executeGenerateSymbols,
  formatGenerateSymbolsResponse,
  parseGenerateSymbolsArgs,
} from '../../../src/edge/tools/index.js';
import { ConfigValidationError, clearConfigCache } from '../../../src/config-loader.js';
import { createTempWorkspace, type TempWorkspace } from '../../helpers/temp-workspace.js';
import { makeCatalog, sampleCatalog, writeCatalog } from '../../helpers/catalog-fixtures.js';

describe('generate_symbols tool', () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    clearConfigCache();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await workspace.cleanup();
  });

  describe('parseGenerateSymbolsArgs', () => {
    it('should accept missing arguments', () => {
      expect(parseGenerateSymbolsArgs(undefined)).toEqual({});
    });

    it('should reject unknown values', () => {
      expect(() => parseGenerateSymbolsArgs({ enabledExtensions: ['WatchKit'] })).toThrow(
        ConfigValidationError
      );
    });
  });

  it('should generate and write the file named in the arguments', async () => {
    await writeCatalog(workspace, 'catalog', sampleCatalog());

    const result = await executeGenerateSymbols({
      projectRoot: workspace.root,
      catalogDir: 'catalog',
      outputPath: 'Sources/Symbols.swift',
    });

    expect(result.success).toBe(true);
    expect(result.writeResult?.path).toBe(join(workspace.root, 'Sources', 'Symbols.swift'));
    expect(await workspace.readFile('Sources/Symbols.swift')).toBe(result.generation?.source);
    expect(result.generation?.symbolNames).toEqual([
      'bubble.left',
      'c.square',
      'magnifyingglass',
      'message.circle',
    ]);
  });

  it('should take options from the configuration file', async () => {
    await writeCatalog(workspace, 'symbols', sampleCatalog());
    await workspace.writeJson('.sfsymbolsrc.json', {
      catalogDir: 'symbols',
      exportSemanticSymbols: true,
      exportLocalizations: 'languageCode',
    });

    const result = await executeGenerateSymbols({ projectRoot: workspace.root });

    expect(result.success).toBe(true);
    expect(result.writeResult).toBeUndefined();
    expect(result.generation?.aliasNames).toEqual(['search']);
    expect(result.generation?.symbolNames).toContain('record.circle.fill.ja');
  });

  it('should let arguments override the configuration file', async () => {
    await writeCatalog(workspace, 'catalog', sampleCatalog());
    await workspace.writeJson('.sfsymbolsrc.json', {
      catalogDir: 'catalog',
      outputPath: 'Symbols.swift',
      accessModifier: 'public',
    });

    const result = await executeGenerateSymbols({
      projectRoot: workspace.root,
      accessModifier: 'package',
      dryRun: true,
    });

    expect(result.success).toBe(true);
    expect(result.writeResult).toBeUndefined();
    expect(workspace.exists('Symbols.swift')).toBe(false);
    expect(result.generation?.source).toContain('package struct SFSymbolResource: Hashable, Sendable {');
  });

  it('should fail without a catalog directory', async () => {
    const result = await executeGenerateSymbols({ projectRoot: workspace.root });

    expect(result).toEqual({
      success: false,
      error: 'No catalog directory: pass catalogDir or set it in .sfsymbolsrc.json',
    });
  });

  it('should report generation errors with the symbols involved', async () => {
    await writeCatalog(workspace, 'catalog', makeCatalog({ symbols: { 'broken.symbol': '2099' } }));

    const result = await executeGenerateSymbols({ projectRoot: workspace.root, catalogDir: 'catalog' });

    expect(result).toEqual({
      success: false,
      error:
        'The catalog has no release record for "broken.symbol". Fix the catalog or set onMissingAvailability to "skip".',
    });
  });

  it('should log skipped symbols', async () => {
    await writeCatalog(
      workspace,
      'catalog',
      makeCatalog({ symbols: { 'broken.symbol': '2099', 'c.square': '2019' } })
    );

    const result = await executeGenerateSymbols({
      projectRoot: workspace.root,
      catalogDir: 'catalog',
      onMissingAvailability: 'skip',
    });

    expect(result.success).toBe(true);
    expect(console.error).toHaveBeenCalledWith(
      '[generate_symbols] broken.symbol: skipped: availability key "2099" has no release record'
    );
  });

  describe('formatGenerateSymbolsResponse', () => {
    it('should summarize and return the source', () => {
      const content = formatGenerateSymbolsResponse({
        success: true,
        generation: {
          source: 'import Foundation\n',
          symbolNames: ['a.circle', 'b.circle'],
          aliasNames: [],
          diagnostics: [{ symbolName: 'c.circle', message: 'skipped: no record' }],
        },
        writeResult: { success: true, path: '/project/Symbols.swift', bytes: 18 },
      });

      expect(content).toEqual([
        {
          type: 'text',
          text: [
            '# Generated SF Symbol accessors',
            '',
            '- Symbols: 2',
            '- Semantic aliases: 0',
            '- Written to: `/project/Symbols.swift` (18 bytes)',
            '',
            '## Diagnostics',
            '',
            '- `c.circle`: skipped: no record',
          ].join('\n'),
        },
        { type: 'text', text: 'import Foundation\n' },
      ]);
    });

    it('should format failures', () => {
      expect(formatGenerateSymbolsResponse({ success: false, error: 'boom' })).toEqual([
        { type: 'text', text: '# Error\n\nboom' },
      ]);
    });
  });
});
