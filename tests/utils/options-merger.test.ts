import { mergeOptions } from '../../src/utils/options-merger';

describe('mergeOptions', () => {
  it('should resolve defaults without a config file', () => {
    expect(mergeOptions({ project: '/work/app' }, null)).toEqual({
      projectRoot: '/work/app',
      debounceMs: 200,
      viewExtensions: ['fxml'],
      stylesheetExtensions: ['css', 'bss'],
      includeNamespaces: ['http://javafx.com/fxml/1', 'http://javafx.com/fxml'],
      includeFallbackTag: 'fx:include',
      cssReload: true,
      syncToOutput: true,
      converters: [],
    });
  });

  it('should let CLI arguments override the config file', () => {
    expect(mergeOptions({ project: '/work/app', debounce: 50 }, { debounceMs: 300 }).debounceMs).toBe(
      50,
    );
    expect(mergeOptions({ project: '/work/app' }, { debounceMs: 300 }).debounceMs).toBe(300);
  });

  it('should take engine settings from the config file', () => {
    const converter = (location: string) => (location.endsWith('.fxml') ? location : null);
    const merged = mergeOptions(
      { project: '/work/app' },
      {
        includeNamespaces: ['urn:views'],
        includeFallbackTag: 'v:include',
        cssReload: false,
        converters: [converter],
      },
    );

    expect(merged.includeNamespaces).toEqual(['urn:views']);
    expect(merged.includeFallbackTag).toBe('v:include');
    expect(merged.cssReload).toBe(false);
    expect(merged.converters).toEqual([converter]);
  });

  it('should normalise and deduplicate extensions', () => {
    const merged = mergeOptions(
      { project: '/work/app' },
      { viewExtensions: ['.FXML', 'fxml', 'xml'], stylesheetExtensions: ['.css'] },
    );
    expect(merged.viewExtensions).toEqual(['fxml', 'xml']);
    expect(merged.stylesheetExtensions).toEqual(['css']);
  });

  it('should only turn sync off from the CLI', () => {
    expect(mergeOptions({ project: '/w', sync: false }, { syncToOutput: true }).syncToOutput).toBe(false);
    expect(mergeOptions({ project: '/w', sync: true }, { syncToOutput: false }).syncToOutput).toBe(false);
    expect(mergeOptions({ project: '/w' }, {}).syncToOutput).toBe(true);
  });

  it('should resolve a relative project against the working directory', () => {
    expect(mergeOptions({ project: '.' }, null).projectRoot).toBe(process.cwd());
  });
});
