import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { ComponentRegistry } from '../../src/analyzer/component-registry';
import { DependencyGraph } from '../../src/analyzer/dependency-graph';
import { IncludeAnalyzer } from '../../src/analyzer/include-analyzer';
import { PathResolver } from '../../src/resolver/path-resolver';
import { Reloadable } from '../../src/types/reloadable';
import { clearableReferences, ClearableRef, FakeView } from '../helpers/fake-view';
import { createTempDir, fxml, removeDir, writeFile } from '../helpers/temp-project';

describe('ComponentRegistry', () => {
  let root: string;
  let graph: DependencyGraph;
  let registry: ComponentRegistry;
  let created: ClearableRef<object>[];
  let mainFile: string;
  let headerFile: string;

  const createRegistry = (): ComponentRegistry => {
    const pathResolver = new PathResolver();
    const references = clearableReferences();
    created = references.created;
    return new ComponentRegistry(graph, new IncludeAnalyzer(pathResolver), pathResolver, {
      projectRoot: root,
      createReference: references.factory,
    });
  };

  beforeEach(() => {
    root = createTempDir();
    mainFile = writeFile(root, 'src/main/resources/app/Main.fxml', fxml('Header.fxml'));
    headerFile = writeFile(root, 'src/main/resources/app/Header.fxml', '<HBox/>');
    graph = new DependencyGraph();
    registry = createRegistry();
  });

  afterEach(() => {
    removeDir(root);
  });

  // --- register ---
  describe('register', () => {
    it('should analyze includes and return the discovered files', () => {
      const registration = registry.register(new FakeView('app/Main.fxml', mainFile));

      expect(registration).toEqual({ resourcePath: 'app/Main.fxml', files: [mainFile, headerFile] });
      expect(graph.hasEdge('app/Main.fxml', 'app/Header.fxml')).toBe(true);
      expect(registry.isRoot('app/Main.fxml')).toBe(true);
      expect(registry.isRoot('app/Header.fxml')).toBe(false);
      expect(registry.rootFile('app/Main.fxml')).toBe(mainFile);
    });

    it('should analyze each root only once until invalidated', () => {
      const analyzeSpy = jest.spyOn(IncludeAnalyzer.prototype, 'findAllIncluded');
      registry.register(new FakeView('app/Main.fxml', mainFile));
      const second = registry.register(new FakeView('app/Main.fxml', mainFile));

      expect(second).toEqual({ resourcePath: 'app/Main.fxml', files: [] });
      expect(analyzeSpy).toHaveBeenCalledTimes(1);

      registry.invalidate('app/Main.fxml');
      registry.register(new FakeView('app/Main.fxml', mainFile));
      expect(analyzeSpy).toHaveBeenCalledTimes(2);
      analyzeSpy.mockRestore();
    });

    it('should prefer the source file when given an output location', () => {
      const outputFile = writeFile(root, 'target/classes/app/Main.fxml', '<VBox/>');
      registry.register(new FakeView('app/Main.fxml', outputFile));
      expect(registry.rootFile('app/Main.fxml')).toBe(mainFile);
    });

    it('should keep a file URL location outside any build layout as a filesystem path', () => {
      const looseFile = writeFile(root, 'views/Loose.fxml', '<VBox/>');
      registry.register(new FakeView('views/Loose.fxml', pathToFileURL(looseFile)));
      expect(registry.rootFile('views/Loose.fxml')).toBe(looseFile);
    });

    it('should reject components without a usable resource path', () => {
      expect(registry.register(new FakeView('', mainFile))).toBeNull();

      const broken: Reloadable = {
        resourcePath: () => {
          throw new Error('not loaded yet');
        },
        sourceLocation: () => mainFile,
        reload: () => undefined,
      };
      expect(registry.register(broken)).toBeNull();
      expect(registry.roots()).toEqual([]);
    });
  });

  // --- reanalyze ---
  describe('reanalyze', () => {
    it('should replace the include edges of a root', () => {
      registry.register(new FakeView('app/Main.fxml', mainFile));
      const footerFile = writeFile(root, 'src/main/resources/app/Footer.fxml', '<HBox/>');
      fs.writeFileSync(mainFile, fxml('Footer.fxml'));

      expect(registry.reanalyze('app/Main.fxml')).toEqual([mainFile, footerFile]);
      expect(graph.hasEdge('app/Main.fxml', 'app/Header.fxml')).toBe(false);
      expect(graph.hasEdge('app/Main.fxml', 'app/Footer.fxml')).toBe(true);
    });

    it('should do nothing for unknown roots', () => {
      expect(registry.reanalyze('app/Unknown.fxml')).toEqual([]);
      expect(graph.nodeCount).toBe(0);
    });
  });

  // --- live components ---
  describe('collectLiveComponents', () => {
    it('should collect components of every given path', () => {
      const main = new FakeView('app/Main.fxml', mainFile);
      const header = new FakeView('app/Header.fxml', headerFile);
      registry.register(main);
      registry.register(header);

      const affected = registry.findAffected('app/Header.fxml');
      expect(affected).toEqual(new Set(['app/Header.fxml', 'app/Main.fxml']));
      expect(registry.collectLiveComponents(affected)).toEqual(new Set([main, header]));
    });

    it('should skip collected components', () => {
      const first = new FakeView('app/Main.fxml', mainFile);
      const second = new FakeView('app/Main.fxml', mainFile);
      registry.register(first);
      registry.register(second);

      created[0].clear();

      expect(registry.collectLiveComponents(['app/Main.fxml'])).toEqual(new Set([second]));
    });

    it('should drop unregistered components', () => {
      const first = new FakeView('app/Main.fxml', mainFile);
      const second = new FakeView('app/Main.fxml', mainFile);
      registry.register(first);
      registry.register(second);

      registry.unregister(first);

      expect(registry.collectLiveComponents(['app/Main.fxml'])).toEqual(new Set([second]));
    });
  });

  // --- stylesheets ---
  describe('findViewsUsingStylesheet', () => {
    it('should map stylesheets by directory and base name', () => {
      registry.register(new FakeView('app/Main.fxml', mainFile));

      expect(registry.stylesheets()).toEqual(['app/Main.css', 'app/Main.bss']);
      expect(registry.findViewsUsingStylesheet('app/Main.css')).toEqual(new Set(['app/Main.fxml']));
      expect(registry.findViewsUsingStylesheet('app/Other.css')).toEqual(new Set());
    });

    it('should include the views that include the styled view', () => {
      registry.register(new FakeView('app/Main.fxml', mainFile));
      registry.register(new FakeView('app/Header.fxml', headerFile));

      expect(registry.findViewsUsingStylesheet('app/Header.bss')).toEqual(
        new Set(['app/Header.fxml', 'app/Main.fxml']),
      );
    });

    it('should map top-level views without a directory prefix', () => {
      const rootView = writeFile(root, 'src/main/resources/Shell.fxml', '<VBox/>');
      registry.register(new FakeView('Shell.fxml', rootView));
      expect(registry.findViewsUsingStylesheet('Shell.css')).toEqual(new Set(['Shell.fxml']));
    });
  });

  // --- stylesheet owners ---
  describe('stylesheet owners', () => {
    it('should find every live owner of a listed stylesheet once', () => {
      const main = new FakeView('app/Main.fxml', mainFile);
      const header = new FakeView('app/Header.fxml', headerFile);

      registry.trackStylesheetOwner('app/theme.css', main);
      registry.trackStylesheetOwner('app/theme.css', main);
      registry.trackStylesheetOwner('app/theme.css', header);

      expect(registry.findStylesheetOwners('app/theme.css')).toEqual(new Set([main, header]));
      expect(registry.trackedStylesheets()).toEqual(['app/theme.css']);
      expect(created).toHaveLength(2);
    });

    it('should drop owners that were collected or unregistered', () => {
      const main = new FakeView('app/Main.fxml', mainFile);
      const header = new FakeView('app/Header.fxml', headerFile);
      registry.trackStylesheetOwner('app/theme.css', main);
      registry.trackStylesheetOwner('app/theme.css', header);

      created[0].clear();
      registry.unregister(header);

      expect(registry.findStylesheetOwners('app/theme.css')).toEqual(new Set());
    });
  });

  // --- keys ---
  describe('resourceKeyFor', () => {
    it('should use the resource path inside a build layout', () => {
      expect(registry.resourceKeyFor(headerFile)).toBe('app/Header.fxml');
    });

    it('should fall back to the project-relative path, then the absolute path', () => {
      expect(registry.resourceKeyFor(path.join(root, 'views/Main.fxml'))).toBe('views/Main.fxml');
      expect(registry.resourceKeyFor('/elsewhere/Main.fxml')).toBe('/elsewhere/Main.fxml');
    });
  });

  it('should forget everything on reset', () => {
    const main = new FakeView('app/Main.fxml', mainFile);
    registry.register(main);

    registry.reset();

    expect(registry.roots()).toEqual([]);
    expect(registry.stylesheets()).toEqual([]);
    expect(graph.nodeCount).toBe(0);
    expect(registry.collectLiveComponents(['app/Main.fxml']).size).toBe(0);
  });
});
