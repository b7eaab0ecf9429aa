import { collectDependencies, deps } from '../../src/commands/deps';
import { mergeOptions } from '../../src/utils/options-merger';
import { createTempDir, fxml, removeDir, writeFile } from '../helpers/temp-project';

describe('deps command', () => {
  let root: string;
  let mainFile: string;
  let headerFile: string;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    root = createTempDir();
    mainFile = writeFile(root, 'src/main/resources/app/Main.fxml', fxml('Header.fxml'));
    headerFile = writeFile(root, 'src/main/resources/app/Header.fxml', '<HBox/>');
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    removeDir(root);
  });

  it('should collect the include closure of a view', () => {
    const report = collectDependencies(mainFile, mergeOptions({ project: root }, null));

    expect(report.resourcePath).toBe('app/Main.fxml');
    expect(report.files).toEqual([mainFile, headerFile]);
    expect(report.graph.outEdges('app/Main.fxml')).toEqual(['app/Header.fxml']);
  });

  it('should print the include tree', async () => {
    await deps({ project: root }, 'src/main/resources/app/Main.fxml', {});

    expect(logSpy.mock.calls).toEqual([
      ['INFO - Include tree of app/Main.fxml (2 file(s)):'],
      ['INFO -   src/main/resources/app/Main.fxml'],
      ['INFO -   src/main/resources/app/Header.fxml'],
    ]);
  });

  it('should print the graph as JSON', async () => {
    await deps({ project: root }, 'src/main/resources/app/Main.fxml', { json: true });

    const expected = {
      nodes: [{ id: 'app/Main.fxml' }, { id: 'app/Header.fxml' }],
      links: [{ source: 'app/Main.fxml', target: 'app/Header.fxml' }],
    };
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(expected, null, 2));
  });

  it('should reject files that do not exist', async () => {
    await expect(deps({ project: root }, 'Missing.fxml', {})).rejects.toThrow('File not found:');
  });
});
