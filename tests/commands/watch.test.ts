import { watch } from 'chokidar';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { startWatching, WatchSession } from '../../src/commands/watch';
import { mergeOptions } from '../../src/utils/options-merger';
import { QueueExecutor } from '../helpers/fake-view';
import { createTempDir, fxml, removeDir, writeFile } from '../helpers/temp-project';

jest.mock('chokidar', () => ({ watch: jest.fn() }));

const { FSWatcher: RealFSWatcher } = jest.requireActual<typeof import('chokidar')>('chokidar');

class FakeFSWatcher extends RealFSWatcher {
  add(): this {
    return this;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

const mockedWatch = jest.mocked(watch);

describe('watch command', () => {
  let root: string;
  let mainFile: string;
  let headerFile: string;
  let cssFile: string;
  let fake: FakeFSWatcher;
  let executor: QueueExecutor;
  let session: WatchSession | null;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    root = createTempDir();
    mainFile = writeFile(root, 'src/main/resources/app/Main.fxml', fxml('Header.fxml'));
    headerFile = writeFile(root, 'src/main/resources/app/Header.fxml', '<HBox/>');
    cssFile = writeFile(root, 'src/main/resources/app/Main.css', '.root {}');
    fake = new FakeFSWatcher();
    mockedWatch.mockReset();
    mockedWatch.mockReturnValue(fake);
    executor = new QueueExecutor();
    session = null;
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await session?.manager.stop();
    jest.useRealTimers();
    logSpy.mockRestore();
    removeDir(root);
  });

  it('should register a component per matching view file', async () => {
    session = await startWatching(['src/**/*.fxml', 'src/**/*.css'], mergeOptions({ project: root }, null), {
      executor,
    });

    expect(session.components.map((c) => c.resourcePath())).toEqual(['app/Header.fxml', 'app/Main.fxml']);
    expect(session.components.map((c) => c.sourceLocation())).toEqual([headerFile, mainFile]);
    expect(session.manager.isRunning()).toBe(true);
    expect(mockedWatch).toHaveBeenCalledWith([path.dirname(mainFile)], expect.objectContaining({ depth: 0 }));
  });

  it('should report reloads and stylesheet refreshes', async () => {
    session = await startWatching(['src/**/*.fxml'], mergeOptions({ project: root }, null), { executor });
    const [header, main] = session.components;
    jest.useFakeTimers();

    fake.emit('change', headerFile);
    jest.advanceTimersByTime(200);
    executor.runAll();
    expect(header.reloadCount).toBe(1);
    expect(main.reloadCount).toBe(1);

    logSpy.mockClear();
    fake.emit('change', cssFile);
    jest.advanceTimersByTime(200);
    executor.runAll();
    expect(main.reloadCount).toBe(1);
    expect(logSpy).toHaveBeenCalledWith('INFO - ✎ restyled app/Main.fxml');
    expect(main.styleRefreshTarget()?.getStylesheets()).toEqual([pathToFileURL(cssFile).href]);
  });

  it('should fail when no view file matches', async () => {
    await expect(
      startWatching(['nothing/**/*.fxml'], mergeOptions({ project: root }, null), { executor }),
    ).rejects.toThrow('No view files match: nothing/**/*.fxml');
  });
});
