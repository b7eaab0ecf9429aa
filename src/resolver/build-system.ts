/**
 * Maps a runtime location (absolute path or `file:` URL) to an existing source
 * file, or returns null when it does not recognise the layout.
 */
export type SourcePathConverter = (runtimeLocation: string) => string | null;

export type BuildTool = 'maven' | 'gradle' | 'intellij';

/**
 * Directory conventions of one compiled-output layout.
 *
 * `outputMarker` is matched against forward-slash paths and always starts and
 * ends with '/'. `sourceDir` and `outputDir` are project-relative.
 */
export interface BuildSystemProfile {
  tool: BuildTool;
  outputMarker: string;
  sourceDir: string;
  outputDir: string;
  test: boolean;
  /** Tried after `sourceDir` when a resource sits beside the code. */
  alternateSourceDirs: readonly string[];
}

const MAIN_CODE_DIRS = ['src/main/java', 'src/main/kotlin'] as const;
const TEST_CODE_DIRS = ['src/test/java', 'src/test/kotlin'] as const;

/**
 * Known layouts in matching priority order. The order also decides which
 * marker wins when a path contains several.
 */
export const BUILD_SYSTEM_PROFILES: readonly BuildSystemProfile[] = [
  // Maven
  {
    tool: 'maven',
    outputMarker: '/target/classes/',
    sourceDir: 'src/main/resources',
    outputDir: 'target/classes',
    test: false,
    alternateSourceDirs: MAIN_CODE_DIRS,
  },
  {
    tool: 'maven',
    outputMarker: '/target/test-classes/',
    sourceDir: 'src/test/resources',
    outputDir: 'target/test-classes',
    test: true,
    alternateSourceDirs: TEST_CODE_DIRS,
  },
  // Gradle
  {
    tool: 'gradle',
    outputMarker: '/build/resources/main/',
    sourceDir: 'src/main/resources',
    outputDir: 'build/resources/main',
    test: false,
    alternateSourceDirs: [],
  },
  {
    tool: 'gradle',
    outputMarker: '/build/resources/test/',
    sourceDir: 'src/test/resources',
    outputDir: 'build/resources/test',
    test: true,
    alternateSourceDirs: [],
  },
  {
    tool: 'gradle',
    outputMarker: '/build/classes/java/main/',
    sourceDir: 'src/main/resources',
    outputDir: 'build/resources/main',
    test: false,
    alternateSourceDirs: ['src/main/java'],
  },
  {
    tool: 'gradle',
    outputMarker: '/build/classes/java/test/',
    sourceDir: 'src/test/resources',
    outputDir: 'build/resources/test',
    test: true,
    alternateSourceDirs: ['src/test/java'],
  },
  {
    tool: 'gradle',
    outputMarker: '/build/classes/kotlin/main/',
    sourceDir: 'src/main/resources',
    outputDir: 'build/resources/main',
    test: false,
    alternateSourceDirs: ['src/main/kotlin'],
  },
  {
    tool: 'gradle',
    outputMarker: '/build/classes/kotlin/test/',
    sourceDir: 'src/test/resources',
    outputDir: 'build/resources/test',
    test: true,
    alternateSourceDirs: ['src/test/kotlin'],
  },
  // IntelliJ IDEA
  {
    tool: 'intellij',
    outputMarker: '/out/production/resources/',
    sourceDir: 'src/main/resources',
    outputDir: 'out/production/resources',
    test: false,
    alternateSourceDirs: [],
  },
  {
    tool: 'intellij',
    outputMarker: '/out/production/classes/',
    sourceDir: 'src/main/resources',
    outputDir: 'out/production/resources',
    test: false,
    alternateSourceDirs: MAIN_CODE_DIRS,
  },
  {
    tool: 'intellij',
    outputMarker: '/out/test/resources/',
    sourceDir: 'src/test/resources',
    outputDir: 'out/test/resources',
    test: true,
    alternateSourceDirs: [],
  },
  {
    tool: 'intellij',
    outputMarker: '/out/test/classes/',
    sourceDir: 'src/test/resources',
    outputDir: 'out/test/resources',
    test: true,
    alternateSourceDirs: TEST_CODE_DIRS,
  },
];

export const SOURCE_MARKERS: readonly string[] = [
  '/src/main/resources/',
  '/src/test/resources/',
  '/src/main/java/',
  '/src/test/java/',
  '/src/main/kotlin/',
  '/src/test/kotlin/',
];

/** Built-in converters are tried in this order after any custom ones. */
export const BUILD_TOOL_ORDER: readonly BuildTool[] = ['maven', 'gradle', 'intellij'];

/** Output directories probed by `toOutputPath`, first existing wins. */
export const OUTPUT_DIR_PRIORITY: readonly BuildTool[] = ['gradle', 'maven', 'intellij'];
