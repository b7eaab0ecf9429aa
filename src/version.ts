import { readFileSync } from 'fs';
import { resolve } from 'path';

// npm sets npm_package_version for scripts; otherwise read package.json beside dist/ or src/
let version: string;

try {
  version =
    process.env.npm_package_version ||
    (() => {
      const packageJsonPath = resolve(__dirname, '../package.json');
      const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
      return 'unknown';
    })();
} catch {
  version = 'unknown';
}

export { version };
