import * as fs from 'fs';
import * as path from 'path';
import { SourcePathConverter } from '../resolver/build-system';
import { ConfigFileOptions } from '../types/command-options';
import { logger } from './debug-logger';
import { HandledError } from './errors';

export const CONFIG_FILE_NAMES = ['hotview.config.js', 'hotview.config.json'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isConverterArray(value: unknown): value is SourcePathConverter[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'function');
}

/**
 * Loads hotview configuration files (.js or .json)
 */
export class ConfigLoader {
  /**
   * @param configPath Explicit config file, relative to `projectRoot`. Searched for when omitted.
   * @returns The validated options, or null when no config file exists
   */
  static async loadConfig(
    configPath?: string,
    projectRoot: string = process.cwd(),
  ): Promise<ConfigFileOptions | null> {
    if (configPath) {
      const fullPath = path.resolve(projectRoot, configPath);
      if (!fs.existsSync(fullPath)) {
        throw new HandledError(`Config file not found: ${fullPath}`);
      }
      return this.loadConfigFile(fullPath);
    }

    for (const configName of CONFIG_FILE_NAMES) {
      const fullPath = path.join(projectRoot, configName);
      if (fs.existsSync(fullPath)) {
        logger.debug(`Found config file: ${fullPath}`);
        return this.loadConfigFile(fullPath);
      }
    }

    logger.debug('No config file found, using defaults');
    return null;
  }

  /**
   * Checks the shape of a loaded config; unknown keys are ignored with a warning.
   */
  static validate(raw: unknown, source: string): ConfigFileOptions {
    if (!isRecord(raw)) {
      throw new HandledError(`Config in ${source} must be an object`);
    }
    const config: ConfigFileOptions = {};
    const invalid = (key: string, expected: string) =>
      new HandledError(`Invalid '${key}' in ${source}: expected ${expected}`);

    for (const [key, value] of Object.entries(raw)) {
      if (value === undefined) {
        continue;
      }
      switch (key) {
        case 'debounceMs':
          if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
            throw invalid(key, 'a non-negative number');
          }
          config.debounceMs = value;
          break;
        case 'viewExtensions':
        case 'stylesheetExtensions':
        case 'includeNamespaces':
          if (!isStringArray(value)) {
            throw invalid(key, 'an array of strings');
          }
          config[key] = value;
          break;
        case 'includeFallbackTag':
          if (typeof value !== 'string' || value.length === 0) {
            throw invalid(key, 'a non-empty string');
          }
          config.includeFallbackTag = value;
          break;
        case 'cssReload':
        case 'syncToOutput':
          if (typeof value !== 'boolean') {
            throw invalid(key, 'a boolean');
          }
          config[key] = value;
          break;
        case 'converters':
          if (!isConverterArray(value)) {
            throw invalid(key, 'an array of functions');
          }
          config.converters = value;
          break;
        default:
          logger.warn(`Unknown config option '${key}' in ${source}`);
      }
    }
    return config;
  }

  private static async loadConfigFile(filePath: string): Promise<ConfigFileOptions> {
    const ext = path.extname(filePath).toLowerCase();
    switch (ext) {
      case '.js':
        return this.validate(await this.loadJavaScriptConfig(filePath), filePath);
      case '.json':
        return this.validate(this.loadJsonConfig(filePath), filePath);
      default:
        throw new HandledError(`Unsupported config file format: ${ext}`);
    }
  }

  private static loadJsonConfig(filePath: string): unknown {
    try {
      return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new HandledError(`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private static async loadJavaScriptConfig(filePath: string): Promise<unknown> {
    const absolutePath = path.resolve(filePath);
    // Pick up edits made since the last load
    delete require.cache[absolutePath];

    let exported: unknown;
    try {
      exported = require(absolutePath);
    } catch (error) {
      throw new HandledError(`Failed to load ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (isRecord(exported) && 'default' in exported) {
      exported = exported.default;
    }
    if (typeof exported === 'function') {
      return await exported();
    }
    return exported;
  }
}
