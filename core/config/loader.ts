import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { logger } from '@core/utils/logger';
import type {
  ChunkshellConfig,
  ConsoleConfig,
  LoggingConfig,
  ResolvedConfig,
  SessionConfig
} from './types';

export const DEFAULT_LINE_WIDTH = 100;
export const DEFAULT_MAX_LINE_COUNT = 20;

/**
 * Load chunkshell configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: ChunkshellConfig;

  constructor(projectPath?: string) {
    // Global config location: ~/.config/chunkshell.json
    this.globalConfigPath = path.join(os.homedir(), '.config', 'chunkshell.json');

    // Project config location: <project>/chunkshell.config.json
    this.projectConfigPath = projectPath
      ? path.join(projectPath, 'chunkshell.config.json')
      : path.join(process.cwd(), 'chunkshell.config.json');
  }

  /**
   * Load and merge configurations
   */
  load(): ChunkshellConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);

    return this.cachedConfig;
  }

  private loadConfigFile(filePath: string): ChunkshellConfig {
    try {
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, 'utf8');
        return readConfig(JSON.parse(content));
      }
    } catch (error) {
      logger.warn(`Failed to load config from ${filePath}`, { error: String(error) });
    }

    return {};
  }

  private mergeConfigs(global: ChunkshellConfig, project: ChunkshellConfig): ChunkshellConfig {
    const merged: ChunkshellConfig = {};

    if (global.console || project.console) {
      merged.console = { ...global.console, ...project.console };
    }

    if (global.session || project.session) {
      merged.session = this.mergeSessionConfig(global.session, project.session);
    }

    if (global.logging || project.logging) {
      merged.logging = { ...global.logging, ...project.logging };
    }

    return merged;
  }

  private mergeSessionConfig(global?: SessionConfig, project?: SessionConfig): SessionConfig {
    const merged: SessionConfig = { ...global };

    if (project) {
      if (project.declarationMode !== undefined) merged.declarationMode = project.declarationMode;
      if (project.showGeneratedSource !== undefined) {
        merged.showGeneratedSource = project.showGeneratedSource;
      }

      // Arrays merge (project adds to global)
      if (project.namespaces) {
        merged.namespaces = [...(global?.namespaces || []), ...project.namespaces];
      }
      if (project.references) {
        merged.references = [...(global?.references || []), ...project.references];
      }
      if (project.includeFiles) {
        merged.includeFiles = [...(global?.includeFiles || []), ...project.includeFiles];
      }
    }

    return merged;
  }

  /**
   * Resolve configuration to runtime values
   */
  resolve(config: ChunkshellConfig): ResolvedConfig {
    return {
      console: {
        lineWidth: config.console?.lineWidth ?? DEFAULT_LINE_WIDTH,
        maxLineCount: config.console?.maxLineCount ?? DEFAULT_MAX_LINE_COUNT
      },
      session: {
        declarationMode: config.session?.declarationMode ?? false,
        showGeneratedSource: config.session?.showGeneratedSource ?? false,
        namespaces: config.session?.namespaces ?? [],
        references: config.session?.references ?? [],
        includeFiles: config.session?.includeFiles ?? []
      },
      logging: {
        level: config.logging?.level,
        file: config.logging?.file
      }
    };
  }
}

// Keeps only the fields whose types match; anything else in the file is ignored
function readConfig(raw: unknown): ChunkshellConfig {
  if (!isRecord(raw)) {
    return {};
  }
  const config: ChunkshellConfig = {};

  if (isRecord(raw.console)) {
    const consoleConfig: ConsoleConfig = {};
    if (typeof raw.console.lineWidth === 'number') consoleConfig.lineWidth = raw.console.lineWidth;
    if (typeof raw.console.maxLineCount === 'number') consoleConfig.maxLineCount = raw.console.maxLineCount;
    config.console = consoleConfig;
  }

  if (isRecord(raw.session)) {
    const session: SessionConfig = {};
    const source = raw.session;
    if (typeof source.declarationMode === 'boolean') session.declarationMode = source.declarationMode;
    if (typeof source.showGeneratedSource === 'boolean') {
      session.showGeneratedSource = source.showGeneratedSource;
    }
    const namespaces = stringList(source.namespaces);
    if (namespaces) session.namespaces = namespaces;
    const references = stringList(source.references);
    if (references) session.references = references;
    const includeFiles = stringList(source.includeFiles);
    if (includeFiles) session.includeFiles = includeFiles;
    config.session = session;
  }

  if (isRecord(raw.logging)) {
    const logging: LoggingConfig = {};
    if (typeof raw.logging.level === 'string') logging.level = raw.logging.level;
    if (typeof raw.logging.file === 'string') logging.file = raw.logging.file;
    config.logging = logging;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
}
