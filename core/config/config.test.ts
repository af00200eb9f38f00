import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigLoader, DEFAULT_LINE_WIDTH, DEFAULT_MAX_LINE_COUNT } from './loader';
import * as path from 'path';
import * as os from 'os';

// Mock fs module
vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn()
}));

import * as fs from 'fs';

describe('Configuration System', () => {
  describe('ConfigLoader', () => {
    const testProjectPath = '/test/project';
    const globalConfigPath = path.join(os.homedir(), '.config', 'chunkshell.json');
    const projectConfigPath = path.join(testProjectPath, 'chunkshell.config.json');

    let mockFiles: Record<string, string> = {};

    beforeEach(() => {
      mockFiles = {};
      vi.clearAllMocks();

      vi.mocked(fs.existsSync).mockImplementation((file: fs.PathLike) => {
        return String(file) in mockFiles;
      });

      vi.mocked(fs.readFileSync).mockImplementation((file: fs.PathOrFileDescriptor) => {
        const key = String(file);
        if (key in mockFiles) {
          return mockFiles[key];
        }
        throw new Error(`File not found: ${key}`);
      });
    });

    afterEach(() => {
      vi.clearAllMocks();
    });

    it('should load empty config when no files exist', () => {
      const loader = new ConfigLoader(testProjectPath);
      expect(loader.load()).toEqual({});
    });

    it('should load global config only', () => {
      mockFiles[globalConfigPath] = JSON.stringify({
        console: { lineWidth: 80 },
        session: { namespaces: ['Intl'] }
      });

      const config = new ConfigLoader(testProjectPath).load();

      expect(config.console?.lineWidth).toBe(80);
      expect(config.session?.namespaces).toEqual(['Intl']);
    });

    it('should merge global and project configs', () => {
      mockFiles[globalConfigPath] = JSON.stringify({
        console: { lineWidth: 80, maxLineCount: 10 },
        session: { declarationMode: true, namespaces: ['Intl'], references: ['node:path'] }
      });
      mockFiles[projectConfigPath] = JSON.stringify({
        console: { lineWidth: 120 },
        session: { declarationMode: false, namespaces: ['WebAssembly'] }
      });

      const config = new ConfigLoader(testProjectPath).load();

      // Project overrides scalars
      expect(config.console).toEqual({ lineWidth: 120, maxLineCount: 10 });
      expect(config.session?.declarationMode).toBe(false);
      // Arrays are merged
      expect(config.session?.namespaces).toEqual(['Intl', 'WebAssembly']);
      // Untouched arrays survive
      expect(config.session?.references).toEqual(['node:path']);
    });

    it('should ignore fields of the wrong type', () => {
      mockFiles[projectConfigPath] = JSON.stringify({
        console: { lineWidth: 'wide' },
        session: { namespaces: ['Intl', 3], showGeneratedSource: 'yes' },
        logging: { level: 'debug', file: 7 }
      });

      const config = new ConfigLoader(testProjectPath).load();

      expect(config.console).toEqual({});
      expect(config.session).toEqual({ namespaces: ['Intl'] });
      expect(config.logging).toEqual({ level: 'debug' });
    });

    it('should fall back to an empty config on invalid JSON', () => {
      mockFiles[projectConfigPath] = '{ not json';

      const config = new ConfigLoader(testProjectPath).load();

      expect(config).toEqual({});
    });

    it('should cache the merged config', () => {
      mockFiles[projectConfigPath] = JSON.stringify({ console: { lineWidth: 90 } });
      const loader = new ConfigLoader(testProjectPath);

      loader.load();
      loader.load();

      expect(fs.readFileSync).toHaveBeenCalledTimes(1);
    });

    it('should resolve defaults', () => {
      const loader = new ConfigLoader(testProjectPath);
      const resolved = loader.resolve({});

      expect(resolved).toEqual({
        console: { lineWidth: DEFAULT_LINE_WIDTH, maxLineCount: DEFAULT_MAX_LINE_COUNT },
        session: {
          declarationMode: false,
          showGeneratedSource: false,
          namespaces: [],
          references: [],
          includeFiles: []
        },
        logging: { level: undefined, file: undefined }
      });
    });
  });
});
