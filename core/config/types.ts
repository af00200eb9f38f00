/**
 * Configuration types for chunkshell
 */

export interface ChunkshellConfig {
  console?: ConsoleConfig;
  session?: SessionConfig;
  logging?: LoggingConfig;
}

export interface ConsoleConfig {
  lineWidth?: number;
  maxLineCount?: number;
}

export interface SessionConfig {
  declarationMode?: boolean;
  showGeneratedSource?: boolean;
  namespaces?: string[];
  references?: string[]; // module specifiers, optionally "<module> as <alias>"
  includeFiles?: string[];
}

export interface LoggingConfig {
  level?: string;
  file?: string;
}

// Runtime configuration after merging and applying defaults
export interface ResolvedConfig {
  console: {
    lineWidth: number;
    maxLineCount: number;
  };
  session: {
    declarationMode: boolean;
    showGeneratedSource: boolean;
    namespaces: string[];
    references: string[];
    includeFiles: string[];
  };
  logging: {
    level?: string;
    file?: string;
  };
}
