import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

function readVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch {
    // Running from an unusual layout; fall through to the placeholder
  }
  return '0.0.0';
}

export const version = readVersion();
