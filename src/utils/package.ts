import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

// src/utils and dist/utils both sit two levels below the package root
const __filename = fileURLToPath(import.meta.url);
const packageJsonPath = join(dirname(__filename), '..', '..', 'package.json');

let cachedVersion: string | undefined;

/**
 * Version from the package's own package.json
 */
export function getVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
  const version =
    typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
      ? parsed.version
      : '0.0.0';
  cachedVersion = version;
  return version;
}
