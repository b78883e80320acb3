import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

export function getCliVersion(): string {
  const envVersion = process.env.PANEFLASH_VERSION?.trim();
  if (envVersion) {
    return envVersion;
  }

  const here = dirname(fileURLToPath(import.meta.url));
  const pkgPath = resolve(here, '..', '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}
