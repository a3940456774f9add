import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageManifestSchema = z.object({ version: z.string() });

function readVersion(): string {
  const manifestPath = new URL('../../package.json', import.meta.url);
  const parsed = PackageManifestSchema.safeParse(JSON.parse(readFileSync(manifestPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

export namespace Installation {
  export const VERSION: string = readVersion();
}
