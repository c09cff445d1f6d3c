import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';

// Get the directory of the current module
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string()
});

type PackageJson = z.infer<typeof PackageJsonSchema>;

// Try multiple paths to find package.json (handles both src and dist)
function findPackageJson(): PackageJson {
  const possiblePaths = [
    join(__dirname, '..', '..', 'package.json'), // From src/utils
    join(__dirname, '..', 'package.json'),       // From dist
    join(process.cwd(), 'package.json'),         // From current working directory
  ];

  for (const path of possiblePaths) {
    if (!existsSync(path)) {
      continue;
    }
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (parsed.success) {
      return parsed.data;
    }
  }

  // Fallback if package.json cannot be found
  return { version: '0.1.0', name: 'secrets-watch' };
}

const packageJson = findPackageJson();

export const PACKAGE_VERSION = packageJson.version;
export const PACKAGE_NAME = packageJson.name;
