import { readFile } from 'node:fs/promises';

export const loadPackageDescription = async (packageJsonUrl: URL): Promise<string> => {
  const rawPackageJson = await readFile(packageJsonUrl, 'utf8');
  const packageJson: unknown = JSON.parse(rawPackageJson);

  if (
    typeof packageJson !== 'object' ||
    packageJson === null ||
    !('description' in packageJson) ||
    typeof packageJson.description !== 'string' ||
    packageJson.description.length === 0
  ) {
    throw new Error(`Missing description in package.json at ${packageJsonUrl.pathname}`);
  }

  return packageJson.description;
};
