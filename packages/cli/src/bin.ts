#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { createProcessCliIo, createStagepackCliKernel } from './index.js';

interface PackageManifest {
  readonly name?: string;
  readonly version?: string;
  readonly description?: string;
}

const MANIFEST_NAME = '@stagepack/cli';

const readManifest = (manifestPath: string): PackageManifest | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(manifestPath, 'utf8'));
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return undefined;
  }

  const source: object = parsed;
  const field = (key: keyof PackageManifest): string | undefined => {
    const value: unknown = Reflect.get(source, key);
    return typeof value === 'string' ? value : undefined;
  };
  const name = field('name');
  const version = field('version');
  const description = field('description');

  return {
    ...(name === undefined ? {} : { name }),
    ...(version === undefined ? {} : { version }),
    ...(description === undefined ? {} : { description }),
  };
};

const loadPackageManifest = (): PackageManifest => {
  let directory = path.dirname(fileURLToPath(import.meta.url));

  while (true) {
    const manifest = readManifest(path.join(directory, 'package.json'));
    if (manifest?.name === MANIFEST_NAME) {
      return manifest;
    }

    const parentDirectory = path.dirname(directory);
    if (parentDirectory === directory) {
      return {};
    }

    directory = parentDirectory;
  }
};

const packageManifest = loadPackageManifest();

const io = createProcessCliIo({ process });

const kernel = createStagepackCliKernel({
  programName: 'stagepack',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

const exitCode = await kernel.run();

if (process.argv.length <= 2) {
  io.writeOut(
    'Run `stagepack stages`, `stagepack inspect` or `stagepack validate`. ' +
      'Add --help to any command for its options.\n',
  );
}

io.exit(exitCode);
