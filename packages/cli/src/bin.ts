#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { createCliKernel, createProcessCliIo, deckDiffCommandModule } from './index.js';

const MANIFEST_NAME = '@deckdiff/cli';

const packageManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

type PackageManifest = z.infer<typeof packageManifestSchema>;

const readManifest = (manifestPath: string): PackageManifest | undefined => {
  try {
    const parsed = packageManifestSchema.safeParse(JSON.parse(readFileSync(manifestPath, 'utf8')));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
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

const io = createProcessCliIo();

const kernel = createCliKernel({
  programName: 'deck-diff',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

kernel.register(deckDiffCommandModule);

if (process.argv.length <= 2) {
  io.writeOut(
    'deck-diff renders CrowdAnki deck changes as a visual report. ' +
      'Run `deck-diff commit --help` or `deck-diff compare --help` to get started.\n',
  );
} else {
  process.exitCode = await kernel.run();
}
