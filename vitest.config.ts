/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const packages = ['data', 'create', 'stb', 'converter', 'cli'];

// Workspace packages export dist/ to Node; tests run against their sources
const alias = Object.fromEntries(
  packages.map(name => [
    `@stb-ifc/${name}`,
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
  ])
);

export default defineConfig({
  resolve: { alias },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
  },
});
