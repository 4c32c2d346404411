/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { existsSync } from "fs";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";

/**
 * Walk up from `fromDir` until `relativePath` exists beneath a directory.
 * Returns the absolute path, or undefined once the filesystem root is passed.
 */
export function findUpSync(
  relativePath: string,
  fromDir: string,
): string | undefined {
  let current = resolve(fromDir);

  for (;;) {
    const candidate = join(current, relativePath);
    if (existsSync(candidate)) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

/**
 * Locate a file shipped with this package. Sources run from `src/` and the
 * build runs from `dist/src/`, so the package root is found by walking up.
 */
export function resolvePackageFile(relativePath: string): string | undefined {
  const here = dirname(fileURLToPath(import.meta.url));
  return findUpSync(relativePath, here);
}

