import { readdir } from 'node:fs/promises';
import path from 'node:path';

import type { Element } from 'hast';

import type { AssetBundle } from '../types';

declare module 'hast' {
  interface ElementData {
    /**
     * Asset bundles this element needs on the page. Read (and emitted once
     * per bundle identity) by `rehypeHtmlDependencies`.
     */
    dependencies?: AssetBundle[];
  }
}

/**
 * Declares an asset bundle.
 *
 * Declaration happens once, at module load; the returned object is frozen so
 * the identity table read during page assembly never changes afterwards.
 */
export function defineAssetBundle(bundle: AssetBundle): AssetBundle {
  return Object.freeze({
    ...bundle,
    source: Object.freeze({ ...bundle.source }),
    script: Object.freeze(bundle.script.map(entry => Object.freeze({ ...entry }))),
    stylesheet: Object.freeze(
      bundle.stylesheet.map(entry => Object.freeze({ ...entry }))
    )
  });
}

/**
 * Identity of a bundle for deduplication: `name@version`.
 */
export function bundleKey(bundle: Pick<AssetBundle, 'name' | 'version'>): string {
  return `${bundle.name}@${bundle.version}`;
}

/**
 * Attaches `bundle` to `element` (in-place) and returns the element.
 *
 * Attaching the same identity twice is a no-op.
 */
export function attachDependency(element: Element, bundle: AssetBundle): Element {
  const data = (element.data ??= {});
  const dependencies = (data.dependencies ??= []);

  const key = bundleKey(bundle);
  if (!dependencies.some(existing => bundleKey(existing) === key)) {
    dependencies.push(bundle);
  }

  return element;
}

export function dependenciesOf(element: Element): ReadonlyArray<AssetBundle> {
  return element.data?.dependencies ?? [];
}

/**
 * URL under which a bundle's file is served: `<libPrefix>/<name>-<version>/<file>`.
 */
export function bundleHref(
  bundle: AssetBundle,
  file: string,
  libPrefix: string
): string {
  const directory = `${bundle.name}-${bundle.version}`;
  return libPrefix ? `${libPrefix}/${directory}/${file}` : `${directory}/${file}`;
}

/**
 * Lists the files a static server has to publish for `bundle`, as paths
 * relative to `source.subdir`.
 *
 * - `allFiles: false`: the script and stylesheet entry points only.
 * - `allFiles: true`: every file under the subdir (recursively), so that
 *   lazily loaded siblings resolve as well.
 *
 * @param root - Directory `source.subdir` is relative to (the package root).
 */
export async function bundleFiles(
  bundle: AssetBundle,
  root: string
): Promise<string[]> {
  const entryPoints = [
    ...bundle.script.map(entry => entry.src),
    ...bundle.stylesheet.map(entry => entry.href)
  ];

  if (!bundle.allFiles) return entryPoints;

  return listFiles(path.join(root, bundle.source.subdir), '');
}

async function listFiles(directory: string, prefix: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      files.push(...(await listFiles(path.join(directory, entry.name), relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }

  return files.sort();
}
