import type { Plugin, Transformer } from 'unified';
import type { Element, Root, RootContent } from 'hast';
import type { Node } from 'unist';

import { h } from 'hastscript';
import { is } from 'unist-util-is';
import { visit, SKIP } from 'unist-util-visit';

import type { AssetBundle } from './types';
import { bundleHref, bundleKey, dependenciesOf } from './markup/dependencies';

export type DependencyOptions = {
  /**
   * URL prefix under which bundle directories are served.
   * @default 'lib'
   */
  libPrefix?: string;
};

/**
 * Type guard: narrows a unist node to a hast element.
 */
const isElement = (node: Node): node is Element =>
  is(node, { type: 'element' });

const isHead = (node: Node): node is Element =>
  isElement(node) && node.tagName === 'head';

/**
 * Collects the bundles attached anywhere in `tree`, deduplicated by identity.
 *
 * Order:
 * - First-seen (document) order, so a page's bundles are emitted in the order
 *   their first mount point appears.
 *
 * Boundaries:
 * - `<head>` is not traversed: it is where the bundles are emitted, and any
 *   element already placed there is not a mount point.
 */
export function collectDependencies(tree: Root | Element): AssetBundle[] {
  const seen = new Map<string, AssetBundle>();

  visit(tree, isElement, element => {
    if (element.tagName === 'head') return SKIP;

    for (const bundle of dependenciesOf(element)) {
      const key = bundleKey(bundle);
      if (!seen.has(key)) seen.set(key, bundle);
    }
  });

  return [...seen.values()];
}

/**
 * Renders the tags of one bundle: stylesheets first, then scripts.
 */
export function dependencyTags(
  bundle: AssetBundle,
  libPrefix: string
): Element[] {
  const links = bundle.stylesheet.map(entry =>
    h('link', {
      href: bundleHref(bundle, entry.href, libPrefix),
      rel: 'stylesheet'
    })
  );

  const scripts = bundle.script.map(entry =>
    h('script', {
      src: bundleHref(bundle, entry.src, libPrefix),
      type: entry.type
    })
  );

  return [...links, ...scripts];
}

function tagUrl(tag: Element): string | undefined {
  const url = tag.properties.src ?? tag.properties.href;
  return typeof url === 'string' ? url : undefined;
}

/**
 * URLs of the bundle tags already present among `siblings`.
 */
function emittedUrls(siblings: ReadonlyArray<RootContent>): Set<string> {
  const urls = new Set<string>();

  for (const node of siblings) {
    const url = node.type === 'element' ? tagUrl(node) : undefined;
    if (url !== undefined) urls.add(url);
  }

  return urls;
}

function findHead(tree: Root): Element | undefined {
  let head: Element | undefined;

  visit(tree, isHead, node => {
    head = node;
    return false;
  });

  return head;
}

/**
 * Page-assembly step for asset bundles.
 *
 * ─────────────────────────────────────────────────────────────────────────────
 * Model: the page tree is its own assembly context
 * ─────────────────────────────────────────────────────────────────────────────
 *
 * Mount points carry their bundles in `element.data.dependencies` (see
 * `attachDependency`). Nothing is registered globally; the set of bundles a
 * page needs is exactly the set attached to elements in that page's tree.
 *
 * 1) Collection
 *    - One traversal of the tree (outside `<head>`) gathers every attached
 *      bundle, keyed by `name@version`.
 *
 * 2) Emission
 *    - Each bundle identity is emitted once: `<link>` per stylesheet, then
 *      `<script>` per script.
 *    - Tags are appended to `<head>`; a fragment without `<head>` gets them
 *      prepended at the root instead.
 *    - A tag whose URL is already there is not emitted again, so running the
 *      plugin twice over one tree leaves a single copy.
 *
 * Example:
 *
 *   <body>
 *     <div id="north-readings" class="tabulator-output" />   (tabulator@5.5.2)
 *     <div id="south-readings" class="tabulator-output" />   (tabulator@5.5.2)
 *   </body>
 *
 * becomes
 *
 *   <head>
 *     <link href="lib/tabulator-5.5.2/table-component.css" rel="stylesheet">
 *     <script src="lib/tabulator-5.5.2/table-component.js" type="module"></script>
 *   </head>
 */
export const rehypeHtmlDependencies: Plugin<[DependencyOptions?], Root> = (
  options: DependencyOptions = {}
) => {
  const libPrefix = options.libPrefix ?? 'lib';

  const transformer: Transformer<Root> = tree => {
    const bundles = collectDependencies(tree);
    if (bundles.length === 0) return;

    const head = findHead(tree);
    const emitted = emittedUrls(head ? head.children : tree.children);
    const tags = bundles
      .flatMap(bundle => dependencyTags(bundle, libPrefix))
      .filter(tag => {
        const url = tagUrl(tag);
        return url === undefined || !emitted.has(url);
      });
    if (tags.length === 0) return;

    if (head) {
      head.children.push(...tags);
      return;
    }

    tree.children.unshift(...tags);
  };

  return transformer;
};
