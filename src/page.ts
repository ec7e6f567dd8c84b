import type { ElementContent, Root } from 'hast';

import { h } from 'hastscript';
import { toHtml } from 'hast-util-to-html';
import { unified } from 'unified';

import { rehypeHtmlDependencies, type DependencyOptions } from './plugin';

export type PageOptions = {
  /** @default '' */
  title?: string;
  /** @default 'en' */
  lang?: string;
};

/**
 * Builds a fluid page: document shell, `<head>` with charset and title, and a
 * `container-fluid` wrapper holding `children` in `<body>`.
 */
export function page(options: PageOptions, ...children: ElementContent[]): Root {
  return {
    type: 'root',
    children: [
      { type: 'doctype' },
      h('html', { lang: options.lang ?? 'en' }, [
        h('head', [h('meta', { charset: 'utf-8' }), h('title', options.title ?? '')]),
        h('body', [h('div', { className: ['container-fluid'] }, children)])
      ])
    ]
  };
}

/**
 * Runs page assembly over a copy of `tree` and serializes it to HTML.
 *
 * `tree` itself is left untouched, so one UI tree can be served for every
 * request.
 */
export function assemblePage(tree: Root, options: DependencyOptions = {}): string {
  const processor = unified().use(rehypeHtmlDependencies, options);
  const assembled = structuredClone(tree);
  processor.runSync(assembled);

  return toHtml(assembled);
}
