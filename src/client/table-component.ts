import { TabulatorFull } from 'tabulator-tables';
import type { ColumnDefinition, Options } from 'tabulator-tables';

import 'tabulator-tables/dist/css/tabulator.min.css';

import {
  outputMessageSchema,
  serializedPayloadSchema,
  type OutputErrorInfo,
  type SerializedPayload
} from '../schemas/payload';
import {
  OUTPUT_MESSAGE_EVENT,
  TABULATOR_ERROR_CLASS,
  TABULATOR_OUTPUT_CLASS
} from '../output/constants';

/**
 * Browser side of the table output.
 *
 * Shipped as the script entry point of the `tabulator` asset bundle. On load it
 * listens on `document` for `OUTPUT_MESSAGE_EVENT`; the host transport
 * dispatches one event per output message, and the binding finds the mount
 * point by id and renders either a table or an error.
 */

type ColumnPresentation = Pick<ColumnDefinition, 'sorter' | 'hozAlign'>;

const presentationByHint: Record<string, ColumnPresentation> = {
  int: { sorter: 'number', hozAlign: 'right' },
  float: { sorter: 'number', hozAlign: 'right' },
  bool: { sorter: 'boolean', hozAlign: 'center' }
};

const defaultPresentation: ColumnPresentation = { sorter: 'string' };

/**
 * Field key of column `index`. Positional keys keep labels containing dots or
 * duplicates from clashing in Tabulator's row objects.
 */
export const fieldKey = (index: number): string => `c${index}`;

/**
 * Maps a payload onto Tabulator constructor options.
 */
export function toTabulatorOptions(payload: SerializedPayload): Options {
  const columns: ColumnDefinition[] = payload.columns.map((title, index) => ({
    title,
    field: fieldKey(index),
    ...(presentationByHint[payload.type_hints[index] ?? ''] ??
      defaultPresentation)
  }));

  const data = payload.data.map(row =>
    Object.fromEntries(row.map((cell, index) => [fieldKey(index), cell]))
  );

  return { data, columns, layout: 'fitDataFill', height: '100%' };
}

const tables = new WeakMap<HTMLElement, TabulatorFull>();

function clear(el: HTMLElement): void {
  tables.get(el)?.destroy();
  tables.delete(el);
  el.replaceChildren();
}

export const tableOutputBinding = {
  find(root: ParentNode): HTMLElement[] {
    return [...root.querySelectorAll<HTMLElement>(`.${TABULATOR_OUTPUT_CLASS}`)];
  },

  renderValue(el: HTMLElement, value: unknown): void {
    const parsed = serializedPayloadSchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.renderError(el, {
        type: 'PayloadError',
        message: issue ? issue.message : 'Invalid table payload'
      });
      return;
    }

    clear(el);
    tables.set(el, new TabulatorFull(el, toTabulatorOptions(parsed.data)));
  },

  renderError(el: HTMLElement, error: OutputErrorInfo): void {
    clear(el);

    const message = el.ownerDocument.createElement('div');
    message.className = TABULATOR_ERROR_CLASS;
    message.textContent = error.message;
    el.append(message);
  }
};

/**
 * Routes one output message to its mount point.
 *
 * @returns `false` when the message is malformed or no mount point with its
 *          id exists under `root`.
 */
export function handleMessage(root: ParentNode, message: unknown): boolean {
  const parsed = outputMessageSchema.safeParse(message);
  if (!parsed.success) return false;

  const target = tableOutputBinding
    .find(root)
    .find(el => el.id === parsed.data.id);
  if (!target) return false;

  if ('error' in parsed.data) {
    tableOutputBinding.renderError(target, parsed.data.error);
  } else {
    tableOutputBinding.renderValue(target, parsed.data.value);
  }

  return true;
}

document.addEventListener(OUTPUT_MESSAGE_EVENT, event => {
  if (event instanceof CustomEvent) handleMessage(document, event.detail);
});
