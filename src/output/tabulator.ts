import type { Table } from 'apache-arrow';

import { h } from 'hastscript';

import type {
  MarkupElement,
  MountPointOptions,
  OutputRenderer,
  Producer,
  SerializedPayload
} from '../types';
import { attachDependency, defineAssetBundle } from '../markup/dependencies';
import type { Scope } from '../markup/scope';
import { serializeTable } from '../table/serialize';
import { TABULATOR_OUTPUT_CLASS } from './constants';
import type { OutputSession } from '../session/session';

export const DEFAULT_HEIGHT = '200px';

/**
 * Client bundle of the table output.
 *
 * `allFiles` is set because the module script may import sibling chunks lazily;
 * publishing only the two entry points would break those imports.
 */
export const tabulatorBundle = defineAssetBundle({
  name: 'tabulator',
  version: '5.5.2',
  source: { subdir: 'assets/tabulator' },
  script: [{ src: 'table-component.js', type: 'module' }],
  stylesheet: [{ href: 'table-component.css' }],
  allFiles: true
});

/**
 * Placeholder element of a table output.
 *
 * The returned `div`:
 * 1) carries `tabulatorBundle` as a dependency, so page assembly ships the
 *    bundle once however many tables the page holds,
 * 2) has the id resolved in `scope` (unique across repeated modules),
 * 3) has the discovery class `tabulator-output`,
 * 4) is sized with an inline height.
 */
export function outputTabulator(
  scope: Scope,
  slotId: string,
  options: MountPointOptions = {}
): MarkupElement {
  const height = options.height ?? DEFAULT_HEIGHT;

  const element = h('div', {
    id: scope.resolve(slotId),
    className: [TABULATOR_OUTPUT_CLASS],
    style: `height: ${height}`
  });

  return attachDependency(element, tabulatorBundle);
}

export type TableRenderer = OutputRenderer<Table, SerializedPayload>;

/**
 * Table output: binds the Arrow transform and the placeholder to one named
 * output.
 *
 * UI side:
 *   tableOutput.uiFactory(scope, 'readings')
 *
 * Server side:
 *   tableOutput.bind(session, 'readings', () => readings.slice(0, rows()))
 *
 * Both sides resolve `outputName` against their own scope, so a module used
 * on the UI under `north` must be bound on a session child `north` as well.
 */
export class TableOutput implements TableRenderer {
  mountPoint(
    scope: Scope,
    outputName: string,
    options?: MountPointOptions
  ): MarkupElement {
    return outputTabulator(scope, outputName, options);
  }

  transform(value: Table): SerializedPayload {
    return serializeTable(value);
  }

  uiFactory(
    scope: Scope,
    outputName: string,
    options?: MountPointOptions
  ): MarkupElement {
    return this.mountPoint(scope, outputName, options);
  }

  bind(
    session: OutputSession,
    outputName: string,
    producer: Producer<Table>
  ): string {
    return session.register(outputName, producer, this);
  }
}

export const tableOutput = new TableOutput();
