import { readFileSync } from 'node:fs';

import type { Element, Root } from 'hast';
import { h } from 'hastscript';
import { tableFromJSON, type Table } from 'apache-arrow';
import { z } from 'zod';

import { rootScope, withNamespace, type Scope } from '../markup/scope';
import { tableOutput } from '../output/tabulator';
import { page } from '../page';
import type { OutputSession } from '../session/session';

const readingSchema = z.object({
  field: z.string(),
  station: z.string(),
  temperature: z.number(),
  humidity: z.number(),
  online: z.boolean()
});

export type Reading = z.infer<typeof readingSchema>;

export const FIELDS = ['north', 'south'] as const;
export const MAX_ROWS = 10;

const fixtureUrl = new URL('./fixtures/readings.json', import.meta.url);

export function loadReadings(): Reading[] {
  const raw: unknown = JSON.parse(readFileSync(fixtureUrl, 'utf8'));
  return z.array(readingSchema).parse(raw);
}

/**
 * Table of the first `rows` readings of one field, without the `field` column.
 */
export function fieldTable(
  readings: ReadonlyArray<Reading>,
  field: string,
  rows: number
): Table {
  if (!Number.isInteger(rows) || rows < 1 || rows > MAX_ROWS) {
    throw new RangeError(`rows must be an integer between 1 and ${MAX_ROWS}`);
  }

  const selected = readings
    .filter(reading => reading.field === field)
    .slice(0, rows)
    .map(({ station, temperature, humidity, online }) => ({
      station,
      temperature,
      humidity,
      online
    }));

  return tableFromJSON(selected);
}

/**
 * Reusable panel. Placed once per field, each time under its own namespace,
 * so both panels use the output name `readings` without clashing.
 */
export function readingsPanel(scope: Scope, title: string): Element {
  return h('section', { className: ['readings-panel'] }, [
    h('h2', title),
    tableOutput.uiFactory(scope, 'readings', { height: '320px' })
  ]);
}

export function readingsUi(): Root {
  return page(
    { title: 'Sensor readings' },
    h('h1', 'Sensor readings'),
    ...FIELDS.map(field =>
      withNamespace(rootScope, field, scope =>
        readingsPanel(scope, `${field} field`)
      )
    )
  );
}

export type ReadingsInput = {
  /** Number of rows to show per panel. */
  rows: () => number;
};

/**
 * Binds one table output per panel.
 *
 * @returns The resolved output ids, in panel order.
 */
export function readingsServer(
  session: OutputSession,
  input: ReadingsInput,
  readings: ReadonlyArray<Reading> = loadReadings()
): string[] {
  return FIELDS.map(field =>
    tableOutput.bind(session.child(field), 'readings', () =>
      fieldTable(readings, field, input.rows())
    )
  );
}
