import { DataType, Table, Type } from 'apache-arrow';

import { TableTypeError } from '../errors';
import type { JsonScalar, SerializedPayload } from '../schemas/payload';

/**
 * Hint vocabulary shipped in `type_hints`.
 *
 * Coarser than Arrow's own type names: the client only picks a sorter and an
 * alignment per column from it. Stable for a given schema.
 */
export const TYPE_HINTS = [
  'int',
  'float',
  'string',
  'bool',
  'datetime',
  'time',
  'binary',
  'null',
  'object'
] as const;

export type TypeHint = (typeof TYPE_HINTS)[number];

/**
 * Maps an Arrow data type to its hint.
 *
 * Dictionary-encoded columns (what Arrow infers for plain string arrays) are
 * hinted by their value type.
 */
export function typeHintOf(type: DataType): TypeHint {
  if (DataType.isDictionary(type)) return typeHintOf(type.dictionary);

  switch (type.typeId) {
    case Type.Int:
      return 'int';
    case Type.Float:
      return 'float';
    // Decimal cells have no exact number form; they ship as strings.
    case Type.Decimal:
    case Type.Utf8:
      return 'string';
    case Type.Bool:
      return 'bool';
    case Type.Date:
    case Type.Timestamp:
      return 'datetime';
    case Type.Time:
      return 'time';
    case Type.Binary:
      return 'binary';
    case Type.Null:
      return 'null';
    default:
      return 'object';
  }
}

const isTemporal = (hint: TypeHint): boolean => hint === 'datetime';

/**
 * Converts one Arrow cell to a JSON scalar.
 *
 * - `null` / `undefined` → `null`
 * - `bigint` → `number` within the safe integer range, decimal string beyond
 * - `NaN` / `±Infinity` → `null`
 * - dates (a `Date`, or epoch milliseconds in a datetime column) → ISO-8601
 */
export function toJsonScalar(value: unknown, hint: TypeHint): JsonScalar {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) return value.toISOString();

  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return isTemporal(hint) ? new Date(value).toISOString() : value;
  }

  if (typeof value === 'string' || typeof value === 'boolean') return value;

  return String(value);
}

/**
 * Transforms an Arrow `Table` into the client payload.
 *
 * Contract:
 * - Input must be a `Table`; anything else throws `TableTypeError` (no
 *   coercion of plain objects, arrays or records).
 * - `columns` are the field names in schema order.
 * - `type_hints[i]` is the hint of `columns[i]`.
 * - `data[r][c]` is the cell at row `r`, column `c`, rows in table order.
 *
 * Pure: the table is only read.
 */
export function serializeTable(value: unknown): SerializedPayload {
  if (!(value instanceof Table)) {
    throw new TableTypeError(value);
  }

  const fields = value.schema.fields;
  const columns = fields.map(field => field.name);
  const typeHints = fields.map(field => typeHintOf(field.type));
  const vectors = fields.map((_field, index) => value.getChildAt(index));

  const data: JsonScalar[][] = [];
  for (let row = 0; row < value.numRows; row++) {
    data.push(
      vectors.map((vector, column) =>
        toJsonScalar(vector?.get(row), typeHints[column] ?? 'object')
      )
    );
  }

  return { data, columns, type_hints: typeHints };
}
