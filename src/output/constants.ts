/**
 * Class the client script looks for when discovering mount points.
 */
export const TABULATOR_OUTPUT_CLASS = 'tabulator-output';

/**
 * Class of the element the client puts in a mount point whose output failed.
 */
export const TABULATOR_ERROR_CLASS = 'tabulator-output-error';

/**
 * `CustomEvent` type the client script listens for on `document`. The host
 * transport dispatches one per output message, with the message as `detail`:
 *
 *   document.dispatchEvent(new CustomEvent(OUTPUT_MESSAGE_EVENT, { detail }))
 */
export const OUTPUT_MESSAGE_EVENT = 'tabular-output:message';
