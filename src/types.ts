import type { Element } from 'hast';
import type { JsonValue } from 'type-fest';

import type { Scope } from './markup/scope';
import type { OutputErrorInfo } from './schemas/payload';

/**
 * A placeholder element in the page tree.
 *
 * Markup is modelled as hast so that page assembly can run as a unified
 * plugin over the same tree the UI declaration produced.
 */
export type MarkupElement = Element;

/**
 * Client asset bundle.
 *
 * Identity is `name` + `version` (see `bundleKey`). Inclusion is deduplicated
 * by page assembly, so the same bundle is shipped once per page no matter how
 * many mount points reference it.
 */
export type AssetBundle = {
  readonly name: string;
  readonly version: string;
  /**
   * Where the files live, relative to the package root.
   */
  readonly source: { readonly subdir: string };
  readonly script: ReadonlyArray<{ readonly src: string; readonly type?: string }>;
  readonly stylesheet: ReadonlyArray<{ readonly href: string }>;
  /**
   * Publish every file under `source.subdir`, not only the entry points.
   * Needed when the script lazily loads sibling files.
   */
  readonly allFiles: boolean;
};

export type MountPointOptions = {
  /**
   * CSS height applied inline to the container.
   * @default '200px'
   */
  height?: string;
};

/**
 * Capability of a custom output: a UI-side placeholder plus a server-side
 * value → JSON transform.
 *
 * @template Value - What the bound producer returns.
 * @template Payload - What is shipped to the client.
 */
export interface OutputRenderer<Value, Payload extends JsonValue = JsonValue> {
  mountPoint(
    scope: Scope,
    outputName: string,
    options?: MountPointOptions
  ): MarkupElement;
  transform(value: Value): Payload;
}

/**
 * Server-side value source of an output. Called once per evaluation.
 */
export type Producer<Value> = () => Value | Promise<Value>;

/**
 * Per-output state, tracked by the session.
 *
 * idle ──► computing ──► ready
 *   ▲          │   └───► failed
 *   └── ready/failed re-enter computing on the next evaluation
 */
export type OutputState<Payload extends JsonValue = JsonValue> =
  | { status: 'idle'; cycle: 0 }
  | { status: 'computing'; cycle: number }
  | { status: 'ready'; cycle: number; payload: Payload }
  | { status: 'failed'; cycle: number; error: Error };

/**
 * Message delivered to subscribers once per finished evaluation.
 */
export type OutputMessage<Payload extends JsonValue = JsonValue> =
  | { id: string; cycle: number; value: Payload }
  | { id: string; cycle: number; error: OutputErrorInfo };

export type { SerializedPayload, JsonScalar } from './schemas/payload';
