import type { JsonValue } from 'type-fest';

import {
  DuplicateOutputError,
  ProducerError,
  SessionClosedError,
  UnknownOutputError
} from '../errors';
import { LOG_PREFIX, defaultLogger, type Logger } from '../logger';
import { rootScope, type Scope } from '../markup/scope';
import type {
  OutputMessage,
  OutputRenderer,
  OutputState,
  Producer
} from '../types';

export type SessionOptions = {
  /** @default console */
  logger?: Logger;
  /**
   * Scope output names are resolved in.
   * @default rootScope
   */
  scope?: Scope;
};

export type OutputListener = (message: OutputMessage) => void;

type BoundOutput = {
  id: string;
  run: () => Promise<JsonValue>;
};

const IDLE: OutputState = { status: 'idle', cycle: 0 };

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * State shared by a session and all of its namespaced children.
 */
class OutputRegistry {
  readonly outputs = new Map<string, BoundOutput>();
  readonly states = new Map<string, OutputState>();
  readonly listeners = new Set<OutputListener>();
  closed = false;

  constructor(readonly logger: Logger) {}

  stateOf(id: string): OutputState {
    return this.states.get(id) ?? IDLE;
  }

  deliver(message: OutputMessage): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(message);
      } catch (error) {
        this.logger.error(
          `${LOG_PREFIX} listener failed for "${message.id}":`,
          error
        );
      }
    }
  }
}

/**
 * Host-side driver of bound outputs for one page session.
 *
 * What it owns:
 * - The binding table (resolved output id → producer + transform).
 * - The per-output state machine (`idle → computing → ready | failed`).
 * - Delivery: one message per finished evaluation to every subscriber.
 *
 * What it does not own:
 * - Deciding *when* an output is stale. The host calls `evaluate(id)` (or
 *   `evaluateAll()`) after its own change detection.
 *
 * Evaluation semantics:
 * 1) The state enters `computing` with the next cycle number.
 * 2) The producer is awaited, then its value goes through the renderer's
 *    transform.
 * 3) Success → `ready` with the payload; any error → `failed`. A failure is
 *    logged and delivered once and never retried here; the previous payload
 *    is not reused.
 * 4) If another evaluation of the same output started meanwhile, this
 *    result is dropped (the newer cycle wins).
 */
export class OutputSession {
  private constructor(
    private readonly registry: OutputRegistry,
    readonly scope: Scope
  ) {}

  static create(options: SessionOptions = {}): OutputSession {
    return new OutputSession(
      new OutputRegistry(options.logger ?? defaultLogger),
      options.scope ?? rootScope
    );
  }

  /**
   * Session view for a nested module: same bindings and subscribers, output
   * names resolved one namespace deeper.
   */
  child(namespace: string): OutputSession {
    return new OutputSession(this.registry, this.scope.child(namespace));
  }

  /**
   * Binds `producer` under `outputName` (resolved in this session's scope).
   *
   * @returns The resolved output id.
   */
  register<Value, Payload extends JsonValue>(
    outputName: string,
    producer: Producer<Value>,
    renderer: Pick<OutputRenderer<Value, Payload>, 'transform'>
  ): string {
    const registry = this.open();
    const id = this.scope.resolve(outputName);

    if (registry.outputs.has(id)) {
      throw new DuplicateOutputError(id);
    }

    const run = async (): Promise<JsonValue> => {
      let value: Value;
      try {
        value = await producer();
      } catch (error) {
        throw new ProducerError(id, error);
      }
      return renderer.transform(value);
    };

    registry.outputs.set(id, { id, run });
    registry.states.set(id, IDLE);

    return id;
  }

  /**
   * Runs one evaluation cycle of output `id` (a resolved id).
   *
   * Never rejects because of the producer or transform: those end in the
   * `failed` state. Rejects only for usage errors (unknown id, closed session).
   */
  async evaluate(id: string): Promise<OutputState> {
    const registry = this.open();
    const output = registry.outputs.get(id);
    if (!output) throw new UnknownOutputError(id);

    const cycle = registry.stateOf(id).cycle + 1;
    registry.states.set(id, { status: 'computing', cycle });
    registry.logger.debug(`${LOG_PREFIX} ${id}: computing (cycle ${cycle})`);

    let next: OutputState;
    try {
      next = { status: 'ready', cycle, payload: await output.run() };
    } catch (error) {
      next = { status: 'failed', cycle, error: toError(error) };
    }

    const current = registry.states.get(id);
    if (registry.closed || !current || current.cycle !== cycle) {
      registry.logger.debug(`${LOG_PREFIX} ${id}: cycle ${cycle} superseded`);
      return current ?? next;
    }

    registry.states.set(id, next);

    if (next.status === 'failed') {
      registry.logger.error(`${LOG_PREFIX} ${id}: ${next.error.message}`);
      registry.deliver({
        id,
        cycle,
        error: { type: next.error.name, message: next.error.message }
      });
    } else if (next.status === 'ready') {
      registry.logger.debug(`${LOG_PREFIX} ${id}: ready (cycle ${cycle})`);
      registry.deliver({ id, cycle, value: next.payload });
    }

    return next;
  }

  /**
   * Evaluates every bound output, one after another, in binding order.
   */
  async evaluateAll(): Promise<Map<string, OutputState>> {
    const results = new Map<string, OutputState>();

    for (const id of [...this.open().outputs.keys()]) {
      results.set(id, await this.evaluate(id));
    }

    return results;
  }

  state(id: string): OutputState {
    const registry = this.open();
    if (!registry.outputs.has(id)) throw new UnknownOutputError(id);

    return registry.stateOf(id);
  }

  outputIds(): string[] {
    return [...this.open().outputs.keys()];
  }

  subscribe(listener: OutputListener): () => void {
    const registry = this.open();
    registry.listeners.add(listener);

    return () => {
      registry.listeners.delete(listener);
    };
  }

  /**
   * Ends the session for this view and every sibling/child sharing it.
   * In-flight evaluations finish without delivering.
   */
  close(): void {
    const registry = this.registry;
    registry.closed = true;
    registry.outputs.clear();
    registry.states.clear();
    registry.listeners.clear();
  }

  get closed(): boolean {
    return this.registry.closed;
  }

  private open(): OutputRegistry {
    if (this.registry.closed) throw new SessionClosedError();
    return this.registry;
  }
}
