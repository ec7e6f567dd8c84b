import { tableFromArrays, type Table } from 'apache-arrow';
import { beforeEach, describe, it, expect, vi } from 'vitest';

import {
  DuplicateOutputError,
  ProducerError,
  SessionClosedError,
  TableTypeError,
  UnknownOutputError
} from '../errors';
import type { Logger } from '../logger';
import { tableOutput } from '../output/tabulator';
import { OutputSession } from '../session/session';
import type { OutputMessage } from '../types';

const sampleTable = (): Table =>
  tableFromArrays({
    a: Int32Array.from([1, 3]),
    b: Float64Array.from([2.5, 4.5])
  });

const samplePayload = {
  data: [
    [1, 2.5],
    [3, 4.5]
  ],
  columns: ['a', 'b'],
  type_hints: ['int', 'float']
};

describe('OutputSession', () => {
  let logger: Logger;
  let session: OutputSession;
  let messages: OutputMessage[];

  beforeEach(() => {
    logger = { debug: vi.fn(), error: vi.fn() };
    session = OutputSession.create({ logger });
    messages = [];
    session.subscribe(message => messages.push(message));
  });

  it('should start bound outputs idle', () => {
    const id = tableOutput.bind(session, 'grid', sampleTable);

    expect(id).toBe('grid');
    expect(session.state(id)).toEqual({ status: 'idle', cycle: 0 });
  });

  it('should evaluate to ready and deliver the payload once', async () => {
    tableOutput.bind(session, 'grid', sampleTable);

    const state = await session.evaluate('grid');

    expect(state).toEqual({ status: 'ready', cycle: 1, payload: samplePayload });
    expect(messages).toEqual([{ id: 'grid', cycle: 1, value: samplePayload }]);
  });

  it('should be computing while the producer runs', async () => {
    let resolveTable: (table: Table) => void = () => undefined;
    tableOutput.bind(
      session,
      'grid',
      () =>
        new Promise<Table>(resolve => {
          resolveTable = resolve;
        })
    );

    const pending = session.evaluate('grid');
    expect(session.state('grid')).toEqual({ status: 'computing', cycle: 1 });

    resolveTable(sampleTable());
    await expect(pending).resolves.toMatchObject({ status: 'ready', cycle: 1 });
  });

  it('should fail when the producer throws and recover on the next cycle', async () => {
    let calls = 0;
    tableOutput.bind(session, 'grid', () => {
      calls += 1;
      if (calls === 1) throw new Error('source unavailable');
      return sampleTable();
    });

    const failed = await session.evaluate('grid');
    expect(failed.status).toBe('failed');
    expect(failed).toMatchObject({
      cycle: 1,
      error: expect.any(ProducerError)
    });

    const recovered = await session.evaluate('grid');
    expect(recovered).toEqual({
      status: 'ready',
      cycle: 2,
      payload: samplePayload
    });

    expect(messages).toEqual([
      {
        id: 'grid',
        cycle: 1,
        error: {
          type: 'ProducerError',
          message: 'Output "grid" failed: source unavailable'
        }
      },
      { id: 'grid', cycle: 2, value: samplePayload }
    ]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      '[output-session] grid: Output "grid" failed: source unavailable'
    );
  });

  it('should keep the cause of a producer failure', async () => {
    const cause = new Error('disk full');
    tableOutput.bind(session, 'grid', () => {
      throw cause;
    });

    const state = await session.evaluate('grid');

    expect(state.status === 'failed' && state.error.cause).toBe(cause);
  });

  it('should fail with a type mismatch when the producer returns no table', async () => {
    tableOutput.bind(session, 'grid', () => JSON.parse('{"a": [1, 2]}'));

    const state = await session.evaluate('grid');

    expect(state).toMatchObject({
      status: 'failed',
      error: expect.any(TableTypeError)
    });
    expect(messages).toEqual([
      {
        id: 'grid',
        cycle: 1,
        error: {
          type: 'TableTypeError',
          message: 'Expected an Arrow Table, got Object.'
        }
      }
    ]);
  });

  it('should drop a result superseded by a newer evaluation', async () => {
    let resolveFirst: (table: Table) => void = () => undefined;
    let calls = 0;
    tableOutput.bind(session, 'grid', () => {
      calls += 1;
      if (calls === 1) {
        return new Promise<Table>(resolve => {
          resolveFirst = resolve;
        });
      }
      return sampleTable();
    });

    const first = session.evaluate('grid');
    const second = await session.evaluate('grid');
    resolveFirst(tableFromArrays({ a: Int32Array.from([0]) }));

    expect(second).toMatchObject({ status: 'ready', cycle: 2 });
    expect(await first).toMatchObject({ status: 'ready', cycle: 2 });
    expect(messages).toEqual([{ id: 'grid', cycle: 2, value: samplePayload }]);
  });

  it('should namespace outputs bound through a child session', () => {
    const id = tableOutput.bind(session.child('north'), 'grid', sampleTable);

    expect(id).toBe('north-grid');
    expect(session.outputIds()).toEqual(['north-grid']);
  });

  it('should reject binding the same output twice', () => {
    tableOutput.bind(session, 'grid', sampleTable);

    expect(() => tableOutput.bind(session, 'grid', sampleTable)).toThrow(
      DuplicateOutputError
    );
  });

  it('should reject evaluating an unknown output', async () => {
    await expect(session.evaluate('missing')).rejects.toThrow(UnknownOutputError);
  });

  it('should evaluate every output in binding order', async () => {
    tableOutput.bind(session, 'first', sampleTable);
    tableOutput.bind(session, 'second', () => {
      throw new Error('nope');
    });

    const results = await session.evaluateAll();

    expect([...results.keys()]).toEqual(['first', 'second']);
    expect(results.get('first')?.status).toBe('ready');
    expect(results.get('second')?.status).toBe('failed');
  });

  it('should stop delivering after unsubscribe', async () => {
    const listener = vi.fn();
    const unsubscribe = session.subscribe(listener);
    tableOutput.bind(session, 'grid', sampleTable);

    unsubscribe();
    await session.evaluate('grid');

    expect(listener).not.toHaveBeenCalled();
    expect(messages).toHaveLength(1);
  });

  it('should log a failing listener and still notify the others', async () => {
    const failure = new Error('socket closed');
    session.subscribe(() => {
      throw failure;
    });
    const after = vi.fn();
    session.subscribe(after);
    tableOutput.bind(session, 'grid', sampleTable);

    await session.evaluate('grid');

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      '[output-session] listener failed for "grid":',
      failure
    );
  });

  it('should refuse work once closed', async () => {
    tableOutput.bind(session, 'grid', sampleTable);

    session.close();

    expect(session.closed).toBe(true);
    await expect(session.evaluate('grid')).rejects.toThrow(SessionClosedError);
    expect(() => session.subscribe(() => undefined)).toThrow(SessionClosedError);
    expect(() => session.child('north').outputIds()).toThrow(SessionClosedError);
  });
});
