import assert from 'node:assert/strict';
import { test } from './testHarness';
import { ReplayValue, constantValue } from '../src/shared/reactive/replayValue';
import { SerialExecutor } from '../src/shared/concurrency/serialExecutor';
import { settleWithin } from '../src/shared/concurrency/settleWithin';
import { createDeferred } from './fakes/async';
import { createRecordingLogger, messagesAt } from './fakes/recordingLogger';

test('replay value hands the latest value to new subscribers', () => {
  const value = new ReplayValue<number>('count');
  const seen: number[] = [];
  value.emit(1);
  value.emit(2);
  value.subscribe((next) => seen.push(next));

  assert.deepEqual(seen, [2]);
  assert.equal(value.peek(), 2);
});

test('replay value drops duplicates when equality is given', () => {
  const value = new ReplayValue<string>('name', { equals: (left, right) => left === right });
  const seen: string[] = [];
  value.subscribe((next) => seen.push(next));

  assert.equal(value.emit('a'), true);
  assert.equal(value.emit('a'), false);
  assert.equal(value.emit('b'), true);
  assert.deepEqual(seen, ['a', 'b']);
});

test('replay value isolates failing listeners', () => {
  const { log, entries } = createRecordingLogger();
  const value = new ReplayValue<number>('count', { log });
  const seen: number[] = [];
  value.subscribe(() => {
    throw new Error('listener broke');
  });
  value.subscribe((next) => seen.push(next));

  value.emit(7);

  assert.deepEqual(seen, [7]);
  assert.deepEqual(messagesAt(entries, 'warn'), ['value listener error']);
});

test('replay value does not deliver a value superseded during delivery', () => {
  const value = new ReplayValue<number>('count');
  const first: number[] = [];
  const second: number[] = [];
  value.subscribe((next) => {
    first.push(next);
    if (next === 1) value.emit(2);
  });
  value.subscribe((next) => second.push(next));

  value.emit(1);

  assert.deepEqual(first, [1, 2]);
  assert.deepEqual(second, [2]);
});

test('unsubscribed listeners stop receiving values', () => {
  const value = new ReplayValue<number>('count');
  const seen: number[] = [];
  const unsubscribe = value.subscribe((next) => seen.push(next));
  value.emit(1);
  unsubscribe();
  value.emit(2);

  assert.deepEqual(seen, [1]);
  assert.equal(value.listenerCount, 0);
});

test('constant values replay their only value', () => {
  const seen: string[] = [];
  constantValue('state', 'stopped').subscribe((next) => seen.push(next));
  assert.deepEqual(seen, ['stopped']);
});

test('serial executor runs tasks in order and survives failures', async () => {
  const executor = new SerialExecutor('test');
  const order: string[] = [];
  const gate = createDeferred<void>();

  const first = executor.run(async () => {
    await gate.promise;
    order.push('first');
  });
  const failing = executor.run(() => {
    order.push('failing');
    throw new Error('task failed');
  });
  const last = executor.run(() => {
    order.push('last');
    return 42;
  });

  const failed = assert.rejects(failing, /task failed/);

  assert.equal(executor.pending, 3);
  gate.resolve();
  await first;
  await failed;
  assert.equal(await last, 42);
  await executor.idle();

  assert.deepEqual(order, ['first', 'failing', 'last']);
  assert.equal(executor.pending, 0);
});

test('settleWithin reports value, error and timeout', async () => {
  assert.deepEqual(await settleWithin(Promise.resolve('done'), 50), { kind: 'value', value: 'done' });

  const failure = new Error('nope');
  assert.deepEqual(await settleWithin(Promise.reject(failure), 50), { kind: 'error', error: failure });

  const never = new Promise<string>(() => {});
  assert.deepEqual(await settleWithin(never, 5), { kind: 'timeout' });
});
