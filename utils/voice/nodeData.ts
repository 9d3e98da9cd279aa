/**
 * Node Data - the caller-defined value attached to a guild's node.
 *
 * Readers share the slot, writers hold it alone. The lock is a weighted
 * semaphore: a read takes one permit, a write takes all of them.
 */
import { Semaphore } from 'async-mutex';
import { NODE_DATA_MAX_READERS } from './constants';

export type NodeDataValue<T> = { kind: 'absent' } | { kind: 'present'; value: T };

export class NodeData<T> {
  private value: NodeDataValue<T> = { kind: 'absent' };
  private readonly lock = new Semaphore(NODE_DATA_MAX_READERS);

  constructor(private readonly createDefault: () => T) {}

  /** Current value without initializing it */
  read(): Promise<NodeDataValue<T>> {
    return this.lock.runExclusive(() => this.value, 1);
  }

  async get(): Promise<T | undefined> {
    const current = await this.read();
    return current.kind === 'present' ? current.value : undefined;
  }

  /**
   * Initialize the slot with the default value if it is absent, and return
   * what it holds.
   */
  ensure(): Promise<T> {
    return this.write(() => this.initialized());
  }

  set(value: T): Promise<void> {
    return this.write(() => {
      this.value = { kind: 'present', value };
    });
  }

  /** Replace the value with the mutator's result, initializing it first if absent */
  update(mutator: (current: T) => T | Promise<T>): Promise<T> {
    return this.write(async () => {
      const next = await mutator(this.initialized());
      this.value = { kind: 'present', value: next };
      return next;
    });
  }

  clear(): Promise<void> {
    return this.write(() => {
      this.value = { kind: 'absent' };
    });
  }

  private initialized(): T {
    if (this.value.kind === 'absent') {
      this.value = { kind: 'present', value: this.createDefault() };
    }
    return this.value.value;
  }

  private write<R>(fn: () => R | Promise<R>): Promise<R> {
    return this.lock.runExclusive(fn, NODE_DATA_MAX_READERS);
  }
}
