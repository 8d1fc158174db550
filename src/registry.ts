/**
 * Ordered registry of declared tests.
 *
 * Descriptors are linked in declaration order and never moved, sorted or
 * removed once registered.
 */

import type { TestDescriptor } from './descriptors';

export class RegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationError';
    Object.setPrototypeOf(this, RegistrationError.prototype);
  }
}

/** Descriptors already linked into some registry. */
const linked = new WeakSet<TestDescriptor>();

export class TestRegistry {
  private head: TestDescriptor | undefined;
  private tail: TestDescriptor | undefined;
  private count = 0;

  /** Appends at the tail. */
  register(descriptor: TestDescriptor): void {
    if (linked.has(descriptor) || descriptor.next !== undefined) {
      throw new RegistrationError(`Test ${descriptor.suite}_${descriptor.name} is already registered`);
    }
    if (this.tail) {
      this.tail.next = descriptor;
    } else {
      this.head = descriptor;
    }
    this.tail = descriptor;
    linked.add(descriptor);
    this.count++;
  }

  *iterate(): Generator<TestDescriptor, void, undefined> {
    let current = this.head;
    while (current) {
      yield current;
      current = current.next;
    }
  }

  get size(): number {
    return this.count;
  }

  get first(): TestDescriptor | undefined {
    return this.head;
  }

  get last(): TestDescriptor | undefined {
    return this.tail;
  }
}
