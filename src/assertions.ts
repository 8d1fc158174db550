/**
 * Checks for use inside test bodies. A failed check throws AssertionError,
 * which the runner reports as the test's failure message.
 */

export class AssertionError extends Error {
  constructor(
    message: string,
    public readonly expected?: unknown,
    public readonly actual?: unknown
  ) {
    super(message);
    this.name = 'AssertionError';
    Object.setPrototypeOf(this, AssertionError.prototype);
  }
}

type Ordered = number | bigint | string;

/** Fails the current test with `message`, printed as is. */
export function fail(message: string): never {
  throw new AssertionError(message);
}

export function printValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return `"${value}"`;
    case 'number':
    case 'bigint':
    case 'boolean':
    case 'undefined':
      return String(value);
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function ${value.name || 'anonymous'}]`;
    default:
      if (value === null) return 'null';
      try {
        return JSON.stringify(value);
      } catch {
        return Object.prototype.toString.call(value);
      }
  }
}

/** `expr (which is value)`, or just `expr` when both read the same. */
export function formatExpression(expr: string, value: unknown): string {
  const printed = printValue(value);
  return printed === expr ? expr : `${expr} (which is ${printed})`;
}

function check<T>(pass: boolean, a: T, op: string, b: T, aExpr?: string, bExpr?: string): void {
  if (pass) return;
  const left = formatExpression(aExpr ?? printValue(a), a);
  const right = formatExpression(bExpr ?? printValue(b), b);
  throw new AssertionError(`Expected: ${left} ${op} ${right}`, b, a);
}

type ErrorClass = abstract new (...args: never[]) => Error;

export const assert = {
  isTrue(value: unknown, expr = 'condition'): void {
    if (!value) throw new AssertionError(`Expected: ${expr}`, true, value);
  },

  isFalse(value: unknown, expr = 'condition'): void {
    if (value) throw new AssertionError(`Expected: !(${expr})`, false, value);
  },

  equal<T>(a: T, b: T, aExpr?: string, bExpr?: string): void {
    check(a === b, a, '==', b, aExpr, bExpr);
  },

  notEqual<T>(a: T, b: T, aExpr?: string, bExpr?: string): void {
    check(a !== b, a, '!=', b, aExpr, bExpr);
  },

  lessThan<T extends Ordered>(a: T, b: T, aExpr?: string, bExpr?: string): void {
    check(a < b, a, '<', b, aExpr, bExpr);
  },

  lessEqual<T extends Ordered>(a: T, b: T, aExpr?: string, bExpr?: string): void {
    check(a <= b, a, '<=', b, aExpr, bExpr);
  },

  greaterThan<T extends Ordered>(a: T, b: T, aExpr?: string, bExpr?: string): void {
    check(a > b, a, '>', b, aExpr, bExpr);
  },

  greaterEqual<T extends Ordered>(a: T, b: T, aExpr?: string, bExpr?: string): void {
    check(a >= b, a, '>=', b, aExpr, bExpr);
  },

  /** |a - b| < epsilon */
  near(a: number, b: number, epsilon: number, aExpr = printValue(a), bExpr = printValue(b)): void {
    check(Math.abs(a - b) < epsilon, Math.abs(a - b), '<', epsilon, `|${aExpr} - ${bExpr}|`, 'epsilon');
  },

  /** Expects `fn` to throw, and the error to be an instance of `type` when one is given. */
  throws(fn: () => unknown, type?: ErrorClass, expr = fn.name || 'function'): void {
    const expected = type?.name ?? 'An exception';
    try {
      fn();
    } catch (err) {
      if (type && !(err instanceof type)) {
        const got = err instanceof Error ? err.name : typeof err;
        throw new AssertionError(`${expected} expected. ${expr} threw the wrong exception (${got}).`, type, err);
      }
      return;
    }
    throw new AssertionError(`${expected} expected. No exception was thrown from ${expr}.`, type);
  },
};
