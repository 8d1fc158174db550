import { beforeEach, describe, it } from 'mocha';
import { expect } from 'chai';
import { fail } from './assertions';
import { candidateOf, fixtureTest, invoke, parameterizedTest, plainTest } from './descriptors';
import { cartesianSet, cartesianSpace } from './parameter-space';

describe('candidateOf', () => {
  it('joins suite and name', () => {
    expect(candidateOf(plainTest('Io', 'Serialization', () => {}))).to.deep.equal({
      id: 'Io_Serialization',
      alias: 'Serialization',
    });
  });

  it('appends the combination suffix for parameterized tests', () => {
    const space = cartesianSpace(cartesianSet('Size', 1), cartesianSet('Color', 'red', 'blue'));
    const descriptor = parameterizedTest('Paint', 'Fill', space, () => {});
    descriptor.cursor.advance();
    expect(candidateOf(descriptor)).to.deep.equal({
      id: 'Paint_Fill_Size[0]_Color[1]',
      alias: 'Fill_Size[0]_Color[1]',
    });
  });
});

describe('invoke', () => {
  it('reports a returning body as ok', async () => {
    expect(await invoke(plainTest('S', 'A', () => {}))).to.deep.equal({ status: 'ok' });
  });

  it('awaits asynchronous bodies', async () => {
    const body = async (): Promise<void> => {
      await Promise.resolve();
      fail('late');
    };
    expect(await invoke(plainTest('S', 'A', body))).to.deep.equal({ status: 'fail', message: 'late' });
  });

  it('turns assertion failures into fail outcomes', async () => {
    const outcome = await invoke(plainTest('S', 'A', () => fail('Expected: x == y')));
    expect(outcome).to.deep.equal({ status: 'fail', message: 'Expected: x == y' });
  });

  it('turns other errors into unexpected outcomes', async () => {
    const thrower = (): void => {
      throw new TypeError('boom');
    };
    expect(await invoke(plainTest('S', 'A', thrower))).to.deep.equal({
      status: 'unexpected',
      message: 'Unexpected exception thrown: boom',
    });

    const throwsString = (): void => {
      throw 'bare';
    };
    expect(await invoke(plainTest('S', 'B', throwsString))).to.deep.equal({
      status: 'unexpected',
      message: 'Unexpected exception thrown: bare',
    });
  });

  it('passes the current combination and ordinal to parameterized bodies', async () => {
    const calls: Array<[string, number, number]> = [];
    const space = cartesianSpace(cartesianSet('Name', 'Alice', 'Bob'), cartesianSet('Age', 8));
    const descriptor = parameterizedTest('People', 'Greet', space, ([name, age], iteration) => {
      calls.push([name, age, iteration]);
    });

    await invoke(descriptor);
    descriptor.cursor.advance();
    await invoke(descriptor);
    expect(calls).to.deep.equal([
      ['Alice', 8, 0],
      ['Bob', 8, 1],
    ]);
  });
});

describe('fixture tests', () => {
  const log: string[] = [];

  class Io {
    readonly root = 'tmp';

    constructor() {
      log.push('setup');
    }

    dispose(): void {
      log.push('teardown');
    }
  }

  beforeEach(() => {
    log.length = 0;
  });

  it('uses the fixture class name as suite', () => {
    expect(fixtureTest(Io, 'Read', () => {}).suite).to.equal('Io');
    expect(fixtureTest(Io, 'Read', () => {}, { suite: 'Disk' }).suite).to.equal('Disk');
  });

  it('sets up a fresh fixture for every run and tears it down after', async () => {
    const roots: string[] = [];
    const descriptor = fixtureTest(Io, 'Read', (io) => {
      log.push('body');
      roots.push(io.root);
    });

    expect(log).to.deep.equal([]);
    await invoke(descriptor);
    await invoke(descriptor);
    expect(log).to.deep.equal(['setup', 'body', 'teardown', 'setup', 'body', 'teardown']);
    expect(roots).to.deep.equal(['tmp', 'tmp']);
  });

  it('tears down after a failing body and reports the body failure', async () => {
    const outcome = await invoke(fixtureTest(Io, 'Write', () => fail('disk full')));
    expect(outcome).to.deep.equal({ status: 'fail', message: 'disk full' });
    expect(log).to.deep.equal(['setup', 'teardown']);
  });

  it('accepts fixtures without teardown', async () => {
    class Plain {
      value = 3;
    }
    const outcome = await invoke(fixtureTest(Plain, 'Value', (p) => fail(`value ${p.value}`)));
    expect(outcome).to.deep.equal({ status: 'fail', message: 'value 3' });
  });
});
