import { describe, it } from 'mocha';
import { expect } from 'chai';
import * as api from './index';

describe('index', () => {
  it('configures the default harness only through the harness itself', () => {
    expect(api).to.not.have.property('setFilter');
    expect(api).to.not.have.property('setOutput');

    api.harness.setFilter('Io_*-*Slow');
    expect(api.harness.filter).to.deep.equal({ include: ['Io_*'], exclude: ['*Slow'] });
    api.harness.setFilter(undefined);
    expect(api.harness.filter).to.deep.equal({ include: ['*'], exclude: [] });
  });
});
