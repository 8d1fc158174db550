import { describe, it } from 'mocha';
import { expect } from 'chai';
import { ParameterSpaceExpander, cartesianSet, cartesianSpace } from './parameter-space';

const names = cartesianSet('Names', 'Alice', 'Bob', 'Charlie');
const ages = cartesianSet('Ages', 8, 21, 50);

describe('ParameterSpaceExpander', () => {
  it('varies the first axis fastest', () => {
    const expander = new ParameterSpaceExpander(cartesianSpace(names, ages));
    const seen: Array<[number, string, number]> = [];
    do {
      const [name, age] = expander.currentCombination();
      seen.push([expander.iterationOrdinal(), name, age]);
    } while (expander.advance());

    expect(seen).to.deep.equal([
      [0, 'Alice', 8],
      [1, 'Bob', 8],
      [2, 'Charlie', 8],
      [3, 'Alice', 21],
      [4, 'Bob', 21],
      [5, 'Charlie', 21],
      [6, 'Alice', 50],
      [7, 'Bob', 50],
      [8, 'Charlie', 50],
    ]);
  });

  it('calls advance() once per combination before reporting exhaustion', () => {
    const expander = new ParameterSpaceExpander(
      cartesianSpace(cartesianSet('A', 1, 2), cartesianSet('B', 'x', 'y', 'z'), cartesianSet('C', true, false))
    );
    expect(expander.size).to.equal(12);

    let calls = 0;
    let more = true;
    while (more) {
      more = expander.advance();
      calls++;
    }
    expect(calls).to.equal(12);
    expect(expander.iterationOrdinal()).to.equal(12);
    expect(expander.indices).to.deep.equal([0, 0, 0]);
  });

  it('returns to the first combination on reset', () => {
    const expander = new ParameterSpaceExpander(cartesianSpace(names, ages));
    expander.advance();
    expander.advance();
    expander.advance();
    expander.advance();
    expect(expander.currentCombination()).to.deep.equal(['Bob', 21]);

    expander.reset();
    expect(expander.currentCombination()).to.deep.equal(['Alice', 8]);
    expect(expander.iterationOrdinal()).to.equal(0);
    expander.reset();
    expect(expander.indices).to.deep.equal([0, 0]);
  });

  it('formats the current indices as an id suffix', () => {
    const expander = new ParameterSpaceExpander(
      cartesianSpace(cartesianSet('Size', 1), cartesianSet('Color', 'red', 'blue'))
    );
    expect(expander.size).to.equal(2);
    expect(expander.formatSuffix()).to.equal('_Size[0]_Color[0]');
    expect(expander.advance()).to.equal(true);
    expect(expander.formatSuffix()).to.equal('_Size[0]_Color[1]');
    expect(expander.currentCombination()).to.deep.equal([1, 'blue']);
    expect(expander.advance()).to.equal(false);
  });

  it('has no combinations when an axis is empty', () => {
    const expander = new ParameterSpaceExpander(cartesianSpace(names, cartesianSet<number>('Ages')));
    expect(expander.size).to.equal(0);
    expect(() => expander.currentCombination()).to.throw(
      RangeError,
      'Parameter space has an empty axis and no combinations'
    );
  });
});
