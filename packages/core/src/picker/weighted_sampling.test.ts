import { weightedOrder, type RandomSource } from './weighted_sampling';

function sequence(values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

type Item = { name: string; weight: number };
const weightOf = (item: Item) => item.weight;

describe('weightedOrder', () => {
  const a = { name: 'a', weight: 1 };
  const b = { name: 'b', weight: 3 };
  const c = { name: 'c', weight: 0 };

  it('should pick proportionally to weight among the remaining items', () => {
    // total 4: 0.2 * 4 = 0.8 falls in a's [0, 1); then only b is left
    expect(weightedOrder([a, b], weightOf, sequence([0.2, 0.5])).map(i => i.name)).toEqual(['a', 'b']);
    // 0.5 * 4 = 2 falls in b's [1, 4)
    expect(weightedOrder([a, b], weightOf, sequence([0.5, 0.5])).map(i => i.name)).toEqual(['b', 'a']);
  });

  it('should place zero weights after every positive weight', () => {
    const order = weightedOrder([c, a, b], weightOf, sequence([0]));

    expect(order.map(i => i.name)).toEqual(['a', 'b', 'c']);
  });

  it('should order non-positive weights uniformly at random', () => {
    const d = { name: 'd', weight: -1 };

    expect(weightedOrder([c, d], weightOf, sequence([0.99, 0])).map(i => i.name)).toEqual(['d', 'c']);
    expect(weightedOrder([c, d], weightOf, sequence([0, 0])).map(i => i.name)).toEqual(['c', 'd']);
  });

  it('should fall back to the last item when the draw reaches the total', () => {
    expect(weightedOrder([a, b], weightOf, sequence([1, 0])).map(i => i.name)).toEqual(['b', 'a']);
  });

  it('should return every item exactly once', () => {
    const items = [a, b, c, { name: 'd', weight: 2 }];

    const order = weightedOrder(items, weightOf, Math.random);

    expect(order.map(i => i.name).sort()).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should not modify the input', () => {
    const items = [a, b];
    weightedOrder(items, weightOf, Math.random);

    expect(items).toEqual([a, b]);
  });
});
