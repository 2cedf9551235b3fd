import { describe, it, expect } from 'vitest';
import { concatenate, createTensor, itemLength } from './tensor.js';

function filled(size: number, value: number) {
  const tensor = createTensor(1, size);
  tensor.data.fill(value);
  return tensor;
}

describe('tensor', () => {
  it('creates a zeroed NCHW tensor', () => {
    const tensor = createTensor(2, 4);

    expect(tensor.dims).toEqual([2, 3, 4, 4]);
    expect(tensor.data.length).toBe(96);
    expect(itemLength(tensor)).toBe(48);
  });

  it('stacks single-item tensors in order', () => {
    const batch = concatenate([filled(2, 1), filled(2, 2), filled(2, 3)]);

    expect(batch.dims).toEqual([3, 3, 2, 2]);
    expect(batch.data[0]).toBe(1);
    expect(batch.data[12]).toBe(2);
    expect(batch.data[35]).toBe(3);
  });

  it('returns a single tensor unchanged', () => {
    const only = filled(2, 7);

    expect(concatenate([only])).toBe(only);
  });

  it('rejects an empty list', () => {
    expect(() => concatenate([])).toThrow(RangeError);
  });

  it('rejects mismatched shapes', () => {
    expect(() => concatenate([filled(2, 0), filled(3, 0)])).toThrow(
      'Tensor 1 has shape [1,3,3,3], expected [1,3,2,2]'
    );
  });
});
