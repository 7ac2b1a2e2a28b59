import { Life, newLife } from './life';
import type { EdgePolicy } from './life';
import { InvalidDimensionsError, OutOfBoundsError } from './life-errors';

function fromRows(rows: string[], edgePolicy: EdgePolicy = 'toroidal') {
  return Life.fromPattern(rows.map(row => [...row].map(ch => ch === 'O')), { edgePolicy });
}

describe('Life', () => {
  describe('construction', () => {
    it('rejects non-positive or fractional dimensions', () => {
      expect(() => newLife(0, 5)).toThrowError(InvalidDimensionsError);
      expect(() => newLife(5, -1)).toThrowError(InvalidDimensionsError);
      expect(() => newLife(2.5, 3)).toThrowError(InvalidDimensionsError);
      expect(() => Life.fromPattern([])).toThrowError(InvalidDimensionsError);
    });

    it('records the rejected dimensions on the error', () => {
      try {
        newLife(0, 5);
        fail('expected construction to throw');
      } catch (error) {
        expect(error instanceof InvalidDimensionsError).toBeTrue();
        if (error instanceof InvalidDimensionsError) {
          expect(error.cols).toBe(0);
          expect(error.rows).toBe(5);
          expect(error.name).toBe('InvalidDimensionsError');
        }
      }
    });

    it('defaults to the toroidal edge policy and generation zero', () => {
      const life = newLife(4, 3, { seed: 1 });
      expect(life.edgePolicy).toBe('toroidal');
      expect(life.generation).toBe(0);
      expect(life.cols).toBe(4);
      expect(life.rows).toBe(3);
    });

    it('fills a quarter of the area in random draws from the injected source', () => {
      const life = newLife(8, 4, { random: () => 0 });
      expect(life.liveCount()).toBe(1);
      expect(life.alive(0, 0)).toBeTrue();

      const last = newLife(8, 4, { random: () => 0.9999999 });
      expect(last.liveCells()).toEqual([{ x: 7, y: 3 }]);
    });

    it('produces identical grids from identical seeds', () => {
      const a = newLife(16, 12, { seed: 42 });
      const b = newLife(16, 12, { seed: 42 });
      expect(a.equals(b)).toBeTrue();
      expect(newLife(16, 12, { seed: 'acorn' }).toString()).toBe(newLife(16, 12, { seed: 'acorn' }).toString());
    });

    it('seeds explicit live cells without a random fill', () => {
      const life = newLife(4, 4, { cells: [{ x: 1, y: 2 }] });
      expect(life.liveCells()).toEqual([{ x: 1, y: 2 }]);
    });

    it('rejects explicit live cells outside the grid', () => {
      expect(() => newLife(3, 3, { cells: [{ x: 3, y: 0 }] })).toThrowError(OutOfBoundsError);
      expect(() => newLife(3, 3, { pattern: [[false, false, false, true]] })).toThrowError(OutOfBoundsError);
    });

    it('ignores dead pattern cells beyond the grid and pads short rows', () => {
      const life = newLife(3, 2, { pattern: [[false, false, false, false], [true]] });
      expect(life.toString()).toBe('...\nO..');
    });
  });

  describe('alive', () => {
    const life = newLife(4, 3, { pattern: [] });

    it('fails for every coordinate outside the grid', () => {
      const outside = [
        [-1, 0], [4, 0], [0, -1], [0, 3], [-1, -1], [4, 3], [1000, -1000], [1.5, 0]
      ];
      for (const [x, y] of outside) {
        expect(() => life.alive(x, y)).toThrowError(OutOfBoundsError);
      }
    });

    it('accepts every corner of the grid', () => {
      expect(life.alive(0, 0)).toBeFalse();
      expect(life.alive(3, 0)).toBeFalse();
      expect(life.alive(0, 2)).toBeFalse();
      expect(life.alive(3, 2)).toBeFalse();
    });
  });

  describe('step', () => {
    it('keeps an all-dead grid dead', () => {
      const life = newLife(3, 3, { pattern: [] });
      life.step();
      expect(life.liveCount()).toBe(0);
      expect(life.generation).toBe(1);
    });

    it('oscillates a blinker with period two', () => {
      const vertical = ['.....', '..O..', '..O..', '..O..', '.....'].join('\n');
      const horizontal = ['.....', '.....', '.OOO.', '.....', '.....'].join('\n');

      for (const policy of ['toroidal', 'bounded'] as const) {
        const life = fromRows(vertical.split('\n'), policy);
        life.step();
        expect(life.toString()).toBe(horizontal);
        life.step();
        expect(life.toString()).toBe(vertical);
        expect(life.generation).toBe(2);
      }
    });

    it('leaves a block unchanged', () => {
      const life = fromRows(['....', '.OO.', '.OO.', '....']);
      const before = life.snapshot();
      life.step();
      expect(life.snapshot()).toEqual(before);
    });

    it('moves a glider one cell diagonally every four generations', () => {
      const life = fromRows(['.O....', '..O...', 'OOO...', '......', '......', '......'], 'bounded');
      life.steps(4);
      expect(life.liveCells()).toEqual([
        { x: 2, y: 1 },
        { x: 3, y: 2 },
        { x: 1, y: 3 },
        { x: 2, y: 3 },
        { x: 3, y: 3 }
      ]);
    });

    it('wraps neighbours across the edge only under the toroidal policy', () => {
      const rows = ['.OOO.', '.....', '.....'];

      const bounded = fromRows(rows, 'bounded');
      bounded.step();
      expect(bounded.toString()).toBe(['..O..', '..O..', '.....'].join('\n'));

      const toroidal = fromRows(rows, 'toroidal');
      toroidal.step();
      expect(toroidal.toString()).toBe(['..O..', '..O..', '..O..'].join('\n'));
    });

    it('stays in lockstep for identically seeded engines', () => {
      const a = newLife(20, 15, { seed: 2024, edgePolicy: 'bounded' });
      const b = newLife(20, 15, { seed: 2024, edgePolicy: 'bounded' });
      a.steps(2);
      b.steps(2);
      expect(a.equals(b)).toBeTrue();
      expect(a.liveCount()).toBe(b.liveCount());
    });

    it('keeps no state beyond the grid contents', () => {
      const original = newLife(20, 15, { seed: 7 });
      original.steps(5);
      const restored = Life.fromPattern(original.snapshot(), { edgePolicy: original.edgePolicy });
      expect(restored.generation).toBe(0);

      original.step();
      restored.step();
      expect(restored.equals(original)).toBeTrue();
    });
  });

  describe('steps', () => {
    it('advances the requested number of generations', () => {
      const life = newLife(5, 5, { seed: 3 });
      life.steps(3);
      expect(life.generation).toBe(3);
      life.steps(0);
      expect(life.generation).toBe(3);
    });

    it('rejects negative or fractional counts', () => {
      const life = newLife(5, 5, { seed: 3 });
      expect(() => life.steps(-1)).toThrowError(RangeError);
      expect(() => life.steps(1.5)).toThrowError(RangeError);
    });
  });

  it('hands out snapshots the engine does not share', () => {
    const life = newLife(2, 2, { pattern: [] });
    const snapshot = life.snapshot();
    snapshot[0][0] = true;
    expect(life.alive(0, 0)).toBeFalse();
  });

  it('compares dimensions as well as cells', () => {
    expect(newLife(2, 3, { pattern: [] }).equals(newLife(3, 2, { pattern: [] }))).toBeFalse();
  });
});
