import { describe, it, expect } from 'vitest';
import { symbolic } from '../src/symbolic';
import { rearrange } from '../src/rearrange';
import { simplify } from '../src/simplify';
import { unwrap } from '../src/result';

const x = symbolic.variable('x');

function solutions(equation: symbolic): symbolic[] {
	return unwrap(rearrange(x, equation)).map(eq => {
		expect(eq.isCall('eq')).toBe(true);
		expect(eq.operands[0]).toBe(x);
		return eq.operands[1];
	});
}

describe('rearrange', () => {
	it('undoes operators from the outside in', () => {
		expect(solutions(symbolic.list(['=', ['+', ['*', 2, 'x'], 3], 7])).map(i => simplify(i))).toEqual([symbolic.from(2)]);
		expect(solutions(symbolic.list(['=', 7, ['+', ['*', 2, 'x'], 3]])).map(i => simplify(i))).toEqual([symbolic.from(2)]);
		expect(solutions(symbolic.list(['=', ['sqrt', 'x'], 3])).map(i => simplify(i))).toEqual([symbolic.from(9)]);
		expect(solutions(symbolic.list(['=', ['log', 'x', 2], 3])).map(i => simplify(i))).toEqual([symbolic.from(8)]);
	});

	it('gives a branch for each sign of an even root', () => {
		expect(solutions(symbolic.list(['=', ['+', ['^', 'x', 2], 1], 5])).map(i => simplify(i))).toEqual([symbolic.from(2), symbolic.from(-2)]);
		expect(solutions(symbolic.list(['=', ['^', 'x', 3], 8])).map(i => simplify(i))).toEqual([symbolic.from(2)]);
	});

	it('gives a branch for each sign of abs', () => {
		expect(solutions(symbolic.list(['=', ['abs', ['-', 'x', 1]], 2])).map(i => simplify(i))).toEqual([symbolic.from(3), symbolic.from(-1)]);
	});

	it('takes logarithms of exponentials', () => {
		expect(solutions(symbolic.list(['=', ['^', 'e', 'x'], 5]))).toEqual([symbolic.log(5)]);
		expect(solutions(symbolic.list(['=', ['exp', 'x'], 5]))).toEqual([symbolic.log(5)]);
		const [r] = solutions(symbolic.list(['=', ['^', 2, 'x'], 8]));
		expect(r.evaluate()).toBeCloseTo(3, 12);
	});

	it('gives branches that satisfy the equation', () => {
		const equations = [
			symbolic.list(['=', ['cos', 'x'], ['/', 1, 2]]),
			symbolic.list(['=', ['sin', ['*', 2, 'x']], ['/', 1, 3]]),
			symbolic.list(['=', ['/', 3, ['-', 'x', 1]], 4]),
			symbolic.list(['=', ['tan', ['+', 'x', 1]], 2]),
		];
		for (const eq of equations) {
			const [lhs, rhs] = eq.operands;
			for (const r of solutions(eq))
				expect(lhs.substitute({ x: r }).evaluate()).toBeCloseTo(rhs.evaluate(), 9);
		}
	});

	it('matches vector components', () => {
		expect(solutions(symbolic.list(['=', ['x', 1], [4, 1]]))).toEqual([symbolic.from(4)]);
	});

	it('reports why it cannot isolate', () => {
		const cases: [symbolic, string][] = [
			[symbolic.list(['=', ['+', 'x', 'x'], 2]), 'MultipleOccurrences'],
			[symbolic.list(['=', 'y', 2]), 'NoOccurrence'],
			[symbolic.list(['=', ['.', ['x', 1], [1, 2]], 3]), 'NoInverse'],
		];
		for (const [eq, kind] of cases) {
			const r = rearrange(x, eq);
			expect(r.ok).toBe(false);
			if (!r.ok)
				expect(r.failure.kind).toBe(kind);
		}
	});

	it('needs an equation', () => {
		expect(() => rearrange(x, symbolic.list(['+', 'x', 1]))).toThrow('rearrange needs an equation, got x + 1');
	});
});
