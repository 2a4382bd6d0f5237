import { describe, it, expect } from 'vitest';
import { symbolic } from '../src/symbolic';
import { Placeholders, linearCoefficients, solveLinear } from '../src/linear';
import { canonical } from '../src/canonical';
import { rational } from '../src/rational';
import { unwrap } from '../src/result';

const x = symbolic.variable('x');
const y = symbolic.variable('y');

describe('Placeholders', () => {
	it('numbers fresh variables', () => {
		const p = new Placeholders();
		expect(p.next()).toBe(symbolic.variable('_0'));
		expect(p.next()).toBe(symbolic.variable('_1'));
		expect(p.count).toBe(2);
		expect(new Placeholders('t', 5).next()).toBe(symbolic.variable('t5'));
	});
});

describe('linearCoefficients', () => {
	it('splits a residual into coefficients and a constant', () => {
		const form = unwrap(linearCoefficients([x, y], symbolic.list(['-', ['+', ['*', 3, 'x'], ['*', 4, 'y']], 100])));
		expect(form.coefficients).toEqual([symbolic.from(3), symbolic.from(4)]);
		expect(form.constant).toBe(symbolic.from(-100));
	});

	it('allows symbolic coefficients', () => {
		const form = unwrap(linearCoefficients([x], symbolic.list(['+', ['*', 'a', 'x'], ['*', 'b', 'x'], 'c'])));
		expect(form.coefficients).toEqual([symbolic.list(['+', 'a', 'b'])]);
		expect(form.constant).toBe(symbolic.variable('c'));
	});

	it('rejects products of unknowns and non-linear terms', () => {
		for (const e of [['*', 'x', 'y'], ['^', 'x', 2], ['sin', 'x']] as const) {
			const r = linearCoefficients([x, y], symbolic.list(e));
			expect(r.ok).toBe(false);
			if (!r.ok)
				expect(r.failure.kind).toBe('NotLinear');
		}
	});
});

describe('solveLinear', () => {
	it('solves a square system exactly', () => {
		const residuals = [
			symbolic.list(['-', ['+', ['*', 3, 'x'], ['*', 4, 'y']], 100]),
			symbolic.list(['-', ['-', 'x', 'y'], 20]),
		];
		const s = unwrap(solveLinear([x, y], residuals));
		expect(s.x).toBe(symbolic.from(rational(180, 7)));
		expect(s.y).toBe(symbolic.from(rational(40, 7)));
	});

	it('solves with symbolic coefficients', () => {
		const s = unwrap(solveLinear([x], [symbolic.list(['-', ['*', 'a', 'x'], 'b'])]));
		expect(s.x).toBe(canonical(symbolic.list(['/', 'b', 'a'])));
	});

	it('gives placeholders to free unknowns', () => {
		const s = unwrap(solveLinear([x, y], [symbolic.list(['-', ['+', 'x', 'y'], 3])]));
		expect(s.x).toBe(symbolic.list(['+', 3, ['*', -1, '_0']]));
		expect(s.y).toBe(symbolic.variable('_0'));
	});

	it('uses the placeholders it is given', () => {
		const placeholders = new Placeholders('t');
		const s = unwrap(solveLinear([x, y], [symbolic.list(['-', 'x', 'y'])], { placeholders }));
		expect(s.x).toBe(symbolic.variable('t0'));
		expect(s.y).toBe(symbolic.variable('t0'));
		expect(placeholders.count).toBe(1);
	});

	it('ignores redundant equations', () => {
		const residuals = [
			symbolic.list(['-', ['+', 'x', 'y'], 2]),
			symbolic.list(['-', ['+', ['*', 2, 'x'], ['*', 2, 'y']], 4]),
			symbolic.list(['-', 'x', 'y']),
		];
		const s = unwrap(solveLinear([x, y], residuals));
		expect(s.x).toBe(symbolic.one);
		expect(s.y).toBe(symbolic.one);
	});

	it('detects inconsistent systems', () => {
		const r = solveLinear([x, y], [symbolic.list(['-', ['+', 'x', 'y'], 1]), symbolic.list(['-', ['+', 'x', 'y'], 2])]);
		expect(r.ok).toBe(false);
		if (!r.ok)
			expect(r.failure.kind).toBe('InconsistentSystem');
	});

	it('does not drop a leftover condition on other symbols', () => {
		const r = solveLinear([x, y], [symbolic.list(['-', ['+', 'x', 'y'], 1]), symbolic.list(['-', ['+', 'x', 'y'], 'a'])]);
		expect(r.ok).toBe(false);
		if (!r.ok)
			expect(r.failure.kind).toBe('UnsolvableStrategy');
	});

	it('rejects non-linear systems', () => {
		const r = solveLinear([x, y], [symbolic.list(['-', ['*', 'x', 'y'], 1])]);
		expect(r.ok).toBe(false);
		if (!r.ok)
			expect(r.failure.kind).toBe('NotLinear');
	});

	it('needs variables as unknowns', () => {
		expect(() => solveLinear([symbolic.sin(x)], [x])).toThrow();
	});
});
