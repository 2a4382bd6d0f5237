import { describe, it, expect } from 'vitest';
import { symbolic } from '../src/symbolic';
import { multiplyOut, expandFully } from '../src/expand';
import { Budget } from '../src/rules';
import { rational } from '../src/rational';
import { canonical } from '../src/canonical';
import { polynomialCoefficients } from '../src/polynomial';
import { unwrap } from '../src/result';

describe('multiplyOut', () => {
	it('expands powers of sums', () => {
		const e = multiplyOut(symbolic.list(['^', ['+', 'a', 'b'], 2]));
		expect(e).toBe(canonical(symbolic.list(['+', ['^', 'a', 2], ['*', 2, 'a', 'b'], ['^', 'b', 2]])));
	});

	it('distributes products over sums and collects terms', () => {
		expect(multiplyOut(symbolic.list(['*', ['+', 'x', 1], ['-', 'x', 1]]))).toBe(symbolic.list(['+', -1, ['^', 'x', 2]]));
	});

	it('expands nested products', () => {
		const e = multiplyOut(symbolic.list(['*', 'a', ['+', 'b', ['*', 'c', ['+', 'd', 1]]]]));
		expect(e).toBe(canonical(symbolic.list(['+', ['*', 'a', 'b'], ['*', 'a', 'c', 'd'], ['*', 'a', 'c']])));
	});

	it('uses multinomial coefficients', () => {
		const e = multiplyOut(symbolic.list(['^', ['+', 'a', 'b', 'c'], 2]));
		expect(e.isCall('add')).toBe(true);
		expect(e.arity).toBe(6);
		const coefs = unwrap(polynomialCoefficients(symbolic.variable('x'), multiplyOut(symbolic.list(['^', ['+', 'x', 1], 5]))));
		expect(coefs.map(c => c.evaluate())).toEqual([1, 5, 10, 10, 5, 1]);
	});

	it('computes coefficients past float precision exactly', () => {
		const coefs = unwrap(polynomialCoefficients(symbolic.variable('x'), multiplyOut(symbolic.list(['^', ['+', 'x', 1], 60]))));
		expect(coefs).toHaveLength(61);
		expect(coefs[30]).toBe(symbolic.from(rational(118264581564861424n)));
	});

	it('leaves sums too large to expand', () => {
		const e = symbolic.list(['^', ['+', 'a', 'b'], 10]);
		expect(multiplyOut(e, { maxTerms: 5 })).toBe(canonical(e));
	});

	it('leaves non-integer powers alone', () => {
		const e = symbolic.list(['^', ['+', 'a', 'b'], ['/', 1, 2]]);
		expect(multiplyOut(e)).toBe(canonical(e));
	});
});

describe('expandFully', () => {
	it('returns the full expansion', () => {
		const e = symbolic.list(['*', ['+', 'x', 1], ['-', 'x', 1]]);
		expect(unwrap(expandFully(e))).toBe(multiplyOut(e));
	});

	it('fails when the term limit stops it', () => {
		const r = expandFully(symbolic.list(['^', ['+', 'a', 'b'], 10]), { maxTerms: 5 });
		expect(r.ok).toBe(false);
		if (!r.ok)
			expect(r.failure.kind).toBe('ExpansionLimit');
	});

	it('fails when the budget runs out', () => {
		const r = expandFully(symbolic.list(['*', ['+', 'x', 1], ['-', 'x', 1]]), { budget: new Budget(0) });
		expect(r.ok).toBe(false);
	});
});
