import { describe, it, expect } from 'vitest';
import { symbolic } from '../src/symbolic';
import {
	polynomialCoefficients, polynomialDegree, polynomialFromCoefficients, toPolynomialNormalForm, rewriteExponentials,
} from '../src/polynomial';
import { unwrap } from '../src/result';

const x = symbolic.variable('x');

describe('polynomialCoefficients', () => {
	it('lists numeric coefficients lowest power first', () => {
		expect(unwrap(polynomialCoefficients(x, symbolic.list(['^', ['+', 'x', 1], 2])))).toEqual([symbolic.one, symbolic.from(2), symbolic.one]);
		expect(unwrap(polynomialCoefficients(x, symbolic.list(['+', ['^', 'x', 3], 'x'])))).toEqual([symbolic.zero, symbolic.one, symbolic.zero, symbolic.one]);
	});

	it('collects symbolic coefficients', () => {
		const e = symbolic.list(['+', ['*', 'a', ['^', 'x', 2]], ['*', 'b', 'x'], ['*', 'c', 'x']]);
		const coefs = unwrap(polynomialCoefficients(x, e));
		expect(coefs).toHaveLength(3);
		expect(coefs[0]).toBe(symbolic.zero);
		expect(coefs[1]).toBe(symbolic.list(['+', 'b', 'c']));
		expect(coefs[2]).toBe(symbolic.variable('a'));
	});

	it('gives no coefficients for the zero polynomial', () => {
		expect(unwrap(polynomialCoefficients(x, symbolic.list(['-', 'x', 'x'])))).toEqual([]);
	});

	it('rejects non-polynomials', () => {
		for (const e of [['/', 1, 'x'], ['sin', 'x'], ['sqrt', 'x'], ['^', 2, 'x']] as const) {
			const r = polynomialCoefficients(x, symbolic.list(e));
			expect(r.ok).toBe(false);
			if (!r.ok)
				expect(r.failure.kind).toBe('NotPolynomial');
		}
	});

	it('reports expansions it had to cut short', () => {
		const r = polynomialCoefficients(x, symbolic.list(['^', ['+', 'a', 'b', 'c', 'd', 'x'], 20]));
		expect(r.ok).toBe(false);
		if (!r.ok)
			expect(r.failure.kind).toBe('ExpansionLimit');
	});

	it('treats an exponential kernel as the variable', () => {
		const kernel = symbolic.list(['^', 2, 'x']);
		const e = symbolic.list(['+', ['^', 4, 'x'], ['^', 2, ['+', 'x', 1]], 1]);
		expect(unwrap(polynomialCoefficients(kernel, e))).toEqual([symbolic.one, symbolic.from(2), symbolic.one]);

		const r = polynomialCoefficients(kernel, symbolic.list(['+', 'x', ['^', 2, 'x']]));
		expect(r.ok).toBe(false);
	});
});

describe('polynomialDegree', () => {
	it('is one less than the number of coefficients', () => {
		expect(unwrap(polynomialDegree(x, symbolic.list(['+', ['^', 'x', 3], 'x'])))).toBe(3);
		expect(unwrap(polynomialDegree(x, symbolic.from(5)))).toBe(0);
		expect(unwrap(polynomialDegree(x, symbolic.zero))).toBe(-1);
	});
});

describe('normal form', () => {
	it('builds ascending powers and drops zero terms', () => {
		const coefs = [symbolic.from(3), symbolic.from(2), symbolic.zero, symbolic.one];
		expect(polynomialFromCoefficients(x, coefs)).toBe(symbolic.list(['+', 3, ['*', 2, 'x'], ['^', 'x', 3]]));
		expect(polynomialFromCoefficients(x, [])).toBe(symbolic.zero);
	});

	it('rebuilds an expression as a polynomial', () => {
		const e = symbolic.list(['-', ['^', ['+', 'x', 1], 2], 1]);
		expect(unwrap(toPolynomialNormalForm(x, e))).toBe(symbolic.list(['+', ['*', 2, 'x'], ['^', 'x', 2]]));
	});
});

describe('rewriteExponentials', () => {
	it('splits linear exponents', () => {
		const e = symbolic.list(['exp', ['+', ['*', 2, 'x'], 1]]);
		expect(rewriteExponentials(e, x)).toBe(symbolic.list(['*', ['exp', 1], ['^', ['exp', 'x'], 2]]));
	});

	it('reduces integer bases to their smallest root', () => {
		expect(rewriteExponentials(symbolic.list(['^', 8, 'x']), x)).toBe(symbolic.list(['^', ['^', 2, 'x'], 3]));
	});

	it('leaves bare kernels alone', () => {
		const e = symbolic.list(['+', ['exp', 'x'], ['^', 3, 'x']]);
		expect(rewriteExponentials(e, x)).toBe(e);
	});
});
