import { symbolic, symbolicConstant, symbolicCall, symbolicVariable, constValue, sum, product, power } from './symbolic';
import { canonical } from './canonical';
import { expandFully } from './expand';
import { simplify } from './simplify';
import { ok, fail, type Result } from './result';
import * as num from './rational';
import type { numeric } from './rational';

//-----------------------------------------------------------------------------
// exponential kernels
//-----------------------------------------------------------------------------

const maxPerfectPower = 2n ** 32n;

// smallest integer root: 8 → [2, 3], 6 → [6, 1]
function perfectPower(n: numeric): [numeric, number] {
	if (!num.isExact(n) || !num.isInteger(n) || num.compare(n, num.one) <= 0 || n.n > maxPerfectPower)
		return [n, 1];
	for (let k = num.numerator(n).toString(2).length - 1; k > 1; k--) {
		const r = num.exactRoot(n, k);
		if (r !== undefined)
			return [r, k];
	}
	return [n, 1];
}

// exponent = k·x + c with integer k
function linearExponent(x: symbolic, exponent: symbolic): [number, symbolic] | undefined {
	const r = polynomialCoefficients(x, exponent);
	if (!r.ok || r.value.length !== 2)
		return undefined;
	const [c, k] = r.value;
	const kv = constValue(k);
	const n = kv === undefined ? undefined : num.smallInteger(kv);
	return n === undefined ? undefined : [n, c];
}

// a^(k·x + c) → a^c·(a^x)^k and exp(k·x + c) → exp(c)·exp(x)^k, with integer bases reduced to their smallest root (4^x → (2^x)^2)
export function rewriteExponentials(expr: symbolic, x: symbolic): symbolic {
	return expr.visit({
		post: node => {
			if (node.isCall('exp')) {
				const lin = linearExponent(x, node.operands[0]);
				if (lin && !(lin[0] === 1 && lin[1].isConst(0)))
					return product(lin[1].isConst(0) ? symbolic.one : symbolic.exp(lin[1]), raisedKernel(symbolic.exp(x), lin[0]));
			} else if (node.isCall('pow') && !node.operands[0].contains(x)) {
				const [base, exponent] = node.operands;
				const lin = linearExponent(x, exponent);
				const b = constValue(base);
				const [root, m]: [symbolic | numeric, number] = b === undefined ? [base, 1] : perfectPower(b);
				if (lin && (m > 1 || !(lin[0] === 1 && lin[1].isConst(0)))) {
					const r = root instanceof symbolic ? root : symbolicConstant.create(root);
					return product(power(base, lin[1]), raisedKernel(symbolicCall.create('pow', [r, x]), lin[0] * m));
				}
			}
			return node;
		}
	});
}

// kernel^k built structurally so that the kernel survives as a sub-expression
function raisedKernel(kernel: symbolic, k: number): symbolic {
	return k === 1 ? kernel : symbolicCall.create('pow', [kernel, symbolic.from(k)]);
}

//-----------------------------------------------------------------------------
// coefficients
//-----------------------------------------------------------------------------

// coefficients of expr as a polynomial in v, lowest power first, with no trailing zeros; v may be a variable or a kernel such as 2^x
export function polynomialCoefficients(v: symbolic, expr: symbolic): Result<symbolic[], 'NotPolynomial' | 'ExpansionLimit'> {
	let x		= v;
	let work	= expr;

	if (!(v instanceof symbolicVariable)) {
		for (const name of v.freeVariables())
			work = rewriteExponentials(work, symbolic.variable(name));
		x		= symbolic.variable(`(${v.id})`);
		work	= work.replace(v, x);
		for (const name of v.freeVariables()) {
			if (work.contains(symbolic.variable(name)))
				return fail('NotPolynomial', `${expr} is not a polynomial in ${v}`);
		}
	}

	const expansion = expandFully(work);
	if (!expansion.ok)
		return expansion;

	const expanded	= expansion.value;
	const terms		= expanded.isCall('add') ? expanded.operands : [expanded];
	const coefs: symbolic[][] = [];

	for (const term of terms) {
		let degree = 0;
		const rest: symbolic[] = [];
		for (const f of term.isCall('mul') ? term.operands : [term]) {
			if (f === x) {
				degree += 1;
			} else if (f.isCall('pow') && f.operands[0] === x) {
				const k = constValue(f.operands[1]);
				const d = k === undefined ? undefined : num.smallInteger(k);
				if (d === undefined || d < 0)
					return fail('NotPolynomial', `${expr} has ${f} in ${v}`);
				degree += d;
			} else if (f.contains(x)) {
				return fail('NotPolynomial', `${expr} has ${f} in ${v}`);
			} else {
				rest.push(f);
			}
		}
		(coefs[degree] ??= []).push(product(...rest));
	}

	const result = Array.from(coefs, i => i ? canonical(sum(...i)) : symbolic.zero);
	while (result.length && result[result.length - 1].isConst(0))
		result.pop();
	return ok(result);
}

export function polynomialDegree(v: symbolic, expr: symbolic): Result<number, 'NotPolynomial' | 'ExpansionLimit'> {
	const r = polynomialCoefficients(v, expr);
	return r.ok ? ok(r.value.length - 1) : r;
}

// sum of coefs[i]·v^i, lowest power first, zero coefficients dropped
export function polynomialFromCoefficients(v: symbolic, coefs: readonly symbolic[]): symbolic {
	const terms = coefs.flatMap((c, i) => c.isConst(0) ? [] : [product(c, power(v, symbolic.from(i)))]);
	return terms.length > 1 ? symbolicCall.create('add', terms) : sum(...terms);
}

export function toPolynomialNormalForm(v: symbolic, expr: symbolic): Result<symbolic, 'NotPolynomial' | 'ExpansionLimit'> {
	const r = polynomialCoefficients(v, expr);
	return r.ok ? ok(polynomialFromCoefficients(v, r.value.map(c => simplify(c) ?? c))) : r;
}
