import { symbolic, symbolicConstant, symbolicCall, symbolicVector, compareSymbolic, constValue, call } from './symbolic';
import { foldCall } from './operators';
import { applyRules, Budget, type Rule } from './rules';
import * as num from './rational';
import type { numeric } from './rational';

// Canonical form:
//	- sub, neg, div, sqrt and log(a, b) are rewritten into add, mul, pow and log(a)
//	- add and mul are flat, with constants folded into one leading operand
//	- like terms and like factors are merged
//	- operands of add and mul are sorted by compareSymbolic

const constant = (n: numeric) => symbolicConstant.create(n);

function isExactValue(e: symbolic, test: (n: numeric) => boolean): boolean {
	const v = constValue(e);
	return v !== undefined && num.isExact(v) && test(v);
}

function isIntegerConst(e: symbolic): e is symbolicConstant {
	return e instanceof symbolicConstant && num.isExact(e.value) && num.isInteger(e.value);
}

function flatten(op: string, items: readonly symbolic[]): symbolic[] {
	return items.flatMap(i => i.isCall(op) ? flatten(op, i.operands) : [i]);
}

function sorted(items: symbolic[]): symbolic[] {
	return items.sort(compareSymbolic);
}

//-----------------------------------------------------------------------------
// add
//-----------------------------------------------------------------------------

// split a term into numeric coefficient and the rest
export function splitCoefficient(term: symbolic): [numeric, symbolic] {
	if (term.isCall('mul')) {
		const [first, ...rest] = term.operands;
		const c = constValue(first);
		if (c !== undefined)
			return [c, rest.length === 1 ? rest[0] : symbolicCall.create('mul', rest)];
	}
	return [num.one, term];
}

function scaled(c: numeric, term: symbolic): symbolic {
	if (num.isExact(c) && num.isOne(c))
		return term;
	return symbolicCall.create('mul', [constant(c), ...(term.isCall('mul') ? term.operands : [term])]);
}

export function normalizeAdd(items: readonly symbolic[]): symbolic {
	const terms		= flatten('add', items);
	const vectors	= terms.filter(i => i instanceof symbolicVector);

	if (vectors.length > 1 && vectors.length === terms.length) {
		const len = vectors[0].arity;
		if (vectors.some(v => v.arity !== len))
			throw new Error('adding vectors of different lengths');
		return symbolicVector.create(vectors[0].operands.map((_, i) => normalizeAdd(vectors.map(v => v.operands[i]))));
	}

	let		c: numeric = num.zero;
	const	groups = new Map<symbolic, numeric>();

	for (const t of terms) {
		const v = constValue(t);
		if (v !== undefined) {
			c = num.add(c, v);
		} else {
			const [coef, rest] = splitCoefficient(t);
			const prev = groups.get(rest);
			groups.set(rest, prev === undefined ? coef : num.add(prev, coef));
		}
	}

	const result: symbolic[] = [];
	for (const [rest, coef] of groups) {
		if (!num.isZero(coef))
			result.push(scaled(coef, rest));
	}
	sorted(result);

	if (!num.isZero(c) || result.length === 0)
		result.unshift(constant(c));

	return result.length === 1 ? result[0] : symbolicCall.create('add', result);
}

//-----------------------------------------------------------------------------
// mul
//-----------------------------------------------------------------------------

export function splitPower(factor: symbolic): [symbolic, symbolic] {
	return factor.isCall('pow') ? [factor.operands[0], factor.operands[1]] : [factor, symbolic.one];
}

export function normalizeMul(items: readonly symbolic[]): symbolic {
	const factors = flatten('mul', items);

	let c: numeric = num.one;
	const others: symbolic[] = [];
	for (const f of factors) {
		const v = constValue(f);
		if (v !== undefined)
			c = num.mul(c, v);
		else
			others.push(f);
	}

	if (num.isZero(c))
		return constant(c);

	const vectors = others.filter(i => i instanceof symbolicVector);
	if (vectors.length === 1) {
		const scalars = others.filter(i => !(i instanceof symbolicVector));
		return symbolicVector.create(vectors[0].operands.map(i => normalizeMul([constant(c), ...scalars, i])));
	}

	// group by base
	const groups = new Map<symbolic, symbolic[]>();
	for (const f of others) {
		const [base, exponent] = splitPower(f);
		const prev = groups.get(base);
		if (prev)
			prev.push(exponent);
		else
			groups.set(base, [exponent]);
	}

	const result: symbolic[] = [];
	let regroup = false;
	for (const [base, exponents] of groups) {
		const p = normalizePow(base, exponents.length === 1 ? exponents[0] : normalizeAdd(exponents));
		const v = constValue(p);
		if (v !== undefined) {
			c = num.mul(c, v);
		} else {
			if (p.isCall('mul'))
				regroup = true;
			result.push(p);
		}
	}

	if (regroup)
		return normalizeMul([constant(c), ...result]);

	if (num.isZero(c))
		return constant(c);

	sorted(result);
	if (!(num.isExact(c) && num.isOne(c)) || result.length === 0)
		result.unshift(constant(c));

	return result.length === 1 ? result[0] : symbolicCall.create('mul', result);
}

//-----------------------------------------------------------------------------
// pow
//-----------------------------------------------------------------------------

export function normalizePow(base: symbolic, exponent: symbolic): symbolic {
	if (isExactValue(exponent, num.isZero))
		return symbolic.one;
	if (isExactValue(exponent, num.isOne))
		return base;
	if (isExactValue(base, num.isOne))
		return symbolic.one;

	const b = constValue(base);
	const e = constValue(exponent);
	if (b !== undefined && e !== undefined) {
		const r = num.pow(b, e);
		if (r !== undefined)
			return constant(r);
	}

	if (isIntegerConst(exponent)) {
		// (b^e)^n → b^(e·n)
		if (base.isCall('pow'))
			return normalizePow(base.operands[0], normalizeMul([base.operands[1], exponent]));
		// (a·b)^n → a^n·b^n
		if (base.isCall('mul'))
			return normalizeMul(base.operands.map(f => normalizePow(f, exponent)));
	}

	return symbolicCall.create('pow', [base, exponent]);
}

//-----------------------------------------------------------------------------
// one node, children already canonical
//-----------------------------------------------------------------------------

export function normalizeCall(node: symbolic): symbolic {
	if (!(node instanceof symbolicCall))
		return node;

	const args = node.operands;
	if (args.every(i => i instanceof symbolicConstant)) {
		const values = args.map(i => constValue(i) ?? NaN);
		const r = foldCall(node.op, values);
		if (r !== undefined)
			return constant(r);
	}

	switch (node.op) {
		case 'add':		return normalizeAdd(args);
		case 'mul':		return normalizeMul(args);
		case 'pow':		return normalizePow(args[0], args[1]);
		case 'sub':		return normalizeAdd([args[0], normalizeMul([constant(num.minusOne), args[1]])]);
		case 'neg':		return normalizeMul([constant(num.minusOne), args[0]]);
		case 'div':		return normalizeMul([args[0], normalizePow(args[1], constant(num.minusOne))]);
		case 'sqrt':	return normalizePow(args[0], constant(num.half));
		case 'log':
			return args.length === 2
				? normalizeMul([call('log', args[0]), normalizePow(call('log', args[1]), constant(num.minusOne))])
				: node;
		case 'abs': {
			// |c·a| → |c|·|a|
			const [c, rest] = splitCoefficient(args[0]);
			return num.isOne(c) ? node : normalizeMul([constant(num.abs(c)), call('abs', rest)]);
		}
		case 'inner': {
			const [a, b] = args;
			return a instanceof symbolicVector && b instanceof symbolicVector ? pass(a.inner(b), []) : node;
		}
		default:
			return node;
	}
}

function pass(e: symbolic, rules: readonly Rule[], budget?: Budget): symbolic {
	return e.visit({
		post: node => {
			const n = normalizeCall(node);
			if (rules.length && (!budget || !budget.exhausted)) {
				const r = applyRules(n, rules);
				if (r) {
					budget?.spend();
					return r;
				}
			}
			return n;
		}
	});
}

// canonical form under the given rules, repeated to a fixpoint or until the budget runs out
export function canonical(e: symbolic, rules: readonly Rule[] = [], budget = new Budget(10000)): symbolic {
	for (;;) {
		const next = pass(e, rules, budget);
		if (next === e || !budget.spend())
			return next;
		e = next;
	}
}
