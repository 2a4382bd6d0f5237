import { symbolic, symbolicCall, symbolicConstant, symbolicVector, sum, product, power, negate, quotient, difference, call } from './symbolic';
import { evaluateConstants } from './evaluate';
import * as num from './rational';

type Derivative = (args: readonly symbolic[], d: (e: symbolic) => symbolic) => symbolic;

// derivative of f with respect to its argument; the chain rule is applied by the caller
const unaryDerivatives: Record<string, (a: symbolic) => symbolic> = {
	exp:	a => symbolic.exp(a),
	sqrt:	a => quotient(symbolic.one, product(symbolic.from(2), symbolic.sqrt(a))),
	abs:	a => quotient(a, symbolic.abs(a)),
	sin:	a => symbolic.cos(a),
	cos:	a => negate(symbolic.sin(a)),
	tan:	a => quotient(symbolic.one, power(symbolic.cos(a), symbolic.from(2))),
	asin:	a => quotient(symbolic.one, symbolic.sqrt(difference(symbolic.one, power(a, symbolic.from(2))))),
	acos:	a => negate(quotient(symbolic.one, symbolic.sqrt(difference(symbolic.one, power(a, symbolic.from(2)))))),
	atan:	a => quotient(symbolic.one, sum(symbolic.one, power(a, symbolic.from(2)))),
};

function minusOne(g: symbolic): symbolic {
	return g instanceof symbolicConstant ? symbolicConstant.create(num.sub(g.value, num.one)) : difference(g, symbolic.one);
}

const derivatives: Record<string, Derivative> = {
	add:	(args, d) => sum(...args.map(d)),
	sub:	([a, b], d) => difference(d(a), d(b)),
	neg:	([a], d) => negate(d(a)),

	mul:	(args, d) => sum(...args.map((_, i) => product(...args.map((f, j) => i === j ? d(f) : f)))),

	div:	([a, b], d) => {
		const db = d(b);
		return db.isConst(0)
			? quotient(d(a), b)
			: quotient(difference(product(d(a), b), product(a, db)), power(b, symbolic.from(2)));
	},

	pow:	([f, g], d) => {
		const df = d(f), dg = d(g);
		// g·f^(g-1)·f'
		if (dg.isConst(0))
			return product(g, power(f, minusOne(g)), df);
		// f^g·log(f)·g'
		if (df.isConst(0))
			return f === symbolic.e
				? product(power(f, g), dg)
				: product(power(f, g), symbolic.log(f), dg);
		// f^g·(g'·log(f) + g·f'/f)
		return product(power(f, g), sum(product(dg, symbolic.log(f)), quotient(product(g, df), f)));
	},

	log:	(args, d) => {
		const [a, b] = args;
		if (!b)
			return quotient(d(a), a);
		return d(b).isConst(0)
			? quotient(d(a), product(a, symbolic.log(b)))
			: d(quotient(symbolic.log(a), symbolic.log(b)));
	},

	eq:		([a, b], d) => call('eq', d(a), d(b)),

	inner:	([a, b], d) => {
		const da = d(a), db = d(b);
		return sum(
			...(da.isConst(0) ? [] : [call('inner', da, b)]),
			...(db.isConst(0) ? [] : [call('inner', a, db)]),
		);
	},
};

// one differentiation with respect to v, with no folding beyond what the builders do
export function derivative(v: symbolic, expr: symbolic): symbolic {
	const d = (e: symbolic): symbolic => {
		if (e === v)
			return symbolic.one;
		if (e instanceof symbolicVector)
			return symbolicVector.create(e.operands.map(d));
		if (!e.contains(v))
			return symbolic.zero;
		if (!(e instanceof symbolicCall))
			throw new Error(`cannot differentiate ${e}`);

		const unary = unaryDerivatives[e.op];
		if (unary)
			return product(unary(e.operands[0]), d(e.operands[0]));

		const rule = derivatives[e.op];
		if (!rule)
			throw new Error(`no derivative for ${e.op}`);
		return rule(e.operands, d);
	};
	return d(expr);
}

// differentiates with respect to each symbol in turn, folding constants after each step
export function differentiate(symbols: readonly (string | symbolic)[], expr: symbolic): symbolic {
	return symbols.reduce<symbolic>((e, s) => {
		const v = typeof s === 'string' ? symbolic.variable(s) : s;
		const done = symbolic.trace(() => `d/d${v} ${e}`);
		const r = evaluateConstants(derivative(v, e));
		done();
		return r;
	}, expr);
}
