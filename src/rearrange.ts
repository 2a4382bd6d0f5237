import { symbolic, symbolicConstant, symbolicVector, sum, product, power, negate, quotient, difference, call } from './symbolic';
import { ok, fail, type Result } from './result';
import * as num from './rational';

type RearrangeFailure = 'MultipleOccurrences' | 'NoOccurrence' | 'NoInverse';

// given op(...args) = rhs, with the unknown in args[k], the possible values of args[k]
type Inverse = (args: readonly symbolic[], k: number, rhs: symbolic) => symbolic[] | undefined;

function others(args: readonly symbolic[], k: number): symbolic[] {
	return args.filter((_, i) => i !== k);
}

function plusMinus(a: symbolic): symbolic[] {
	return [a, negate(a)];
}

// x^n = r
function root(rhs: symbolic, n: symbolic): symbolic[] {
	if (n instanceof symbolicConstant) {
		const inv = num.recip(n.value);
		if (inv === undefined)
			return [];
		const r = power(rhs, symbolicConstant.create(inv));
		return num.isEven(n.value) ? plusMinus(r) : [r];
	}
	return [power(rhs, quotient(symbolic.one, n))];
}

const inverses: Record<string, Inverse> = {
	add:	(args, k, rhs) => [difference(rhs, sum(...others(args, k)))],
	mul:	(args, k, rhs) => [quotient(rhs, product(...others(args, k)))],
	sub:	([a, b], k, rhs) => [k === 0 ? sum(rhs, b) : difference(a, rhs)],
	div:	([a, b], k, rhs) => [k === 0 ? product(rhs, b) : quotient(a, rhs)],
	neg:	(_args, _k, rhs) => [negate(rhs)],

	pow:	([a, b], k, rhs) => k === 0
		? root(rhs, b)
		: [a === symbolic.e ? symbolic.log(rhs) : quotient(symbolic.log(rhs), symbolic.log(a))],

	sqrt:	(_args, _k, rhs) => [power(rhs, symbolic.from(2))],
	exp:	(_args, _k, rhs) => [symbolic.log(rhs)],
	log:	([a, b], k, rhs) =>
		!b		? [symbolic.exp(rhs)]
		: k === 0	? [power(b, rhs)]
		: [power(a, quotient(symbolic.one, rhs))],

	abs:	(_args, _k, rhs) => plusMinus(rhs),
	sin:	(_args, _k, rhs) => [call('asin', rhs)],
	cos:	(_args, _k, rhs) => plusMinus(call('acos', rhs)),
	tan:	(_args, _k, rhs) => [call('atan', rhs)],
	asin:	(_args, _k, rhs) => [symbolic.sin(rhs)],
	acos:	(_args, _k, rhs) => [symbolic.cos(rhs)],
	atan:	(_args, _k, rhs) => [symbolic.tan(rhs)],
};

// peels the outermost operator off lhs = rhs: the operand holding x, and the values it may take
export function invertOuter(x: symbolic, lhs: symbolic, rhs: symbolic): [symbolic, symbolic[]] | undefined {
	const k			= lhs.operands.findIndex(i => i.contains(x));
	const inverse	= lhs.op === undefined ? undefined : inverses[lhs.op];
	const branches	= k < 0 ? undefined : inverse?.(lhs.operands, k, rhs);
	return branches && [lhs.operands[k], branches];
}

function isolate(x: symbolic, lhs: symbolic, rhs: symbolic): Result<symbolic[], 'NoInverse'> {
	if (lhs === x)
		return ok([rhs]);

	const k = lhs.operands.findIndex(i => i.contains(x));

	if (lhs instanceof symbolicVector) {
		if (!(rhs instanceof symbolicVector) || rhs.arity !== lhs.arity)
			return fail('NoInverse', `cannot match ${lhs} against ${rhs}`);
		return isolate(x, lhs.operands[k], rhs.operands[k]);
	}

	const step = invertOuter(x, lhs, rhs);
	if (!step)
		return fail('NoInverse', `no inverse for ${lhs.op ?? lhs} in ${lhs}`);

	const results: symbolic[] = [];
	for (const b of step[1]) {
		const r = isolate(x, step[0], b);
		if (!r.ok)
			return r;
		results.push(...r.value);
	}
	return ok(results);
}

// isolates the single occurrence of unknown, one equation per branch of each multi-valued inverse
export function rearrange(unknown: symbolic, equation: symbolic): Result<symbolic[], RearrangeFailure> {
	if (!equation.isCall('eq'))
		throw new Error(`rearrange needs an equation, got ${equation}`);

	const n = equation.occurrences(unknown);
	if (n === 0)
		return fail('NoOccurrence', `${unknown} does not occur in ${equation}`);
	if (n > 1)
		return fail('MultipleOccurrences', `${unknown} occurs ${n} times in ${equation}`);

	const [lhs, rhs] = equation.operands;
	const r = lhs.contains(unknown) ? isolate(unknown, lhs, rhs) : isolate(unknown, rhs, lhs);
	return r.ok ? ok(r.value.map(i => unknown.equals(i))) : r;
}
