import { symbolic, symbolicCall, symbolicConstant, product, power } from './symbolic';
import { canonical } from './canonical';
import { Budget } from './rules';
import { ok, fail, type Result } from './result';
import * as num from './rational';

export interface ExpandOptions {
	maxTerms:	number;		// products or powers that would expand past this are left alone
	budget:		Budget;
}

function cartesian(lists: readonly (readonly symbolic[])[]): symbolic[][] {
	return lists.reduce<symbolic[][]>((acc, list) => acc.flatMap(prefix => list.map(i => [...prefix, i])), [[]]);
}

// all ways of writing n as an ordered sum of k non-negative parts
function compositions(n: number, k: number): number[][] {
	if (k === 1)
		return [[n]];
	const result: number[][] = [];
	for (let i = n; i >= 0; i--) {
		for (const rest of compositions(n - i, k - 1))
			result.push([i, ...rest]);
	}
	return result;
}

function binomial(n: number, k: number): bigint {
	let r = 1n;
	for (let i = 0; i < k; i++)
		r = r * BigInt(n - i) / BigInt(i + 1);
	return r;
}

function multinomial(parts: readonly number[]): bigint {
	let n = 0, r = 1n;
	for (const k of parts) {
		n += k;
		r *= binomial(n, k);
	}
	return r;
}

// capped is told about nodes left alone because they would grow past maxTerms
function distribute(node: symbolic, maxTerms: number, capped?: () => void): symbolic {
	if (node.isCall('mul')) {
		const lists = node.operands.map(i => i.isCall('add') ? i.operands : [i]);
		if (lists.every(i => i.length === 1))
			return node;
		if (lists.reduce((n, i) => n * i.length, 1) > maxTerms) {
			capped?.();
			return node;
		}
		return symbolicCall.create('add', cartesian(lists).map(factors => product(...factors)));
	}

	if (node.isCall('pow')) {
		const [base, exponent] = node.operands;
		const n = exponent instanceof symbolicConstant ? num.smallInteger(exponent.value) : undefined;
		if (!base.isCall('add') || n === undefined)
			return node;

		const k = base.arity;
		if (n < 2)
			return node;
		if (binomial(n + k - 1, k - 1) > BigInt(maxTerms)) {
			capped?.();
			return node;
		}

		return symbolicCall.create('add', compositions(n, k).map(parts => product(
			symbolic.from(num.rational(multinomial(parts))),
			...parts.map((p, i) => power(base.operands[i], symbolic.from(p)))
		)));
	}
	return node;
}

// fully distributes products over sums and expands integer powers of sums, then collects like terms
export function multiplyOut(expr: symbolic, options: Partial<ExpandOptions> = {}): symbolic {
	const maxTerms	= options.maxTerms ?? 10000;
	const budget	= options.budget ?? new Budget(10000);

	let current = canonical(expr, [], budget);
	while (!budget.exhausted) {
		const expanded = current.visit({ post: node => distribute(node, maxTerms) });
		if (expanded === current)
			break;
		current = canonical(expanded, [], budget);
		budget.spend();
	}
	return current;
}

// multiplyOut, failing instead of handing back a partial expansion when maxTerms or the budget cut it short
export function expandFully(expr: symbolic, options: Partial<ExpandOptions> = {}): Result<symbolic, 'ExpansionLimit'> {
	const maxTerms	= options.maxTerms ?? 10000;
	const result	= multiplyOut(expr, options);
	let capped		= false;
	const settled	= result.visit({ post: node => distribute(node, maxTerms, () => { capped = true; }) });
	return settled === result && !capped ? ok(result) : fail('ExpansionLimit', `expansion of ${expr} stopped at ${result}`);
}
